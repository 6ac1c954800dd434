import type { BibEntry } from '../types/bibliography.js';

/** arXiv/CoRR records, recognised from the journal, eprint type or URL. */
export function isPreprint(entry: BibEntry): boolean {
	const journal = (entry.fields.journal ?? '').toLowerCase();
	const eprinttype = (entry.fields.eprinttype ?? '').toLowerCase();
	const url = (entry.fields.url ?? '').toLowerCase();

	return (journal + eprinttype + url).includes('arxiv') || journal.includes('corr');
}
