import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { parseBibliography } from './bibtex/parse.js';
import { writeBibliography, type WriteOptions } from './bibtex/write.js';
import { alwaysConfirm, type ConfirmationPolicy } from './confirm.js';
import { extractConferenceLocation } from './location/extract.js';
import { noEntities, type EntityRecognizer } from './location/recognizer.js';
import { canonicalAuthors } from './match/authors.js';
import { classifyOutcome, selectEntry } from './match/select.js';
import { renderTitle } from './match/title.js';
import { silentReporter, type Reporter } from './report/reporter.js';
import { buildQuery, type SearchClient } from './search/dblp.js';
import type { BibEntry, Outcome } from './types/bibliography.js';

export class InvariantError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'InvariantError';
	}
}

export interface FixOptions {
	replaceArxiv: boolean;
	forceTitlecase: boolean;
	noPublisher: boolean;
	processConfLoc: boolean;
	strict: boolean;
}

export interface FixDeps {
	search: SearchClient;
	confirm?: ConfirmationPolicy;
	reporter?: Reporter;
	recognizer?: EntityRecognizer;
}

export type SummaryKey = Outcome | 'skipped' | 'rejected' | 'lookup-failed';

export interface FixSummary {
	total: number;
	counts: Record<SummaryKey, number>;
}

export interface FixResult {
	entries: BibEntry[];
	summary: FixSummary;
}

function emptySummary(total: number): FixSummary {
	return {
		total,
		counts: {
			'equivalent-update': 0,
			'arxiv-upgrade': 0,
			'generic-update': 0,
			'keep-original': 0,
			'keep-arxiv-because-flag-unset': 0,
			skipped: 0,
			rejected: 0,
			'lookup-failed': 0
		}
	};
}

/** Collapse line breaks and runs of whitespace inside field values. */
export function cleanEntry(entry: BibEntry): BibEntry {
	const fields: BibEntry['fields'] = {};
	for (const [name, value] of Object.entries(entry.fields)) {
		if (value !== undefined) fields[name] = value.replace(/\s+/g, ' ').trim();
	}
	return { ...entry, fields };
}

function dropPublisher(entry: BibEntry): BibEntry {
	if ((entry.type !== 'article' && entry.type !== 'inproceedings') || entry.fields.publisher === undefined) {
		return entry;
	}
	const { publisher: _publisher, ...fields } = entry.fields;
	return { ...entry, fields };
}

class EntryFixer {
	private readonly confirm: ConfirmationPolicy;
	private readonly reporter: Reporter;
	private readonly recognizer: EntityRecognizer;

	constructor(
		private readonly options: FixOptions,
		private readonly deps: FixDeps,
		private readonly summary: FixSummary
	) {
		this.confirm = deps.confirm ?? alwaysConfirm;
		this.reporter = deps.reporter ?? silentReporter;
		this.recognizer = deps.recognizer ?? noEntities;
	}

	private finish(entry: BibEntry): BibEntry {
		return cleanEntry(this.options.noPublisher ? dropPublisher(entry) : entry);
	}

	private async candidatesFor(title: string, firstAuthor: string): Promise<BibEntry[]> {
		const query = buildQuery(title, firstAuthor);
		try {
			const outcome = await this.deps.search.search(query);
			if (outcome.kind === 'found') return outcome.entries;

			this.summary.counts['lookup-failed']++;
			this.reporter.report({ type: 'error', message: outcome.reason });
			return [];
		} catch (error) {
			this.reporter.report({ type: 'error', message: `Search failed for query "${query}"`, cause: error });
			throw error;
		}
	}

	async fix(original: BibEntry): Promise<BibEntry> {
		const title = original.fields.title;
		if (title === undefined) {
			this.reporter.report({ type: 'warning', message: `No title, entry left as is: ${original.id}` });
			this.summary.counts.skipped++;
			return original;
		}

		// without a first author there is nothing to query with
		const [firstAuthor] = canonicalAuthors(original, this.reporter);
		if (firstAuthor === undefined) {
			this.summary.counts.skipped++;
			return original;
		}

		const candidates = await this.candidatesFor(title, firstAuthor);
		const decision = selectEntry(candidates, original, this.options, this.reporter);
		const outcome = classifyOutcome(decision, original, this.options.replaceArxiv);

		if (decision.candidate) {
			let replacement: BibEntry = { ...decision.candidate, id: original.id };
			if (this.options.processConfLoc && replacement.type === 'inproceedings') {
				replacement = extractConferenceLocation(replacement, this.recognizer);
			}
			replacement = {
				...replacement,
				fields: {
					...replacement.fields,
					title: renderTitle(replacement.fields.title ?? title, this.options.forceTitlecase)
				}
			};

			if (await this.confirm.confirm(original, replacement)) {
				this.summary.counts[outcome]++;
				this.reporter.report({ type: 'entry-updated', entry: replacement, outcome });
				return this.finish(replacement);
			}

			this.summary.counts.rejected++;
			this.reporter.report({ type: 'entry-kept', entry: original, outcome: 'keep-original', reason: 'rejected' });
			return original;
		}

		// a macro title is an expression, not text to re-case
		const macroTitle = original.macroFields?.includes('title') ?? false;
		const kept: BibEntry = macroTitle
			? original
			: { ...original, fields: { ...original.fields, title: renderTitle(title, this.options.forceTitlecase) } };
		this.summary.counts[outcome]++;
		this.reporter.report({ type: 'entry-kept', entry: kept, outcome });
		return this.finish(kept);
	}
}

/**
 * Look up every entry and replace it with a better record where one is
 * found. Entries are handled one at a time, in order; the returned list has
 * exactly one entry per input entry.
 */
export async function fixEntries(entries: readonly BibEntry[], options: FixOptions, deps: FixDeps): Promise<FixResult> {
	const summary = emptySummary(entries.length);
	const fixer = new EntryFixer(options, deps, summary);

	const fixed: BibEntry[] = [];
	for (const entry of entries) {
		fixed.push(await fixer.fix(entry));
	}

	if (fixed.length !== entries.length) {
		throw new InvariantError(`Entry count changed from ${entries.length} to ${fixed.length}`);
	}
	return { entries: fixed, summary };
}

export function defaultOutputPath(input: string): string {
	return input.replace(/\.bib$/, '') + '.fixed.bib';
}

export async function fixBibliographyFile(
	inFile: string,
	outFile: string,
	options: FixOptions & WriteOptions,
	deps: FixDeps
): Promise<FixSummary> {
	const reporter = deps.reporter ?? silentReporter;

	const doc = parseBibliography(await readFile(inFile, 'utf8'), inFile);
	const { entries } = doc;
	reporter.report({ type: 'info', message: `Bibliography file loaded successfully (${entries.length} entries).` });

	const { entries: fixed, summary } = await fixEntries(entries, options, deps);

	const output = writeBibliography({ ...doc, entries: fixed }, options);
	const written = parseBibliography(output, outFile).entries.length;
	if (written !== entries.length) {
		throw new InvariantError(`Loaded ${entries.length} entries but would write ${written}`);
	}

	await mkdir(dirname(outFile), { recursive: true });
	await writeFile(outFile, output, 'utf8');
	reporter.report({ type: 'info', message: `Saving the results to ${outFile}.` });

	return summary;
}
