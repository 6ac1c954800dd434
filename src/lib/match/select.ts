import type { Reporter } from '../report/reporter.js';
import type { BibEntry, MatchDecision, Outcome, SelectOptions } from '../types/bibliography.js';
import { canonicalAuthors } from './authors.js';
import { isPreprint } from './classify.js';
import { bestOf, isSamePublication } from './rank.js';
import { comparisonKey } from './title.js';

/**
 * Choose which search result, if any, replaces `original`.
 *
 * Only results with the same title key and at least one shared author are
 * considered. `replaceArxiv` decides whether published versions or preprints
 * are preferred among them; it does not forbid the other kind.
 */
export function selectEntry(
	candidates: readonly BibEntry[] | null | undefined,
	original: BibEntry,
	options: SelectOptions,
	reporter?: Reporter
): MatchDecision {
	const none: MatchDecision = { candidate: null, preprintAlternative: false };
	if (!candidates || candidates.length === 0) return none;

	const origKey = comparisonKey(original.fields.title ?? '');
	if (origKey === '') return none;

	const origAuthors = new Set(canonicalAuthors(original, reporter));

	const matching = candidates.filter((c) => {
		if (c.fields.author === undefined || c.fields.title === undefined) return false;
		if (comparisonKey(c.fields.title) !== origKey) return false;
		return canonicalAuthors(c, reporter).some((a) => origAuthors.has(a));
	});

	const published = matching.filter((c) => !isPreprint(c));
	const preprints = matching.filter((c) => isPreprint(c));

	const bestAll = bestOf(matching, original, options);
	const bestPublished = bestOf(published, original, options);
	const bestPreprint = bestOf(preprints, original, options);

	const preprintAlternative = !options.replaceArxiv && isPreprint(original) && bestPublished !== null;
	if (preprintAlternative) {
		reporter?.report({ type: 'arxiv-available', entry: original });
	}

	const candidate = options.replaceArxiv ? (bestPublished ?? bestAll) : (bestPreprint ?? bestAll);
	return { candidate, preprintAlternative };
}

export function classifyOutcome(decision: MatchDecision, original: BibEntry, replaceArxiv: boolean): Outcome {
	const { candidate } = decision;
	if (!candidate) return 'keep-original';
	// a published version exists but preprints were asked for
	if (!replaceArxiv && decision.preprintAlternative && isPreprint(candidate)) return 'keep-arxiv-because-flag-unset';
	if (isSamePublication(candidate, original)) return 'equivalent-update';
	if (replaceArxiv && isPreprint(original) && !isPreprint(candidate)) return 'arxiv-upgrade';
	return 'generic-update';
}
