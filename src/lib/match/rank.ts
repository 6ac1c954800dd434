import type { BibEntry } from '../types/bibliography.js';

/**
 * Whether two records describe the same publication instance: same year and
 * pages, or same year and one venue name contained in the other. Venue names
 * from different sources differ in prefixes and volume suffixes, hence the
 * containment test.
 */
export function isSamePublication(a: BibEntry, b: BibEntry): boolean {
	const yearMatch = a.fields.year !== undefined && b.fields.year !== undefined && a.fields.year === b.fields.year;
	const pagesMatch = a.fields.pages !== undefined && b.fields.pages !== undefined && a.fields.pages === b.fields.pages;

	if (yearMatch && pagesMatch) return true;

	const venueA = a.fields.booktitle;
	const venueB = b.fields.booktitle;
	const venueMatch =
		venueA !== undefined && venueB !== undefined && (venueA.includes(venueB) || venueB.includes(venueA));

	return yearMatch && venueMatch;
}

function timestampOf(entry: BibEntry): number {
	const parsed = entry.fields.timestamp ? Date.parse(entry.fields.timestamp) : NaN;
	return Number.isNaN(parsed) ? -Infinity : parsed;
}

function populatedFields(entry: BibEntry): number {
	return Object.values(entry.fields).filter((v) => v !== undefined).length;
}

function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ascending order of preference: older record timestamp, then older year,
 * then fewer fields, then citation key.
 */
export function compareCandidates(a: BibEntry, b: BibEntry): number {
	const ta = timestampOf(a);
	const tb = timestampOf(b);
	if (ta !== tb) return ta < tb ? -1 : 1;

	const byYear = compareStrings(a.fields.year ?? '', b.fields.year ?? '');
	if (byYear !== 0) return byYear;

	const byFields = populatedFields(a) - populatedFields(b);
	if (byFields !== 0) return byFields;

	return compareStrings(a.id, b.id);
}

/** Candidates from most to least preferred. Does not touch the input array. */
export function rankCandidates(candidates: readonly BibEntry[]): BibEntry[] {
	return [...candidates].sort((a, b) => compareCandidates(b, a));
}

/**
 * Pick the candidate to adopt for `original`.
 *
 * The highest-ranked candidate that is the same publication as the original
 * wins. When none is, the highest-ranked candidate is returned anyway, since
 * callers only pass candidates whose title and authors already matched. With
 * `strict`, only a candidate judged the same publication is ever returned.
 */
export function bestOf(
	candidates: readonly BibEntry[],
	original: BibEntry,
	options: { strict?: boolean } = {}
): BibEntry | null {
	if (candidates.length === 0) return null;

	if (candidates.length === 1) {
		const [only] = candidates;
		return !options.strict || isSamePublication(only, original) ? only : null;
	}

	const ranked = rankCandidates(candidates);
	const equivalent = ranked.find((c) => isSamePublication(c, original));
	if (equivalent) return equivalent;

	return options.strict ? null : ranked[0];
}
