import type { BibEntry } from '../types/bibliography.js';
import type { EntityRecognizer, EntitySpan } from './recognizer.js';

// Venue places the recognizer tends to miss
export const KNOWN_PLACES = [
	'Copenhagen',
	'Groningen',
	'Heraklion',
	'Hersonissos',
	'Online Event',
	'Online',
	'Pisa',
	'Punta Cana',
	'Santa Fe',
	'Schloss Dagstuhl',
	'Tilburg University',
	'Virtual Event'
];

const MONTHS =
	'january|february|march|april|may|june|july|august|september|october|november|december|' +
	'jan|feb|mar|apr|jun|jul|aug|sep|oct|nov|dec';
const DAY = '[1-3]?[0-9](?:st|rd|nd|th)?';
const YEAR = '[12][90][0-9]{2}';

// 12-14 May 2021
const DAY_FIRST_DATE = new RegExp(`${DAY}(?: *[-–] *${DAY})? +(?:${MONTHS}),? +${YEAR}`, 'gi');
// June 2-7, 2019 / June 30 - July 2, 2021
const MONTH_FIRST_DATE = new RegExp(
	`\\b(?:${MONTHS}) +${DAY}(?: *[-–] *(?:(?:${MONTHS}) +)?${DAY})?,? +${YEAR}`,
	'gi'
);
const PLACE_PATTERN = new RegExp(`\\b(?:${KNOWN_PLACES.join('|')})\\b`, 'gi');

// ", Volume 1 (Long and Short Papers)" and similar trailing boilerplate
const SUFFIX =
	/(?:(?:\b(?:volume|and|long|demo|demonstration|short|papers|selected|proceedings|part|[IVX]{1,4})\b| [0-9]|[,;:()]) *)+$/i;

function trimSeparators(s: string): string {
	return s.replace(/[,; ]+$/, '');
}

function matches(pattern: RegExp, text: string, label: EntitySpan['label']): EntitySpan[] {
	return [...text.matchAll(pattern)].map((m) => ({
		label,
		start: m.index ?? 0,
		end: (m.index ?? 0) + m[0].length
	}));
}

// ", MN, " between a city and its country
const REGION_GAP = /^[,;]? *[A-Z]{2},? *$/;

/**
 * Trailing run of entities with one label, each no more than 3 characters
 * from the next or separated from it by a two-letter region code.
 */
function takeTrailingRun(title: string, entities: EntitySpan[], label: EntitySpan['label']): EntitySpan[] {
	const run: EntitySpan[] = [];
	while (entities.length > 0) {
		const last = entities[entities.length - 1];
		if (last.label !== label) break;
		if (run.length > 0 && last.end + 3 < run[0].start && !REGION_GAP.test(title.slice(last.end, run[0].start))) break;
		run.unshift(last);
		entities.pop();
	}
	return run;
}

/**
 * Move the conference location out of `booktitle` into `address`.
 *
 * dblp proceedings titles usually end with "…, City, Country, Month Day-Day,
 * Year" followed by volume boilerplate. The trailing dates are dropped, a
 * place right before them becomes the address, and the boilerplate is put
 * back. Titles with no trailing place or date are returned unchanged.
 */
export function extractConferenceLocation(entry: BibEntry, recognizer: EntityRecognizer): BibEntry {
	const booktitle = entry.fields.booktitle;
	if (booktitle === undefined) return entry;

	let title = booktitle.replace(/\n/g, ' ');
	let suffix = '';
	const suffixMatch = SUFFIX.exec(title);
	if (suffixMatch) {
		suffix = suffixMatch[0];
		title = trimSeparators(title.slice(0, suffixMatch.index));
	}

	const entities = [
		...recognizer.recognize(title),
		...matches(DAY_FIRST_DATE, title, 'DATE'),
		...matches(MONTH_FIRST_DATE, title, 'DATE'),
		...matches(PLACE_PATTERN, title, 'PLACE')
	]
		.filter((e) => e.label !== 'NUMBER')
		.sort((a, b) => a.start - b.start || a.end - b.end);

	const dates = takeTrailingRun(title, entities, 'DATE');
	const places = takeTrailingRun(title, entities, 'PLACE');

	if (places.length > 0) {
		const start = Math.min(...places.map((p) => p.start));
		const end = Math.max(...places.map((p) => p.end));
		return {
			...entry,
			fields: {
				...entry.fields,
				address: title.slice(start, end),
				booktitle: trimSeparators(title.slice(0, start)) + suffix
			}
		};
	}

	if (dates.length > 0) {
		const start = Math.min(...dates.map((d) => d.start));
		return {
			...entry,
			fields: { ...entry.fields, booktitle: trimSeparators(title.slice(0, start)) + suffix }
		};
	}

	return entry;
}
