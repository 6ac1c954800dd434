import nlp from 'compromise';

export type EntityLabel = 'DATE' | 'PLACE' | 'NUMBER' | 'OTHER';

export interface EntitySpan {
	label: EntityLabel;
	start: number;
	end: number;
}

/** Named-entity recognition over a proceedings title. */
export interface EntityRecognizer {
	recognize(text: string): EntitySpan[];
}

export const noEntities: EntityRecognizer = {
	recognize: () => []
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}

const LEADING = /[\s,;:(]/;
// match offsets include the punctuation attached to a term
const TRAILING = /[\s,;:)]/;

function toSpans(text: string, json: unknown, label: EntityLabel): EntitySpan[] {
	if (!Array.isArray(json)) return [];

	const spans: EntitySpan[] = [];
	for (const item of json) {
		const offset = isRecord(item) ? item.offset : undefined;
		if (!isRecord(offset) || typeof offset.start !== 'number' || typeof offset.length !== 'number') continue;

		let start = offset.start;
		let end = Math.min(text.length, offset.start + offset.length);
		while (start < end && LEADING.test(text[start])) start++;
		while (end > start && TRAILING.test(text[end - 1])) end--;
		if (end > start) spans.push({ label, start, end });
	}
	return spans;
}

/** Places and date phrases found by the compromise NLP library. */
export class CompromiseRecognizer implements EntityRecognizer {
	recognize(text: string): EntitySpan[] {
		const doc = nlp(text);
		return [
			...toSpans(text, doc.places().json({ offset: true }), 'PLACE'),
			...toSpans(text, doc.match('#Date+').json({ offset: true }), 'DATE'),
			...toSpans(text, doc.match('#Value+').json({ offset: true }), 'NUMBER')
		];
	}
}
