import { describe, expect, it } from 'vitest';
import { CompromiseRecognizer, noEntities } from './recognizer.js';

describe('CompromiseRecognizer', () => {
	it('returns spans inside the text', () => {
		const text = 'Proceedings of the Workshop on Testing, Paris, France, June 3, 2021';
		const spans = new CompromiseRecognizer().recognize(text);

		for (const span of spans) {
			expect(['DATE', 'PLACE', 'NUMBER']).toContain(span.label);
			expect(span.start).toBeGreaterThanOrEqual(0);
			expect(span.end).toBeGreaterThan(span.start);
			expect(span.end).toBeLessThanOrEqual(text.length);
		}
	});

	it('finds places without the punctuation around them', () => {
		const text = 'Proceedings of the Workshop on Testing, Paris, France, June 3, 2021';
		const places = new CompromiseRecognizer()
			.recognize(text)
			.filter((span) => span.label === 'PLACE')
			.map((span) => text.slice(span.start, span.end));

		expect(places.some((place) => place.includes('Paris'))).toBe(true);
		expect(places.some((place) => place.includes('France'))).toBe(true);
		for (const place of places) {
			expect(place).toBe(place.trim());
			expect(place).not.toMatch(/[,;:]$/);
		}
	});

	it('finds nothing in an empty title', () => {
		expect(new CompromiseRecognizer().recognize('')).toEqual([]);
	});
});

describe('noEntities', () => {
	it('never finds anything', () => {
		expect(noEntities.recognize('Paris, France')).toEqual([]);
	});
});
