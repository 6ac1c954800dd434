import { describe, expect, it } from 'vitest';
import type { BibEntry, BibFields } from '../types/bibliography.js';
import { isPreprint } from './classify.js';

function entry(fields: BibFields): BibEntry {
	return { id: 'test', type: 'article', fields };
}

describe('isPreprint', () => {
	it('recognises arXiv in the journal, eprint type or url', () => {
		expect(isPreprint(entry({ journal: 'arXiv preprint arXiv:1234.56789' }))).toBe(true);
		expect(isPreprint(entry({ eprinttype: 'arXiv' }))).toBe(true);
		expect(isPreprint(entry({ url: 'https://arxiv.org/abs/1234.56789' }))).toBe(true);
	});

	it('recognises CoRR', () => {
		expect(isPreprint(entry({ journal: 'CoRR', volume: 'abs/1234.56789' }))).toBe(true);
	});

	it('treats everything else as published', () => {
		expect(isPreprint(entry({ journal: 'Test Journal', url: 'https://example.test/paper' }))).toBe(false);
		expect(isPreprint(entry({}))).toBe(false);
	});
});
