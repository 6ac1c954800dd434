import { describe, expect, it } from 'vitest';
import { MemoryReporter } from '../report/reporter.js';
import type { BibEntry, BibFields } from '../types/bibliography.js';
import { classifyOutcome, selectEntry } from './select.js';

function entry(id: string, fields: BibFields, type = 'inproceedings'): BibEntry {
	return { id, type, fields };
}

const original = entry('doe2022', {
	title: 'Test Entry',
	author: 'John Doe',
	booktitle: 'Test Book',
	year: '2022',
	pages: '1-10',
	url: 'https://arxiv.org/abs/1234.56789'
});

const preprint = entry(
	'DBLP:journals/corr/abs-1234-56789',
	{
		title: 'Test Entry',
		author: 'John Doe',
		journal: 'CoRR',
		year: '2022',
		pages: '1-10',
		url: 'https://arxiv.org/abs/1234.56789'
	},
	'article'
);

const published = entry('DBLP:conf/test/Doe22', {
	title: 'Test Entry.',
	author: 'Doe, John and Roe, Jane',
	booktitle: 'Test Book',
	year: '2022',
	pages: '1-10'
});

const unrelated = entry('DBLP:conf/test/Doe22a', {
	title: 'Test Entry 2',
	author: 'John Doe',
	booktitle: 'Test Book',
	year: '2022',
	pages: '1-10'
});

const candidates = [preprint, published, unrelated];

describe('selectEntry', () => {
	it('prefers the published version when replacing arXiv entries', () => {
		const decision = selectEntry(candidates, original, { replaceArxiv: true });
		expect(decision).toEqual({ candidate: published, preprintAlternative: false });
		expect(decision.candidate).toBe(published);
	});

	it('prefers the preprint otherwise and reports the published alternative', () => {
		const reporter = new MemoryReporter();
		const decision = selectEntry(candidates, original, { replaceArxiv: false }, reporter);
		expect(decision.candidate).toBe(preprint);
		expect(decision.preprintAlternative).toBe(true);
		expect(reporter.ofType('arxiv-available')).toEqual([{ type: 'arxiv-available', entry: original }]);
	});

	it('falls back to the other kind when the preferred one is missing', () => {
		expect(selectEntry([published], original, { replaceArxiv: false }).candidate).toBe(published);
		expect(selectEntry([preprint], original, { replaceArxiv: true }).candidate).toBe(preprint);
	});

	it('returns nothing for no candidates', () => {
		const none = { candidate: null, preprintAlternative: false };
		expect(selectEntry(null, original, { replaceArxiv: true })).toEqual(none);
		expect(selectEntry(undefined, original, { replaceArxiv: true })).toEqual(none);
		expect(selectEntry([], original, { replaceArxiv: true })).toEqual(none);
	});

	it('requires a matching title and a shared author', () => {
		const otherAuthor = entry('x', { ...published.fields, author: 'Jane Roe' });
		const noAuthor = entry('y', { title: 'Test Entry', year: '2022' });
		const noTitle = entry('z', { author: 'John Doe', year: '2022' });
		expect(selectEntry([otherAuthor, noAuthor, noTitle, unrelated], original, { replaceArxiv: true }).candidate).toBeNull();
	});

	it('matches nothing when the original has no usable title', () => {
		const untitled = entry('u', { title: '{}', author: 'John Doe' });
		expect(selectEntry(candidates, untitled, { replaceArxiv: true }).candidate).toBeNull();
	});

	it('rejects non-equivalent candidates in strict mode', () => {
		const later = entry('later', { ...published.fields, year: '2023', pages: '11-20' });
		expect(selectEntry([later], original, { replaceArxiv: true }).candidate).toBe(later);
		expect(selectEntry([later], original, { replaceArxiv: true, strict: true }).candidate).toBeNull();
	});
});

describe('classifyOutcome', () => {
	it('labels an equivalent replacement', () => {
		expect(classifyOutcome({ candidate: published, preprintAlternative: false }, original, true)).toBe(
			'equivalent-update'
		);
	});

	it('labels a published replacement of a preprint', () => {
		const journal = entry('j', { title: 'Test Entry', author: 'John Doe', journal: 'Test Journal', year: '2023' }, 'article');
		expect(classifyOutcome({ candidate: journal, preprintAlternative: false }, original, true)).toBe('arxiv-upgrade');
		expect(classifyOutcome({ candidate: journal, preprintAlternative: false }, original, false)).toBe('generic-update');
	});

	it('labels kept entries', () => {
		expect(classifyOutcome({ candidate: null, preprintAlternative: false }, original, true)).toBe('keep-original');
		expect(classifyOutcome({ candidate: null, preprintAlternative: false }, original, false)).toBe('keep-original');
	});

	it('labels a preprint chosen over an available published version', () => {
		const decision = selectEntry(candidates, original, { replaceArxiv: false });
		expect(classifyOutcome(decision, original, false)).toBe('keep-arxiv-because-flag-unset');
	});

	it('labels a preprint as an ordinary update when no published version exists', () => {
		const decision = selectEntry([preprint], original, { replaceArxiv: false });
		expect(decision.preprintAlternative).toBe(false);
		expect(classifyOutcome(decision, original, false)).toBe('equivalent-update');
	});
});
