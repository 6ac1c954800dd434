import { afterEach, describe, expect, it, vi } from 'vitest';
import type { BibEntry } from '../types/bibliography.js';
import { ConsoleReporter, entrySummary, formatEvent } from './console.js';

const entry: BibEntry = {
	id: 'doe2022',
	type: 'inproceedings',
	fields: { title: '{T}est {E}ntry', author: 'Doe, John and Roe, Jane', year: '2022', url: 'https://example.test/paper' }
};

describe('entrySummary', () => {
	it('shows author, year, title and url', () => {
		expect(entrySummary(entry)).toBe(`${'(Doe, 2022)'.padEnd(20)} ${'Test Entry'.padEnd(100)} [https://example.test/paper]`);
	});

	it('truncates long titles', () => {
		const long: BibEntry = { id: 'x', type: 'misc', fields: { title: 'a'.repeat(120) } };
		expect(entrySummary(long)).toBe('a'.repeat(97) + '...');
	});
});

describe('formatEvent', () => {
	it('tags messages', () => {
		expect(formatEvent({ type: 'info', message: 'hello' })).toBe('[INFO]     hello');
		expect(formatEvent({ type: 'warning', message: 'careful' })).toBe('[WARNING]  careful');
		expect(formatEvent({ type: 'error', message: 'broken' })).toBe('[ERROR]    broken');
	});

	it('tags entries by outcome', () => {
		const summary = entrySummary(entry);
		expect(formatEvent({ type: 'entry-updated', entry, outcome: 'equivalent-update' })).toBe(`[UPDATE]   ${summary}`);
		expect(formatEvent({ type: 'entry-updated', entry, outcome: 'arxiv-upgrade' })).toBe(`[UPD_ARX]  ${summary}`);
		expect(formatEvent({ type: 'entry-kept', entry, outcome: 'keep-original' })).toBe(`[KEEP]     ${summary}`);
		expect(formatEvent({ type: 'entry-updated', entry, outcome: 'keep-arxiv-because-flag-unset' })).toBe(
			`[KEEP_ARX] ${summary}`
		);
	});

	it('notes an available published version without the entry summary', () => {
		expect(formatEvent({ type: 'arxiv-available', entry })).toBe('[INFO]     Published version available for doe2022');
	});
});

describe('ConsoleReporter', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('writes warnings and errors to their own streams', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});

		const reporter = new ConsoleReporter();
		reporter.report({ type: 'info', message: 'hello' });
		reporter.report({ type: 'warning', message: 'careful' });
		reporter.report({ type: 'error', message: 'broken' });

		expect(log).toHaveBeenCalledWith('[INFO]     hello');
		expect(warn).toHaveBeenCalledWith('[WARNING]  careful');
		expect(error).toHaveBeenCalledWith('[ERROR]    broken');
	});
});
