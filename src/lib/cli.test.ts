import { describe, expect, it } from 'vitest';
import { parseCliArgs } from './cli.js';

describe('parseCliArgs', () => {
	it('collects only the flags that were given', () => {
		expect(parseCliArgs(['refs.bib'])).toEqual({
			input: 'refs.bib',
			out: undefined,
			configPath: undefined,
			help: false,
			flags: {}
		});
	});

	it('maps options onto settings', () => {
		const args = parseCliArgs(['refs.bib', '-a', '-t', '--no-formatting', '--strict', '-o', 'out.bib', '-c', 'conf.yaml']);
		expect(args.input).toBe('refs.bib');
		expect(args.out).toBe('out.bib');
		expect(args.configPath).toBe('conf.yaml');
		expect(args.flags).toEqual({ replaceArxiv: true, forceTitlecase: true, format: false, strict: true });
	});

	it('splits sort keys on commas and across repeats', () => {
		expect(parseCliArgs(['refs.bib', '-s', 'ENTRYTYPE, year']).flags.sortBy).toEqual(['ENTRYTYPE', 'year']);
		expect(parseCliArgs(['refs.bib', '-s', 'ID', '--sort-by', 'year']).flags.sortBy).toEqual(['ID', 'year']);
	});

	it('reads the remaining switches', () => {
		expect(parseCliArgs(['refs.bib', '-i', '--no-publisher', '--process-conf-loc']).flags).toEqual({
			interactive: true,
			noPublisher: true,
			processConfLoc: true
		});
		expect(parseCliArgs(['-h']).help).toBe(true);
	});

	it('rejects unknown options', () => {
		expect(() => parseCliArgs(['refs.bib', '--bogus'])).toThrow();
	});
});
