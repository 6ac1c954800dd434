import { parseArgs } from 'node:util';
import type { FixConfig } from './config.js';

export const USAGE = `Usage: bibmend <input.bib> [options]

  -o, --out <file>          Output file (default: <input>.fixed.bib)
  -a, --replace-arxiv       Use a non-arXiv version whenever one is found
  -t, --force-titlecase     Title-case titles that do not look capitalized
  -i, --interact            Confirm every change
  -s, --sort-by <keys>      Comma-separated sort keys, e.g. ENTRYTYPE,year (ID is the citation key)
      --no-publisher        Drop publishers from conference papers and journal articles
      --process-conf-loc    Move conference locations from booktitle to address, drop dates
      --no-formatting       Do not align the written fields
      --strict              Only adopt records judged to be the same publication
  -c, --config <file>       YAML configuration file
  -h, --help                Show this help`;

export interface CliArgs {
	input?: string;
	out?: string;
	configPath?: string;
	help: boolean;
	/** Only the settings given on the command line. */
	flags: Partial<FixConfig>;
}

export function parseCliArgs(argv: string[]): CliArgs {
	const { values, positionals } = parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			out: { type: 'string', short: 'o' },
			'replace-arxiv': { type: 'boolean', short: 'a' },
			'force-titlecase': { type: 'boolean', short: 't' },
			interact: { type: 'boolean', short: 'i' },
			'sort-by': { type: 'string', short: 's', multiple: true },
			'no-publisher': { type: 'boolean' },
			'process-conf-loc': { type: 'boolean' },
			'no-formatting': { type: 'boolean' },
			strict: { type: 'boolean' },
			config: { type: 'string', short: 'c' },
			help: { type: 'boolean', short: 'h' }
		}
	});

	const flags: Partial<FixConfig> = {};
	if (values['replace-arxiv']) flags.replaceArxiv = true;
	if (values['force-titlecase']) flags.forceTitlecase = true;
	if (values.interact) flags.interactive = true;
	if (values['no-publisher']) flags.noPublisher = true;
	if (values['process-conf-loc']) flags.processConfLoc = true;
	if (values['no-formatting']) flags.format = false;
	if (values.strict) flags.strict = true;
	if (values['sort-by']) {
		flags.sortBy = values['sort-by'].flatMap((s) => s.split(',')).map((s) => s.trim()).filter(Boolean);
	}

	return {
		input: positionals[0],
		out: values.out,
		configPath: values.config,
		help: values.help ?? false,
		flags
	};
}
