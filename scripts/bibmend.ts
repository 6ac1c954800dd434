#!/usr/bin/env node

import { existsSync } from 'fs';
import { parseCliArgs, USAGE } from '../src/lib/cli.js';
import { CONFIG_FILE, loadConfigFile, resolveConfig } from '../src/lib/config.js';
import { alwaysConfirm, PromptConfirmation } from '../src/lib/confirm.js';
import { defaultOutputPath, fixBibliographyFile } from '../src/lib/fixer.js';
import { CompromiseRecognizer } from '../src/lib/location/recognizer.js';
import { ConsoleReporter } from '../src/lib/report/console.js';
import { DblpSearchClient } from '../src/lib/search/dblp.js';

async function main() {
	const args = parseCliArgs(process.argv.slice(2));
	if (args.help || !args.input) {
		console.log(USAGE);
		if (!args.help) process.exitCode = 1;
		return;
	}

	const configPath = args.configPath ?? (existsSync(CONFIG_FILE) ? CONFIG_FILE : undefined);
	const fileConfig = configPath ? await loadConfigFile(configPath) : {};
	const config = resolveConfig(fileConfig, args.flags);

	const reporter = new ConsoleReporter();
	if (!config.replaceArxiv) {
		reporter.report({
			type: 'warning',
			message:
				'Not replacing arXiv entries with entries found in a book or journal. ' +
				'Use the flag `--replace-arxiv` if you wish to replace arXiv entries.'
		});
	}

	const confirm = config.interactive ? new PromptConfirmation() : alwaysConfirm;
	const outFile = args.out ?? defaultOutputPath(args.input);

	try {
		const summary = await fixBibliographyFile(args.input, outFile, config, {
			search: new DblpSearchClient({ endpoint: config.searchUrl }),
			confirm,
			reporter,
			recognizer: config.processConfLoc ? new CompromiseRecognizer() : undefined
		});

		const { counts } = summary;
		const updated = counts['equivalent-update'] + counts['generic-update'] + counts['arxiv-upgrade'];
		console.log(
			`Done: ${updated} updated (${counts['arxiv-upgrade']} from arXiv), ` +
				`${counts['keep-original'] + counts['keep-arxiv-because-flag-unset']} kept, ` +
				`${counts.skipped} skipped, ${counts.rejected} rejected, ${counts['lookup-failed']} failed lookups ` +
				`of ${summary.total} entries.`
		);
	} finally {
		confirm.close?.();
	}
}

main().catch((e) => {
	console.error('Error:', e instanceof Error ? e.message : e);
	process.exit(1);
});
