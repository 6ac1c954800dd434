import { createInterface, type Interface } from 'node:readline';
import type { BibEntry } from './types/bibliography.js';

export interface ConfirmationPolicy {
	confirm(original: BibEntry, replacement: BibEntry): Promise<boolean>;
	close?(): void;
}

export const alwaysConfirm: ConfirmationPolicy = {
	confirm: async () => true
};

function describe(entry: BibEntry): string {
	return JSON.stringify({ ID: entry.id, ENTRYTYPE: entry.type, ...entry.fields }, null, 4);
}

/**
 * Shows both versions of an entry and asks y/n on the terminal, asking again
 * until the answer is one of the two. End of input counts as a rejection.
 */
export class PromptConfirmation implements ConfirmationPolicy {
	private readonly rl: Interface;
	private readonly lines: AsyncIterator<string>;

	constructor(
		input: NodeJS.ReadableStream = process.stdin,
		private readonly output: NodeJS.WritableStream = process.stdout
	) {
		this.rl = createInterface({ input, terminal: false });
		this.lines = this.rl[Symbol.asyncIterator]();
	}

	async confirm(original: BibEntry, replacement: BibEntry): Promise<boolean> {
		this.output.write(`\n---------------- Original ----------------\n${describe(original)}\n`);
		this.output.write(`\n---------------- Retrieved ---------------\n${describe(replacement)}\n`);

		while (true) {
			this.output.write('==> Replace the entry (y/n)?: ');
			const next = await this.lines.next();
			if (next.done) return false;

			const answer = next.value.trim().toLowerCase();
			if (answer === 'y') return true;
			if (answer === 'n') return false;
			this.output.write('Please accept (y) or reject (n) the change.\n');
		}
	}

	close() {
		this.rl.close();
	}
}
