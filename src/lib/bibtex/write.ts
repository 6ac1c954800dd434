import type { BibEntry, Bibliography } from '../types/bibliography.js';

export interface WriteOptions {
	/** Align values and indent by two spaces. */
	format?: boolean;
	/** Fields written first, in this order; the rest follow alphabetically. */
	fieldOrder?: string[];
	/** Sort keys applied in order. `ID` is the citation key, `ENTRYTYPE` the entry type. */
	sortBy?: string[];
}

function sortValue(entry: BibEntry, key: string): string {
	if (key === 'ID') return entry.id;
	if (key === 'ENTRYTYPE') return entry.type;
	return entry.fields[key.toLowerCase()] ?? '';
}

export function sortEntries(entries: readonly BibEntry[], keys: readonly string[]): BibEntry[] {
	if (keys.length === 0) return [...entries];

	return [...entries].sort((a, b) => {
		for (const key of keys) {
			const va = sortValue(a, key);
			const vb = sortValue(b, key);
			if (va !== vb) return va < vb ? -1 : 1;
		}
		return 0;
	});
}

function orderedFieldNames(entry: BibEntry, fieldOrder: readonly string[]): string[] {
	const present = Object.keys(entry.fields).filter((name) => entry.fields[name] !== undefined);
	const first = fieldOrder.map((f) => f.toLowerCase()).filter((f) => present.includes(f));
	const rest = present.filter((name) => !first.includes(name)).sort();
	return [...first, ...rest];
}

export function formatEntry(entry: BibEntry, options: WriteOptions = {}): string {
	const format = options.format ?? true;
	const names = orderedFieldNames(entry, options.fieldOrder ?? []);
	const indent = format ? '  ' : ' ';
	const width = format ? Math.max(0, ...names.map((n) => n.length)) : 0;

	const macros = entry.macroFields ?? [];

	const lines = names.map((name) => {
		const value = entry.fields[name] ?? '';
		const braced = !macros.includes(name);
		const head = `${indent}${name.padEnd(width)} = ${braced ? '{' : ''}`;
		const body = format
			? value
					.split('\n')
					.map((line, i) => (i === 0 ? line : ' '.repeat(head.length) + line.trimStart()))
					.join('\n')
			: value;
		return braced ? `${head}${body}}` : `${head}${body}`;
	});

	return `@${entry.type}{${entry.id},\n${lines.join(',\n')}\n}\n`;
}

export function writeBibtex(entries: readonly BibEntry[], options: WriteOptions = {}): string {
	return sortEntries(entries, options.sortBy ?? [])
		.map((entry) => formatEntry(entry, options))
		.join('\n');
}

/** Write a whole file: comments, preambles and string definitions first, then the entries. */
export function writeBibliography(doc: Bibliography, options: WriteOptions = {}): string {
	const blocks = [
		...doc.comments.map((text) => `@comment{${text}}\n`),
		...doc.preambles.map((value) => `@preamble{${value}}\n`),
		...doc.strings.map(({ name, value }) => `@string{${name} = ${value}}\n`),
		...sortEntries(doc.entries, options.sortBy ?? []).map((entry) => formatEntry(entry, options))
	];
	return blocks.join('\n');
}
