import bibtexParse from 'bibtex-parse-js';
import type { BibEntry, BibFields, Bibliography } from '../types/bibliography.js';
import { scanBlocks } from './scan.js';

export class BibtexParseError extends Error {
	constructor(
		message: string,
		readonly source: string
	) {
		super(message);
		this.name = 'BibtexParseError';
	}
}

function parseFailure(error: unknown, source: string): BibtexParseError {
	// bibtex-parse-js throws plain strings
	const detail = error instanceof Error ? error.message : String(error);
	return new BibtexParseError(`Failed to parse BibTeX from ${source}: ${detail}`, source);
}

function toEntry(text: string, macroFields: string[]): BibEntry | null {
	const [record] = bibtexParse.toJSON(text);
	if (!record?.citationKey || !record.entryTags) return null;

	const fields: BibFields = {};
	for (const [name, value] of Object.entries(record.entryTags)) {
		fields[name.trim().toLowerCase()] = value.trim();
	}
	const entry: BibEntry = { id: record.citationKey.trim(), type: record.entryType.trim().toLowerCase(), fields };
	return macroFields.length > 0 ? { ...entry, macroFields } : entry;
}

/**
 * Parse a whole .bib file. Entries come back in file order; `@string`,
 * `@preamble` and `@comment` blocks are collected so they can be written back.
 */
export function parseBibliography(content: string, source = '<input>'): Bibliography {
	const doc: Bibliography = { entries: [], strings: [], preambles: [], comments: [] };
	if (!content.trim()) return doc;

	try {
		for (const block of scanBlocks(content)) {
			switch (block.kind) {
				case 'comment':
					doc.comments.push(block.text);
					break;
				case 'preamble':
					doc.preambles.push(block.value);
					break;
				case 'string':
					doc.strings.push({ name: block.name, value: block.value });
					break;
				case 'entry': {
					if (block.fieldCount === 0) {
						if (block.key) doc.entries.push({ id: block.key, type: block.type.toLowerCase(), fields: {} });
						break;
					}
					const entry = toEntry(block.text, block.macroFields);
					if (entry) doc.entries.push(entry);
					break;
				}
			}
		}
	} catch (error) {
		throw parseFailure(error, source);
	}

	return doc;
}

/** Parse BibTeX text into entries, in file order. */
export function parseBibtex(content: string, source = '<input>'): BibEntry[] {
	return parseBibliography(content, source).entries;
}
