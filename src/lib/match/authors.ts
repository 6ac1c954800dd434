import anyAscii from 'any-ascii';
import { decodeLatex, stripBraces } from '../bibtex/latex.js';
import type { Reporter } from '../report/reporter.js';
import type { AuthorParse, BibEntry } from '../types/bibliography.js';

export interface NameParts {
	first: string[];
	von: string[];
	last: string[];
	jr: string[];
}

/** Diacritics folded away, other scripts transliterated. */
export function toAscii(s: string): string {
	return anyAscii(s.normalize('NFKD').replace(/[\u0300-\u036f]/g, ''));
}

function isBalanced(s: string): boolean {
	let depth = 0;
	for (const ch of s) {
		if (ch === '{') depth++;
		else if (ch === '}' && --depth < 0) return false;
	}
	return depth === 0;
}

/** Split on a separator pattern, ignoring matches inside braces. */
function splitTopLevel(s: string, separator: RegExp): string[] {
	const sticky = new RegExp(separator.source, separator.flags + 'y');
	const parts: string[] = [];
	let depth = 0;
	let start = 0;
	for (let i = 0; i < s.length; i++) {
		const ch = s[i];
		if (ch === '{') depth++;
		else if (ch === '}') depth--;
		else if (depth === 0) {
			sticky.lastIndex = i;
			const m = sticky.exec(s);
			if (m) {
				parts.push(s.slice(start, i));
				i += m[0].length - 1;
				start = i + 1;
			}
		}
	}
	parts.push(s.slice(start));
	return parts;
}

function words(s: string): string[] {
	return splitTopLevel(s.trim(), /\s+/).filter((w) => w.length > 0);
}

// A word belongs to the "von" part when its first letter outside braces is lowercase.
function isLowerWord(word: string): boolean {
	let depth = 0;
	for (const ch of word) {
		if (ch === '{') depth++;
		else if (ch === '}') depth--;
		else if (depth === 0 && /[A-Za-z]/.test(ch)) return ch === ch.toLowerCase();
	}
	return false;
}

function splitVonLast(ws: string[]): { von: string[]; last: string[] } {
	let lastLower = -1;
	for (let i = 0; i < ws.length - 1; i++) {
		if (isLowerWord(ws[i])) lastLower = i;
	}
	if (lastLower < 0 || !isLowerWord(ws[0])) return { von: [], last: ws };
	return { von: ws.slice(0, lastLower + 1), last: ws.slice(lastLower + 1) };
}

/**
 * Split one name into BibTeX name parts. Accepts "First von Last",
 * "von Last, First" and "von Last, Jr, First"; returns null when the
 * name has no last part or more than two commas.
 */
export function splitName(name: string): NameParts | null {
	const sections = splitTopLevel(name, /,/).map((p) => p.trim());

	if (sections.length === 1) {
		const ws = words(sections[0]);
		if (ws.length === 0) return null;
		if (ws.length === 1) return { first: [], von: [], last: ws, jr: [] };

		let vonStart = -1;
		let vonEnd = -1;
		for (let i = 0; i < ws.length - 1; i++) {
			if (isLowerWord(ws[i])) {
				if (vonStart < 0) vonStart = i;
				vonEnd = i;
			}
		}
		if (vonStart < 0) {
			return { first: ws.slice(0, -1), von: [], last: ws.slice(-1), jr: [] };
		}
		return {
			first: ws.slice(0, vonStart),
			von: ws.slice(vonStart, vonEnd + 1),
			last: ws.slice(vonEnd + 1),
			jr: []
		};
	}

	if (sections.length > 3) return null;

	const { von, last } = splitVonLast(words(sections[0]));
	if (last.length === 0) return null;

	if (sections.length === 2) {
		return { first: words(sections[1]), von, last, jr: [] };
	}
	return { first: words(sections[2]), von, last, jr: words(sections[1]) };
}

/**
 * Turn an author field into comparable "First Last" strings.
 *
 * The truncation marker "and others" is dropped, LaTeX accents are decoded
 * and everything is folded to ASCII before the names are split. Particles and
 * suffixes do not take part in the comparison.
 */
export function parseAuthors(entry: BibEntry): AuthorParse {
	const raw = entry.fields.author;
	if (raw === undefined) {
		return { kind: 'empty', reason: 'missing', detail: `No authors found: ${entry.fields.title ?? entry.id}` };
	}

	const cleaned = toAscii(decodeLatex(raw.replace(/and others/g, '')).replace(/~/g, ' ')).replace(/\s+/g, ' ');
	if (!isBalanced(cleaned)) {
		return { kind: 'empty', reason: 'malformed', detail: `Cannot parse authors: ${raw}` };
	}

	const units = splitTopLevel(cleaned, /\s+and\s+/i)
		.map((u) => u.trim())
		.filter((u) => u.length > 0);

	const authors: string[] = [];
	for (const unit of units) {
		const parts = splitName(unit);
		if (!parts) {
			return { kind: 'empty', reason: 'malformed', detail: `Cannot parse authors: ${raw}` };
		}
		authors.push([...parts.first, ...parts.last].map(stripBraces).join(' '));
	}

	return { kind: 'ok', authors };
}

export function canonicalAuthors(entry: BibEntry, reporter?: Reporter): string[] {
	const parsed = parseAuthors(entry);
	if (parsed.kind === 'ok') return parsed.authors;

	reporter?.report({ type: 'warning', message: parsed.detail });
	return [];
}
