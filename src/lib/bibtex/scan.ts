/**
 * Splits BibTeX text into top-level blocks before the entry parser sees it.
 *
 * `@string`, `@preamble` and `@comment` blocks are kept as raw text so they
 * can be written back. In entries, field values that are macro references or
 * `#` concatenations (`month = jan`, `booktitle = icml # " 2020"`) are wrapped
 * in braces and their field names recorded, so the entry parser reads them as
 * plain text and the writer can emit them unbraced again.
 */

export type RawBlock =
	| { kind: 'entry'; type: string; key: string; text: string; fieldCount: number; macroFields: string[] }
	| { kind: 'string'; name: string; value: string }
	| { kind: 'preamble'; value: string }
	| { kind: 'comment'; text: string };

type PieceKind = 'braced' | 'quoted' | 'number' | 'macro';

const BLOCK_START = /@\s*([A-Za-z][\w-]*)\s*([{(])/y;
const STRING_DEF = /^\s*([^\s=]+)\s*=\s*([\s\S]*?)\s*$/;
const SEPARATORS = /[\s,]*/y;
const FIELD_NAME = /([^\s=,{}"#]+)\s*=\s*/y;
const WHITESPACE = /\s*/y;
const BARE = /[^\s,#{}"]+/y;

function skip(pattern: RegExp, text: string, pos: number): number {
	pattern.lastIndex = pos;
	pattern.exec(text);
	return pattern.lastIndex;
}

/** Index of the character closing the group opened at `open`, or -1. */
function groupEnd(text: string, open: number): number {
	const paren = text[open] === '(';
	let depth = 0;
	for (let i = open + 1; i < text.length; i++) {
		const ch = text[i];
		if (ch === '{') depth++;
		else if (ch === '}') {
			if (depth === 0) return paren ? -1 : i;
			depth--;
		} else if (paren && ch === ')' && depth === 0) return i;
	}
	return -1;
}

function nearby(text: string, pos: number): string {
	return text.slice(pos, pos + 20).trim();
}

function readPiece(text: string, pos: number): { kind: PieceKind; end: number } {
	if (text[pos] === '{') {
		const close = groupEnd(text, pos);
		if (close < 0) throw new SyntaxError(`Unterminated value near "${nearby(text, pos)}"`);
		return { kind: 'braced', end: close + 1 };
	}

	if (text[pos] === '"') {
		let depth = 0;
		for (let i = pos + 1; i < text.length; i++) {
			if (text[i] === '{') depth++;
			else if (text[i] === '}') depth--;
			else if (text[i] === '"' && depth === 0) return { kind: 'quoted', end: i + 1 };
		}
		throw new SyntaxError(`Unterminated value near "${nearby(text, pos)}"`);
	}

	BARE.lastIndex = pos;
	const bare = BARE.exec(text);
	if (!bare) throw new SyntaxError(`Value expected near "${nearby(text, pos)}"`);
	return { kind: /^[0-9]+$/.test(bare[0]) ? 'number' : 'macro', end: BARE.lastIndex };
}

/** A value is one or more pieces joined by `#`. */
function readValue(text: string, start: number): { end: number; kinds: PieceKind[] } {
	const kinds: PieceKind[] = [];
	let pos = start;
	while (true) {
		const piece = readPiece(text, pos);
		kinds.push(piece.kind);
		pos = piece.end;

		const next = skip(WHITESPACE, text, pos);
		if (text[next] !== '#') return { end: pos, kinds };
		pos = skip(WHITESPACE, text, next + 1);
	}
}

function entryBlock(type: string, body: string): RawBlock {
	const comma = body.indexOf(',');
	const key = (comma < 0 ? body : body.slice(0, comma)).trim();
	if (comma < 0) return { kind: 'entry', type, key, text: `@${type}{${body}}`, fieldCount: 0, macroFields: [] };

	const macroFields: string[] = [];
	let fieldCount = 0;
	let rewritten = body.slice(0, comma + 1);
	let copied = comma + 1;
	let pos = comma + 1;

	while ((pos = skip(SEPARATORS, body, pos)) < body.length) {
		FIELD_NAME.lastIndex = pos;
		const field = FIELD_NAME.exec(body);
		if (!field) throw new SyntaxError(`Field expected in @${type}{${key}} near "${nearby(body, pos)}"`);

		const start = FIELD_NAME.lastIndex;
		const { end, kinds } = readValue(body, start);
		fieldCount++;

		const literal = kinds.length === 1 && (kinds[0] === 'braced' || kinds[0] === 'quoted');
		if (!literal) {
			// bare numbers are text too, the rest are expressions over macros
			if (kinds.length > 1 || kinds[0] !== 'number') macroFields.push(field[1].toLowerCase());
			rewritten += body.slice(copied, start) + `{${body.slice(start, end)}}`;
			copied = end;
		}
		pos = end;
	}
	rewritten += body.slice(copied);

	return { kind: 'entry', type, key, text: `@${type}{${rewritten}}`, fieldCount, macroFields };
}

export function scanBlocks(content: string): RawBlock[] {
	const blocks: RawBlock[] = [];

	let at = content.indexOf('@');
	while (at >= 0) {
		BLOCK_START.lastIndex = at;
		const start = BLOCK_START.exec(content);
		if (!start) {
			// a stray "@" in text between entries
			at = content.indexOf('@', at + 1);
			continue;
		}

		const open = BLOCK_START.lastIndex - 1;
		const close = groupEnd(content, open);
		if (close < 0) throw new SyntaxError(`Unterminated @${start[1]} block near "${nearby(content, at)}"`);
		const body = content.slice(open + 1, close);

		switch (start[1].toLowerCase()) {
			case 'comment':
				blocks.push({ kind: 'comment', text: body });
				break;
			case 'preamble':
				blocks.push({ kind: 'preamble', value: body.trim() });
				break;
			case 'string': {
				const def = STRING_DEF.exec(body);
				if (!def) throw new SyntaxError(`Malformed @string definition "${body.trim()}"`);
				blocks.push({ kind: 'string', name: def[1], value: def[2] });
				break;
			}
			default:
				blocks.push(entryBlock(start[1], body));
		}

		at = content.indexOf('@', close + 1);
	}

	return blocks;
}
