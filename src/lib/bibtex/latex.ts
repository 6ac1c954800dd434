/**
 * Decode the LaTeX accent and special-letter commands that show up in author
 * fields into plain Unicode, e.g. `{\"o}` → `ö`, `\c{c}` → `ç`, `{\ss}` → `ß`.
 * Unknown commands are left in place.
 */

const ACCENTS: Record<string, string> = {
	'`': '\u0300',
	"'": '\u0301',
	'^': '\u0302',
	'~': '\u0303',
	'=': '\u0304',
	u: '\u0306',
	'.': '\u0307',
	'"': '\u0308',
	r: '\u030a',
	H: '\u030b',
	v: '\u030c',
	d: '\u0323',
	c: '\u0327',
	k: '\u0328',
	b: '\u0331'
};

const LETTERS: Record<string, string> = {
	o: 'ø',
	O: 'Ø',
	l: 'ł',
	L: 'Ł',
	ss: 'ß',
	aa: 'å',
	AA: 'Å',
	ae: 'æ',
	AE: 'Æ',
	oe: 'œ',
	OE: 'Œ',
	i: 'ı',
	j: 'ȷ'
};

// \"o  \"{o}  \'{\i}
const SYMBOL_ACCENT = /\\([`'^~=."])\s*(?:\{\s*(\\?[A-Za-z])\s*\}|(\\?[A-Za-z]))/g;
// \c{c}  \v s  \H{o}
const LETTER_ACCENT = /\\([uvrHdckb])(?:\s*\{\s*(\\?[A-Za-z])\s*\}|\s+([A-Za-z]))/g;
const SPECIAL_LETTER = /\\(ss|aa|AA|ae|AE|oe|OE|o|O|l|L|i|j)(?![A-Za-z])\s*/g;

function base(letter: string): string {
	// dotless i/j under an accent are written as \i, \j
	if (letter === '\\i') return 'i';
	if (letter === '\\j') return 'j';
	return letter;
}

export function decodeLatex(input: string): string {
	const decoded = input
		.replace(SYMBOL_ACCENT, (_m, accent: string, braced?: string, bare?: string) =>
			base(braced ?? bare ?? '') + ACCENTS[accent]
		)
		.replace(LETTER_ACCENT, (_m, accent: string, braced?: string, bare?: string) =>
			base(braced ?? bare ?? '') + ACCENTS[accent]
		)
		.replace(SPECIAL_LETTER, (_m, name: string) => LETTERS[name] ?? _m);

	// {\"O} decodes to {Ö}; the leftover group would otherwise hide the letter's case
	return decoded.normalize('NFC').replace(/\{([^\x00-\x7f])\}/g, '$1');
}

/** Remove grouping braces that only served to protect case or hold an accent. */
export function stripBraces(input: string): string {
	return input.replace(/[{}]/g, '');
}
