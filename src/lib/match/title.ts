import { titleCase } from 'title-case';

function isUpper(ch: string): boolean {
	return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLower(ch: string): boolean {
	return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

/**
 * Casing- and punctuation-insensitive key; two titles name the same paper
 * iff their keys are equal. Search results often differ from the local entry
 * by a trailing dot, dash style or protective braces.
 */
export function comparisonKey(title: string): string {
	return title.replace(/[^0-9a-zA-Z]+/g, '').toLowerCase();
}

/** Rough check: enough words start with a capital letter for the title's length. */
export function isProperlyCapitalized(title: string): boolean {
	const words = title.split(/\s+/).filter((w) => w.length > 0);
	const capitalized = words.filter((w) => isUpper(w[0])).length;

	if (words.length <= 2) return capitalized === words.length;
	if (words.length <= 4) return capitalized >= 2;
	return capitalized >= 3;
}

export function recapitalize(title: string): string {
	return titleCase(title);
}

/**
 * Wrap capital letters in braces so BibTeX styles keep them, one letter at a
 * time: "Mip-NeRF" → "{M}ip-{N}e{R}{F}". Words that already contain a brace
 * are left alone. A capital right after a hyphen followed only by lowercase
 * letters ("Spatially-Varying") is ordinary capitalization and stays bare,
 * unless the part before the hyphen is a single character ("U-Net", "3-D").
 */
export function protectCasing(title: string): string {
	const words = title.split(/\s+/).filter((w) => w.length > 0);

	return words
		.map((word) => {
			if (word.includes('{')) return word;

			const firstPart = word.split('-')[0];
			const hyphenated = word.includes('-');
			let out = '';

			for (let i = 0; i < word.length; i++) {
				const letter = word[i];
				const plainAfterHyphen =
					hyphenated &&
					firstPart.length > 1 &&
					i > 0 &&
					word[i - 1] === '-' &&
					[...word.slice(i + 1)].every(isLower);

				out += isUpper(letter) && !plainAfterHyphen ? `{${letter}}` : letter;
			}
			return out;
		})
		.join(' ');
}

/** Title as written to the output: optionally re-capitalized, then protected. */
export function renderTitle(title: string, forceTitlecase: boolean): string {
	const cased = forceTitlecase && !isProperlyCapitalized(title) ? recapitalize(title) : title;
	return protectCasing(cased);
}
