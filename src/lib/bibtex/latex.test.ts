import { describe, expect, it } from 'vitest';
import { decodeLatex, stripBraces } from './latex.js';

describe('decodeLatex', () => {
	it('decodes symbol accents braced and bare', () => {
		expect(decodeLatex('J{\\"o}rg')).toBe('Jörg');
		expect(decodeLatex('J\\"org')).toBe('Jörg');
		expect(decodeLatex('Andr\\\'{e}')).toBe('André');
	});

	it('decodes letter accents', () => {
		expect(decodeLatex('Fran\\c{c}ois')).toBe('François');
		expect(decodeLatex('Ond{\\v{r}}ej')).toBe('Ondřej');
		expect(decodeLatex('Du\\v s')).toBe('Duš');
	});

	it('decodes special letters and dotless i', () => {
		expect(decodeLatex('Pawe{\\l}')).toBe('Paweł');
		expect(decodeLatex('Gro{\\ss}')).toBe('Groß');
		expect(decodeLatex("Mart\\'{\\i}n")).toBe('Martín');
	});

	it('keeps the case of a braced accented capital', () => {
		expect(decodeLatex('{\\"O}zt{\\"u}rk')).toBe('Öztürk');
	});

	it('leaves unknown commands in place', () => {
		expect(decodeLatex('\\textbf{x}')).toBe('\\textbf{x}');
	});
});

describe('stripBraces', () => {
	it('removes every brace', () => {
		expect(stripBraces('{B}{E}RT {\\em x}')).toBe('BERT \\em x');
	});
});
