export interface BibFields {
	title?: string;
	author?: string;
	year?: string;
	pages?: string;
	journal?: string;
	booktitle?: string;
	url?: string;
	doi?: string;
	eprinttype?: string;
	publisher?: string;
	address?: string;
	timestamp?: string; // dblp record metadata, e.g. "Tue, 16 Aug 2022 23:04:38 +0200"
	[name: string]: string | undefined;
}

export interface BibEntry {
	id: string; // citation key
	type: string; // lowercased entry type, e.g. "inproceedings"
	fields: BibFields;
	/** Fields whose value is a macro expression (`month = jan`), written unbraced. */
	macroFields?: string[];
}

/** An `@string{name = value}` definition; the value keeps its quotes or braces. */
export interface BibString {
	name: string;
	value: string;
}

/** A whole .bib file: entries plus the blocks that travel with them unchanged. */
export interface Bibliography {
	entries: BibEntry[];
	strings: BibString[];
	preambles: string[];
	comments: string[];
}

export type AuthorParse =
	| { kind: 'ok'; authors: string[] }
	| { kind: 'empty'; reason: 'missing' | 'malformed'; detail: string };

export type SearchOutcome =
	| { kind: 'found'; entries: BibEntry[] }
	| { kind: 'failed'; reason: string; status?: number };

export interface MatchDecision {
	candidate: BibEntry | null;
	/** The original is a preprint and a published match exists, but preprints were preferred. */
	preprintAlternative: boolean;
}

export type Outcome =
	| 'equivalent-update'
	| 'arxiv-upgrade'
	| 'generic-update'
	| 'keep-original'
	| 'keep-arxiv-because-flag-unset';

export interface SelectOptions {
	replaceArxiv: boolean;
	strict?: boolean;
}
