declare module 'bibtex-parse-js' {
	export interface ParsedRecord {
		citationKey?: string;
		entryType: string;
		entryTags?: Record<string, string>;
		entry?: string;
	}

	const bibtexParse: {
		toJSON(input: string): ParsedRecord[];
		toBibtex(json: ParsedRecord[], compact?: boolean): string;
	};

	export default bibtexParse;
}
