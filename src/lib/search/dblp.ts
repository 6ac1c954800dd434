import { parseBibtex } from '../bibtex/parse.js';
import type { SearchOutcome } from '../types/bibliography.js';

export const DBLP_API = 'https://dblp.org/search/publ/api';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface SearchClient {
	search(query: string): Promise<SearchOutcome>;
}

export interface DblpSearchOptions {
	endpoint?: string;
	fetch?: FetchLike;
}

/** Query string sent for an entry: its title followed by the first author. */
export function buildQuery(title: string, firstAuthor: string | undefined): string {
	return `${title} ${firstAuthor ?? ''}`;
}

/**
 * dblp publication search returning BibTeX records. Anything other than a 200
 * is a failed lookup, not an exception; the response body is parsed with a
 * fresh parser on every call.
 */
export class DblpSearchClient implements SearchClient {
	private readonly endpoint: string;
	private readonly fetchImpl: FetchLike;

	constructor(options: DblpSearchOptions = {}) {
		this.endpoint = options.endpoint ?? DBLP_API;
		this.fetchImpl = options.fetch ?? fetch;
	}

	url(query: string): URL {
		const url = new URL(this.endpoint);
		url.searchParams.set('format', 'bib');
		url.searchParams.set('q', query);
		return url;
	}

	async search(query: string): Promise<SearchOutcome> {
		const url = this.url(query);

		let body: string;
		try {
			const response = await this.fetchImpl(url);
			if (response.status !== 200) {
				return {
					kind: 'failed',
					reason: `dblp API returned status code ${response.status}`,
					status: response.status
				};
			}
			// the body streams in after the headers and can still fail
			body = await response.text();
		} catch (error) {
			const detail = error instanceof Error ? error.message : String(error);
			return { kind: 'failed', reason: `dblp request failed: ${detail}` };
		}

		return { kind: 'found', entries: parseBibtex(body, url.toString()) };
	}
}
