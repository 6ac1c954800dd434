import { parseAuthors } from '../match/authors.js';
import type { BibEntry, Outcome } from '../types/bibliography.js';
import type { ReportEvent, Reporter } from './reporter.js';

const PADDING = 10;

const OUTCOME_TAGS: Record<Outcome, string> = {
	'equivalent-update': 'UPDATE',
	'generic-update': 'UPDATE',
	'arxiv-upgrade': 'UPD_ARX',
	'keep-original': 'KEEP',
	'keep-arxiv-because-flag-unset': 'KEEP_ARX'
};

/** "(Surname, year)  Title  [url]" on one line. */
export function entrySummary(entry: BibEntry): string {
	const parsed = parseAuthors(entry);
	const firstAuthor = parsed.kind === 'ok' ? parsed.authors[0] : undefined;
	const surname = firstAuthor?.split(' ').at(-1);
	const year = entry.fields.year ?? '';

	const parts: string[] = [];
	if (surname && year) parts.push(`(${surname}, ${year})`.padEnd(20));

	let title = (entry.fields.title ?? '').replace(/\n/g, ' ').replace(/[{}]/g, '');
	title = title.length > 100 ? title.slice(0, 97) + '...' : title;
	parts.push(title.padEnd(100));

	if (entry.fields.url) parts.push(`[${entry.fields.url}]`);
	return parts.join(' ');
}

function tag(label: string): string {
	return `[${label}]`.padEnd(PADDING);
}

export function formatEvent(event: ReportEvent): string {
	switch (event.type) {
		case 'entry-updated':
		case 'entry-kept':
			return `${tag(OUTCOME_TAGS[event.outcome])} ${entrySummary(event.entry)}`;
		case 'arxiv-available':
			return `${tag('INFO')} Published version available for ${event.entry.id}`;
		case 'info':
			return `${tag('INFO')} ${event.message}`;
		case 'warning':
			return `${tag('WARNING')} ${event.message}`;
		case 'error':
			return `${tag('ERROR')} ${event.message}`;
	}
}

export class ConsoleReporter implements Reporter {
	report(event: ReportEvent) {
		const line = formatEvent(event);
		if (event.type === 'error') {
			console.error(line);
			if (event.cause instanceof Error && event.cause.stack) console.error(event.cause.stack);
		} else if (event.type === 'warning') {
			console.warn(line);
		} else {
			console.log(line);
		}
	}
}
