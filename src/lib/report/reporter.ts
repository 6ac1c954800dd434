import type { BibEntry, Outcome } from '../types/bibliography.js';

export type ReportEvent =
	| { type: 'entry-kept'; entry: BibEntry; outcome: Outcome; reason?: string }
	| { type: 'entry-updated'; entry: BibEntry; outcome: Outcome }
	| { type: 'arxiv-available'; entry: BibEntry }
	| { type: 'info'; message: string }
	| { type: 'warning'; message: string }
	| { type: 'error'; message: string; cause?: unknown };

export interface Reporter {
	report(event: ReportEvent): void;
}

export const silentReporter: Reporter = {
	report() {}
};

export class MemoryReporter implements Reporter {
	readonly events: ReportEvent[] = [];

	report(event: ReportEvent) {
		this.events.push(event);
	}

	ofType<T extends ReportEvent['type']>(type: T): Extract<ReportEvent, { type: T }>[] {
		return this.events.filter((e): e is Extract<ReportEvent, { type: T }> => e.type === type);
	}
}
