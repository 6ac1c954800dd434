export * from './types/bibliography.js';
export { parseBibtex, parseBibliography, BibtexParseError } from './bibtex/parse.js';
export { writeBibtex, writeBibliography, formatEntry, sortEntries, type WriteOptions } from './bibtex/write.js';
export { canonicalAuthors, parseAuthors, splitName } from './match/authors.js';
export { comparisonKey, isProperlyCapitalized, recapitalize, protectCasing, renderTitle } from './match/title.js';
export { isPreprint } from './match/classify.js';
export { isSamePublication, bestOf, rankCandidates } from './match/rank.js';
export { selectEntry, classifyOutcome } from './match/select.js';
export { extractConferenceLocation } from './location/extract.js';
export { CompromiseRecognizer, noEntities, type EntityRecognizer, type EntitySpan } from './location/recognizer.js';
export { DblpSearchClient, DBLP_API, buildQuery, type SearchClient } from './search/dblp.js';
export { alwaysConfirm, PromptConfirmation, type ConfirmationPolicy } from './confirm.js';
export { ConsoleReporter } from './report/console.js';
export { MemoryReporter, silentReporter, type Reporter, type ReportEvent } from './report/reporter.js';
export { resolveConfig, loadConfigFile, parseConfig, ConfigError, DEFAULT_CONFIG, type FixConfig } from './config.js';
export {
	fixEntries,
	fixBibliographyFile,
	defaultOutputPath,
	cleanEntry,
	InvariantError,
	type FixOptions,
	type FixDeps,
	type FixSummary
} from './fixer.js';
