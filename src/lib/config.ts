/**
 * Settings for a fixing run. Resolved from built-in defaults, then an optional
 * YAML file, then the environment, then command-line flags.
 */

import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { DBLP_API } from './search/dblp.js';

export interface FixConfig {
	searchUrl: string;
	replaceArxiv: boolean;
	forceTitlecase: boolean;
	interactive: boolean;
	sortBy: string[];
	noPublisher: boolean;
	processConfLoc: boolean;
	format: boolean;
	strict: boolean;
	fieldOrder: string[];
}

export const CONFIG_FILE = 'bibmend.config.yaml';

export const DEFAULT_CONFIG: FixConfig = {
	searchUrl: DBLP_API,
	replaceArxiv: false,
	forceTitlecase: false,
	interactive: false,
	sortBy: [],
	noPublisher: false,
	processConfLoc: false,
	format: true,
	strict: false,
	fieldOrder: []
};

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

const BOOLEAN_KEYS = [
	'replaceArxiv',
	'forceTitlecase',
	'interactive',
	'noPublisher',
	'processConfLoc',
	'format',
	'strict'
] as const;
type BooleanKey = (typeof BOOLEAN_KEYS)[number];

function isBooleanKey(key: string): key is BooleanKey {
	return BOOLEAN_KEYS.some((k) => k === key);
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/** Parse YAML configuration. Unknown keys are ignored; known keys must have the right type. */
export function parseConfig(text: string, source = CONFIG_FILE): Partial<FixConfig> {
	let doc: unknown;
	try {
		doc = yaml.load(text);
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Invalid YAML in ${source}: ${detail}`);
	}

	if (doc === undefined || doc === null) return {};
	if (typeof doc !== 'object' || Array.isArray(doc)) {
		throw new ConfigError(`${source} must contain a mapping of settings`);
	}

	const config: Partial<FixConfig> = {};
	for (const [key, raw] of Object.entries(doc)) {
		const value: unknown = raw;
		if (key === 'searchUrl') {
			if (typeof value !== 'string') throw new ConfigError(`${source}: "${key}" must be a string`);
			config.searchUrl = value;
		} else if (key === 'sortBy' || key === 'fieldOrder') {
			if (!isStringArray(value)) throw new ConfigError(`${source}: "${key}" must be a list of strings`);
			config[key] = value;
		} else if (isBooleanKey(key)) {
			if (typeof value !== 'boolean') throw new ConfigError(`${source}: "${key}" must be true or false`);
			config[key] = value;
		}
	}
	return config;
}

export async function loadConfigFile(path: string): Promise<Partial<FixConfig>> {
	let text: string;
	try {
		text = await readFile(path, 'utf8');
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Cannot read configuration ${path}: ${detail}`);
	}
	return parseConfig(text, path);
}

export function resolveConfig(
	file: Partial<FixConfig> = {},
	flags: Partial<FixConfig> = {},
	env: NodeJS.ProcessEnv = process.env
): FixConfig {
	const fromEnv: Partial<FixConfig> = env.BIBMEND_SEARCH_URL ? { searchUrl: env.BIBMEND_SEARCH_URL } : {};
	return { ...DEFAULT_CONFIG, ...file, ...fromEnv, ...flags };
}
