import { promises as fs } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { pathToFileURL } from 'node:url';

export type Flags = {
	config?: string;
	input?: string;
	concurrency?: number;
	timeout?: number;
	delay?: number;
	maxPages?: number;
	issueType?: string;
	format?: string;
	silent?: boolean;
	verbosity?: string;
	userAgent?: string;
	header?: string[];
	allowInsecureCerts?: boolean;
};

export const DEFAULT_CONFIG_FILE = 'linksweep.config.json';

const validConfigExtensions = ['.js', '.mjs', '.cjs', '.json'];

export async function getConfig(flags: Flags) {
	// Check to see if a config file path was passed
	let config: Flags;
	if (flags.config) {
		config = await parseConfigFile(flags.config);
	} else {
		config = await tryGetDefaultConfig();
	}

	// `meow` is set up to pass boolean flags as `undefined` if not passed.
	// copy the struct, and drop properties that are `undefined` so the merge
	// doesn't blast away config level settings.
	const strippedFlags = Object.fromEntries(
		Object.entries(flags).filter(
			([, value]) =>
				value !== undefined && !(Array.isArray(value) && value.length === 0),
		),
	);

	// Combine the flags passed on the CLI with the flags in the config file,
	// with CLI flags getting precedence
	const merged: Flags = { ...config, ...strippedFlags };
	return merged;
}

/**
 * Attempt to load `linksweep.config.json` from the working directory,
 * assuming the user hasn't passed a specific path to a config.
 * @returns The contents of the default config if present, or an empty config.
 */
async function tryGetDefaultConfig(): Promise<Flags> {
	const defaultConfigPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
	try {
		await fs.access(defaultConfigPath);
	} catch {
		return {};
	}
	return parseConfigFile(defaultConfigPath);
}

async function parseConfigFile(configPath: string): Promise<Flags> {
	// Returning json in case file doesn't have an extension for backward compatibility
	const configExtension = path.extname(configPath) || '.json';

	switch (configExtension) {
		case '.json': {
			return readJsonConfigFile(configPath);
		}

		case '.js':
		case '.mjs':
		case '.cjs': {
			return importConfigFile(configPath);
		}

		default: {
			throw new Error(
				`Config file should be either of extensions ${validConfigExtensions.join(
					',',
				)}`,
			);
		}
	}
}

async function importConfigFile(configPath: string): Promise<Flags> {
	const url = pathToFileURL(path.resolve(process.cwd(), configPath));
	const config: { default: Flags } = await import(url.href);
	return config.default;
}

async function readJsonConfigFile(configPath: string): Promise<Flags> {
	const configFileContents = await fs.readFile(configPath, {
		encoding: 'utf8',
	});

	const parsed: unknown = JSON.parse(configFileContents);
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new Error(`Config file ${configPath} must contain a JSON object`);
	}
	return Object.fromEntries(Object.entries(parsed));
}
