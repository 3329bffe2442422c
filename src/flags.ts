import { promises as fs } from 'node:fs';
import type { Flags } from './config.js';
import { IssueType } from './types.js';

export const MIN_TIMEOUT = 5;
export const MAX_TIMEOUT = 30;
export const DEFAULT_CLI_TIMEOUT = 10;
export const DEFAULT_MAX_PAGES = 100;

/**
 * Collect page URLs from the positional arguments and, when given, an input
 * file with one URL per line. Blank lines are dropped.
 */
export async function collectUrls(
	input: string[],
	inputFile?: string,
): Promise<string[]> {
	const lines = [...input];
	if (inputFile) {
		const contents = await fs.readFile(inputFile, { encoding: 'utf8' });
		lines.push(...contents.split(/\r?\n/));
	}
	return lines.map((line) => line.trim()).filter(Boolean);
}

export type PageLimit = {
	urls: string[];
	dropped: number;
};

export function limitPages(urls: string[], maxPages?: number): PageLimit {
	const limit = maxPages ?? DEFAULT_MAX_PAGES;
	if (!Number.isInteger(limit) || limit < 1) {
		throw new Error('Invalid flag: MAX-PAGES must be a positive integer.');
	}
	return {
		urls: urls.slice(0, limit),
		dropped: Math.max(0, urls.length - limit),
	};
}

export function parseTimeout(timeout: Flags['timeout']): number {
	if (timeout === undefined) {
		return DEFAULT_CLI_TIMEOUT;
	}
	if (
		!Number.isFinite(timeout) ||
		timeout < MIN_TIMEOUT ||
		timeout > MAX_TIMEOUT
	) {
		throw new Error(
			`Invalid flag: TIMEOUT must be between ${MIN_TIMEOUT} and ${MAX_TIMEOUT} seconds.`,
		);
	}
	return timeout;
}

export function parseIssueType(
	value: Flags['issueType'],
): IssueType | undefined {
	if (!value) {
		return undefined;
	}
	const issueType = Object.values(IssueType).find(
		(type) => type === value.toLowerCase(),
	);
	if (!issueType) {
		throw new Error(
			"Invalid flag: ISSUE-TYPE must be 'broken', 'redirect', or 'error'.",
		);
	}
	return issueType;
}

/**
 * Turn `Name:value` header flags into a header map. Only the first colon
 * splits, so values may contain colons.
 */
export function parseHeaders(header: string[]): Record<string, string> {
	return Object.fromEntries(
		header.map((item) => {
			const colonIndex = item.indexOf(':');
			if (colonIndex === -1) {
				throw new Error(
					`Invalid header format: "${item}". Use "Header-Name:value" format.`,
				);
			}
			const key = item.slice(0, colonIndex).trim();
			const value = item.slice(colonIndex + 1).trim();
			if (!key) {
				throw new Error(
					`Invalid header format: "${item}". Header name cannot be empty.`,
				);
			}
			if (!value) {
				throw new Error(
					`Invalid header format: "${item}". Header value cannot be empty.`,
				);
			}
			return [key, value];
		}),
	);
}

export function exitCodeFor(passed: boolean): number {
	return passed ? 0 : 1;
}
