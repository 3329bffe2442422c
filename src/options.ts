import type { ProgressCallback } from './types.js';

export type CheckOptions = {
	urls: string | string[];
	// Maximum number of pages checked at the same time
	concurrency?: number;
	// Per-request timeout in seconds
	timeout?: number;
	// Pause after each link check within a page, in milliseconds
	linkDelay?: number;
	userAgent?: string;
	headers?: Record<string, string>;
	allowInsecureCerts?: boolean;
	onProgress?: ProgressCallback;
};

export type InternalCheckOptions = {
	urls: string[];
	concurrency: number;
	// milliseconds
	requestTimeout: number;
	linkDelay: number;
	headers: Record<string, string>;
	allowInsecureCerts: boolean;
	onProgress?: ProgressCallback;
};

export const DEFAULT_USER_AGENT =
	'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_TIMEOUT_SECONDS = 10;
export const DEFAULT_LINK_DELAY = 100;
export const MAX_TIMEOUT_MS = 4_294_967_295;

/**
 * Validate the options and fill in defaults. Problems with the input list
 * are usage errors and throw before any request is made.
 * @param options_ CheckOptions passed in from the CLI (or API)
 */
export function processOptions(options_: CheckOptions): InternalCheckOptions {
	const urls = Array.isArray(options_.urls) ? options_.urls : [options_.urls];

	// Ensure at least one url is provided
	if (urls.length === 0) {
		throw new Error('At least one URL must be provided');
	}

	for (const url of urls) {
		assertHttpUrl(url);
	}

	const concurrency = options_.concurrency ?? DEFAULT_CONCURRENCY;
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new Error(
			`Invalid concurrency "${concurrency}": must be a positive integer.`,
		);
	}

	const timeout = options_.timeout ?? DEFAULT_TIMEOUT_SECONDS;
	if (!Number.isFinite(timeout) || timeout <= 0) {
		throw new Error(
			`Invalid timeout "${timeout}": must be a positive number of seconds.`,
		);
	}
	// AbortSignal.timeout takes whole milliseconds that fit in 32 bits
	const requestTimeout = Math.max(1, Math.round(timeout * 1000));
	if (requestTimeout > MAX_TIMEOUT_MS) {
		throw new Error(
			`Invalid timeout "${timeout}": must be at most ${MAX_TIMEOUT_MS / 1000} seconds.`,
		);
	}

	const linkDelay = options_.linkDelay ?? DEFAULT_LINK_DELAY;
	if (!Number.isFinite(linkDelay) || linkDelay < 0) {
		throw new Error(
			`Invalid link delay "${linkDelay}": must be zero or more milliseconds.`,
		);
	}

	// A User-Agent in the custom headers wins over the userAgent option
	const headers = { ...(options_.headers ?? {}) };
	const hasUserAgent = Object.keys(headers).some(
		(name) => name.toLowerCase() === 'user-agent',
	);
	if (!hasUserAgent) {
		headers['User-Agent'] = options_.userAgent || DEFAULT_USER_AGENT;
	}

	return {
		urls,
		concurrency,
		requestTimeout,
		linkDelay,
		headers,
		allowInsecureCerts: options_.allowInsecureCerts ?? false,
		onProgress: options_.onProgress,
	};
}

function assertHttpUrl(url: string) {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		throw new Error(`Invalid URL: "${url}"`);
	}
	if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
		throw new Error(
			`Invalid URL: "${url}". Only http and https pages can be checked.`,
		);
	}
}
