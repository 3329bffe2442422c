import type { ReadableStream } from 'node:stream/web';
import { Agent, type RequestInit, fetch as undiciFetch } from 'undici';

export type HttpResponse = {
	status: number;
	headers: Record<string, string>;
	body?: ReadableStream;
};

export type RequestOptions = {
	headers?: Record<string, string>;
	// milliseconds; 0 disables the timeout
	timeout?: number;
	redirect?: 'follow' | 'manual';
	allowInsecureCerts?: boolean;
};

// Shared HTTP agent for insecure certificate requests. A single agent keeps
// connections pooled instead of opening new sockets for every link.
let sharedInsecureAgent: Agent | undefined;

/**
 * Reset the shared insecure HTTP agent, closing any pooled connections.
 */
export async function resetSharedAgents(): Promise<void> {
	const agent = sharedInsecureAgent;
	sharedInsecureAgent = undefined;
	await agent?.close();
}

export function getInsecureAgent(): Agent {
	sharedInsecureAgent ??= new Agent({
		connect: {
			rejectUnauthorized: false,
		},
		keepAliveTimeout: 30_000,
		keepAliveMaxTimeout: 60_000,
		connections: 100,
	});
	return sharedInsecureAgent;
}

// Browser-like headers, so servers answer the checker the way they answer a
// visitor.
const defaultHeaders: Record<string, string> = {
	Accept:
		'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
	'Accept-Language': 'en-US,en;q=0.9',
	'Accept-Encoding': 'gzip, deflate, br',
	'Cache-Control': 'no-cache',
	Pragma: 'no-cache',
	'Sec-Fetch-Dest': 'document',
	'Sec-Fetch-Mode': 'navigate',
	'Sec-Fetch-Site': 'none',
	'Upgrade-Insecure-Requests': '1',
};

/**
 * Make a single HTTP request. The body is handed back unread; callers must
 * consume it or pass it to `drainStream`.
 * @param method HTTP method
 * @param url URL to request
 * @param options Headers, timeout, redirect mode and certificate handling
 */
export async function makeRequest(
	method: 'GET' | 'HEAD',
	url: string,
	options: RequestOptions = {},
): Promise<HttpResponse> {
	const requestOptions: RequestInit = {
		method,
		headers: { ...defaultHeaders, ...options.headers },
		redirect: options.redirect ?? 'follow',
	};

	if (options.timeout) {
		requestOptions.signal = AbortSignal.timeout(options.timeout);
	}

	// Without a dispatcher undici uses the global one, which is what tests
	// replace with a MockAgent.
	if (options.allowInsecureCerts) {
		requestOptions.dispatcher = getInsecureAgent();
	}

	const response = await undiciFetch(url, requestOptions);

	const headers: Record<string, string> = {};
	response.headers.forEach((value, key) => {
		headers[key] = value;
	});

	return {
		status: response.status,
		headers,
		body: response.body ?? undefined,
	};
}
