import { isRedirectStatus } from './classify.js';
import { type HttpResponse, makeRequest, type RequestOptions } from './request.js';
import { drainStream } from './stream-utils.js';
import type { StatusOutcome } from './types.js';

export type StatusCheckOptions = Omit<RequestOptions, 'redirect'>;

const timeoutCodes = new Set([
	'ETIMEDOUT',
	'UND_ERR_CONNECT_TIMEOUT',
	'UND_ERR_HEADERS_TIMEOUT',
	'UND_ERR_BODY_TIMEOUT',
]);

const connectionCodes = new Set([
	'ECONNREFUSED',
	'ECONNRESET',
	'ECONNABORTED',
	'ENOTFOUND',
	'EAI_AGAIN',
	'EHOSTUNREACH',
	'ENETUNREACH',
	'EPIPE',
	'UND_ERR_SOCKET',
	'UND_ERR_CLOSED',
]);

/**
 * Find the raw status a server returns for a URL. Redirects are never
 * followed, so a 3xx is reported as-is along with its `Location`.
 * Transport failures come back as an outcome with status 0 instead of
 * throwing.
 * @param url Absolute URL to probe
 * @param options Headers, per-attempt timeout and certificate handling
 */
export async function checkStatus(
	url: string,
	options: StatusCheckOptions = {},
): Promise<StatusOutcome> {
	const requestOptions: RequestOptions = { ...options, redirect: 'manual' };
	try {
		let response = await probe('HEAD', url, requestOptions);

		// If we got an HTTP 405, the server may not like HEAD. GET instead!
		if (response.status === 405) {
			response = await probe('GET', url, requestOptions);
		}

		const location = response.headers.location;
		if (isRedirectStatus(response.status) && location) {
			return { statusCode: response.status, redirectTarget: location };
		}
		return { statusCode: response.status };
	} catch (error) {
		return { statusCode: 0, failureReason: describeFailure(error) };
	}
}

async function probe(
	method: 'GET' | 'HEAD',
	url: string,
	options: RequestOptions,
): Promise<HttpResponse> {
	const response = await makeRequest(method, url, options);
	await drainStream(response.body);
	return response;
}

/**
 * Turn a request failure into a short reason. fetch wraps transport errors
 * in `TypeError: fetch failed`, so the whole `cause` chain is inspected.
 * @param error Whatever the request rejected with
 */
export function describeFailure(error: unknown): string {
	const chain = causeChain(error);

	if (
		chain.some(
			(item) =>
				property(item, 'name') === 'TimeoutError' ||
				timeoutCodes.has(String(property(item, 'code'))),
		)
	) {
		return 'Timeout';
	}

	if (
		chain.some((item) => connectionCodes.has(String(property(item, 'code'))))
	) {
		return 'Connection Error';
	}

	if (
		chain.some((item) =>
			String(property(item, 'message')).includes('redirect count exceeded'),
		)
	) {
		return 'Too Many Redirects';
	}

	for (const item of [...chain].reverse()) {
		const message = property(item, 'message');
		if (typeof message === 'string' && message) {
			return message;
		}
	}
	return String(error);
}

function causeChain(error: unknown): unknown[] {
	const chain: unknown[] = [];
	let current = error;
	// cause chains can in theory loop back on themselves
	while (current !== undefined && current !== null && chain.length < 8) {
		chain.push(current);
		current = property(current, 'cause');
	}
	return chain;
}

function property(value: unknown, key: string): unknown {
	if (typeof value !== 'object' || value === null) {
		return undefined;
	}
	return Reflect.get(value, key);
}
