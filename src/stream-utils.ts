import { Readable } from 'node:stream';
import type { ReadableStream } from 'node:stream/web';

/**
 * Drains a response body stream without consuming its data.
 * This is important for connection pooling - if the body is not consumed,
 * the underlying TCP connection may not be returned to the pool, leading
 * to port exhaustion under high load.
 * @param body The response body stream to drain
 */
export async function drainStream(body: ReadableStream | undefined) {
	if (!body || body.locked) return;

	try {
		await body.cancel();
	} catch {
		// The connection is cleaned up by the agent when cancelling fails
	}
}

/**
 * Converts a fetch response body into a Node.js Readable so it can be piped
 * into the HTML parser.
 * @param body The response body stream
 */
export function toNodeReadable(body: ReadableStream): Readable {
	return Readable.fromWeb(body);
}
