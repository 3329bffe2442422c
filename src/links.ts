import type { Readable } from 'node:stream';
import { WritableStream } from 'htmlparser2/WritableStream';
import type { ParsedLink } from './types.js';

export const NO_ANCHOR_TEXT = '[No anchor text]';

// hrefs with these prefixes never lead to a page that can be checked
const ignoredPrefixes = ['#', 'javascript:', 'mailto:', 'tel:'];

type OpenAnchor = {
	href: string;
	text: string;
};

/**
 * Returns true when an href should be turned into a link reference. Empty
 * hrefs, fragment-only hrefs and script, mail or phone schemes are skipped.
 * @param href Raw value of the href attribute
 */
export function isNavigableHref(href: string): boolean {
	const trimmed = href.trim();
	if (!trimmed) {
		return false;
	}
	const lowered = trimmed.toLowerCase();
	return !ignoredPrefixes.some((prefix) => lowered.startsWith(prefix));
}

/**
 * Parse a page and list every `<a href>` it contains, in document order.
 * @param source Readable stream of the page markup
 * @param pageUrl URL the page was fetched from, used to resolve relative hrefs
 */
export async function getLinks(
	source: Readable,
	pageUrl: string,
): Promise<ParsedLink[]> {
	// Anchors are recorded when they open so the output follows document
	// order, and their text is filled in as the parser walks their children.
	const anchors: OpenAnchor[] = [];
	const open: OpenAnchor[] = [];

	const parser = new WritableStream({
		onopentag(tag: string, attributes: Record<string, string>) {
			if (tag !== 'a' || attributes.href === undefined) {
				return;
			}
			const anchor = { href: attributes.href, text: '' };
			anchors.push(anchor);
			open.push(anchor);
		},
		ontext(text: string) {
			for (const anchor of open) {
				anchor.text += text;
			}
		},
		onclosetag(tag: string) {
			if (tag === 'a') {
				open.pop();
			}
		},
	});
	await new Promise((resolve, reject) => {
		source.on('error', reject);
		source.pipe(parser).on('finish', resolve).on('error', reject);
	});

	const links: ParsedLink[] = [];
	for (const anchor of anchors) {
		if (isNavigableHref(anchor.href)) {
			links.push(parseLink(anchor, pageUrl));
		}
	}
	return links;
}

function parseLink(anchor: OpenAnchor, pageUrl: string): ParsedLink {
	const originalHref = anchor.href.trim();
	const anchorText = anchor.text.trim() || NO_ANCHOR_TEXT;
	try {
		const url = new URL(originalHref, pageUrl);
		return { resolvedUrl: url.href, originalHref, anchorText };
	} catch (error) {
		return {
			originalHref,
			anchorText,
			error: error instanceof Error ? error : new Error(String(error)),
		};
	}
}
