import {
	type Classification,
	IssueType,
	type LinkIssue,
	type ParsedLink,
	type StatusOutcome,
} from './types.js';

export const REDIRECT_STATUS_CODES: ReadonlySet<number> = new Set([
	301, 302, 303, 307, 308,
]);

export const MAX_ANCHOR_TEXT_LENGTH = 100;

export function isRedirectStatus(status: number): boolean {
	return REDIRECT_STATUS_CODES.has(status);
}

/**
 * Decide whether a status outcome is worth reporting, and as what.
 *
 * The rules are applied in order, so a failure reason always wins, and a 404
 * is `broken` even though it would also match the generic 4xx rule. Status
 * codes in the 3xx range outside the redirect set (300, 304) are not
 * reported.
 */
export function classify(
	statusCode: number,
	failureReason?: string,
): Classification {
	if (failureReason) {
		return { isProblem: true, issueType: IssueType.ERROR };
	}
	if (statusCode === 404) {
		return { isProblem: true, issueType: IssueType.BROKEN };
	}
	if (isRedirectStatus(statusCode)) {
		return { isProblem: true, issueType: IssueType.REDIRECT };
	}
	if (statusCode >= 400) {
		return { isProblem: true, issueType: IssueType.BROKEN };
	}
	if (statusCode === 0) {
		return { isProblem: true, issueType: IssueType.ERROR };
	}
	return { isProblem: false };
}

/**
 * Build the issue for a checked link, or `undefined` when the link is fine.
 * The issue carries the href as written in the page, not the resolved URL.
 */
export function createIssue(
	sourcePage: string,
	link: ParsedLink,
	outcome: StatusOutcome,
): LinkIssue | undefined {
	const verdict = classify(outcome.statusCode, outcome.failureReason);
	if (!verdict.isProblem) {
		return undefined;
	}

	const issue: LinkIssue = {
		sourcePage,
		linkUrl: link.originalHref,
		anchorText: truncate(link.anchorText, MAX_ANCHOR_TEXT_LENGTH),
		statusCode: outcome.statusCode,
		issueType: verdict.issueType,
	};
	return Object.freeze({
		...issue,
		...(outcome.redirectTarget === undefined
			? {}
			: { redirectTarget: outcome.redirectTarget }),
		...(outcome.failureReason === undefined
			? {}
			: { errorMessage: outcome.failureReason }),
	});
}

// Counts code points, so a surrogate pair is never split in half.
function truncate(text: string, length: number): string {
	const codePoints = Array.from(text);
	if (codePoints.length <= length) {
		return text;
	}
	return codePoints.slice(0, length).join('');
}
