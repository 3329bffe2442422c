export enum IssueType {
	BROKEN = 'broken',
	REDIRECT = 'redirect',
	ERROR = 'error',
}

/**
 * A navigable link found on a page, resolved against the page URL.
 */
export type LinkReference = {
	resolvedUrl: string;
	originalHref: string;
	anchorText: string;
};

/**
 * An href that looked navigable but could not be turned into a URL.
 */
export type MalformedLink = {
	originalHref: string;
	anchorText: string;
	error: Error;
};

export type ParsedLink = LinkReference | MalformedLink;

export type ExtractionResult =
	| { ok: true; links: ParsedLink[] }
	| { ok: false; reason: string };

/**
 * Result of probing a single URL. A `statusCode` of 0 means the request never
 * produced a response, and `failureReason` says why.
 */
export type StatusOutcome = {
	statusCode: number;
	redirectTarget?: string;
	failureReason?: string;
};

export type Classification =
	| { isProblem: true; issueType: IssueType }
	| { isProblem: false };

export type LinkIssue = {
	readonly sourcePage: string;
	readonly linkUrl: string;
	readonly anchorText: string;
	readonly statusCode: number;
	readonly issueType: IssueType;
	readonly redirectTarget?: string;
	readonly errorMessage?: string;
};

export type LinkCheckInfo = {
	page: string;
	link: ParsedLink;
	outcome: StatusOutcome;
	issue?: LinkIssue;
};

export type PageReport = {
	url: string;
	linkCount: number;
	issues: LinkIssue[];
	error?: string;
};

export type ExtractionErrorInfo = {
	url: string;
	reason: string;
};

export type PageErrorInfo = {
	url: string;
	error: Error;
};

export type ProgressInfo = {
	completed: number;
	total: number;
	url: string;
};

export type ProgressErrorInfo = {
	url: string;
	error: Error;
};

export type ProgressCallback = (
	completed: number,
	total: number,
	lastPageUrl: string,
) => void;

export type CheckResult = {
	passed: boolean;
	issues: LinkIssue[];
	pages: PageReport[];
};
