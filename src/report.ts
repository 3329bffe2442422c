import chalk from 'chalk';
import { IssueType, type LinkIssue } from './types.js';

export type IssueSummary = {
	total: number;
	broken: number;
	redirect: number;
	error: number;
	pages: number;
};

export function summarize(issues: LinkIssue[]): IssueSummary {
	return {
		total: issues.length,
		broken: issues.filter((i) => i.issueType === IssueType.BROKEN).length,
		redirect: issues.filter((i) => i.issueType === IssueType.REDIRECT).length,
		error: issues.filter((i) => i.issueType === IssueType.ERROR).length,
		pages: new Set(issues.map((i) => i.sourcePage)).size,
	};
}

export function filterIssues(
	issues: LinkIssue[],
	issueType?: IssueType,
): LinkIssue[] {
	if (!issueType) {
		return issues;
	}
	return issues.filter((issue) => issue.issueType === issueType);
}

/**
 * Collate issues by the page they were found on. Pages are sorted, issues
 * keep their order within a page.
 */
export function groupByPage(issues: LinkIssue[]): Map<string, LinkIssue[]> {
	const pages = issues.reduce<Record<string, LinkIssue[]>>(
		(accumulator, current) => {
			accumulator[current.sourcePage] ||= [];
			accumulator[current.sourcePage].push(current);
			return accumulator;
		},
		{},
	);
	return new Map(
		Object.keys(pages)
			.sort()
			.map((page) => [page, pages[page]]),
	);
}

const csvHeader = [
	'Source Page',
	'Link URL',
	'Anchor Text',
	'Issue Type',
	'Status Code',
	'Redirect To',
	'Error',
];

// Quote a field only when it contains a comma, quote, or line break
function escapeCsvField(field: string): string {
	if (!field) return '';
	if (/[",\r\n]/.test(field)) {
		return `"${field.replace(/"/g, '""')}"`;
	}
	return field;
}

function formatStatus(issue: LinkIssue): string {
	return issue.statusCode ? issue.statusCode.toString() : 'N/A';
}

export function toCsv(issues: LinkIssue[]): string {
	const rows = issues.map((issue) =>
		[
			issue.sourcePage,
			issue.linkUrl,
			issue.anchorText,
			issue.issueType.toUpperCase(),
			formatStatus(issue),
			issue.redirectTarget ?? '',
			issue.errorMessage ?? '',
		]
			.map(escapeCsvField)
			.join(','),
	);
	return [csvHeader.join(','), ...rows].join('\n');
}

function formatIssue(issue: LinkIssue): string {
	let state = '';
	let detail = '';
	switch (issue.issueType) {
		case IssueType.BROKEN: {
			state = `[${chalk.red(formatStatus(issue))}]`;
			break;
		}

		case IssueType.REDIRECT: {
			state = `[${chalk.yellow(formatStatus(issue))}]`;
			if (issue.redirectTarget) {
				detail = ` → ${issue.redirectTarget}`;
			}
			break;
		}

		case IssueType.ERROR: {
			state = `[${chalk.magenta('ERR')}]`;
			if (issue.errorMessage) {
				detail = ` ${chalk.dim(`(${issue.errorMessage})`)}`;
			}
			break;
		}
	}
	return `  ${state} ${chalk.gray(issue.linkUrl)} "${issue.anchorText}"${detail}`;
}

/**
 * Render issues as a per-page breakdown followed by a summary line.
 */
export function formatText(issues: LinkIssue[]): string {
	const summary = summarize(issues);
	if (summary.total === 0) {
		return chalk.bold(`✓ No issues found.`);
	}

	const lines: string[] = [];
	for (const [page, pageIssues] of groupByPage(issues)) {
		lines.push(chalk.blue(`${page} (${pageIssues.length} issues)`));
		for (const issue of pageIssues) {
			lines.push(formatIssue(issue));
		}
	}
	lines.push(
		chalk.bold(
			`${chalk.red('ERROR')}: Found ${summary.total} problematic links across ${summary.pages} pages: ${summary.broken} broken, ${summary.redirect} redirects, ${summary.error} errors.`,
		),
	);
	return lines.join('\n');
}
