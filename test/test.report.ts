import stripAnsi from 'strip-ansi';
import { describe, expect, it } from 'vitest';
import {
	filterIssues,
	formatText,
	groupByPage,
	summarize,
	toCsv,
} from '../src/report.js';
import { IssueType, type LinkIssue } from '../src/types.js';

const issues: LinkIssue[] = [
	{
		sourcePage: 'https://example.com/b',
		linkUrl: '/missing',
		anchorText: 'Missing',
		statusCode: 404,
		issueType: IssueType.BROKEN,
	},
	{
		sourcePage: 'https://example.com/a',
		linkUrl: '/old',
		anchorText: 'Old, "classic" page',
		statusCode: 301,
		issueType: IssueType.REDIRECT,
		redirectTarget: 'https://example.com/new',
	},
	{
		sourcePage: 'https://example.com/b',
		linkUrl: 'https://slow.example.com/',
		anchorText: '[No anchor text]',
		statusCode: 0,
		issueType: IssueType.ERROR,
		errorMessage: 'Timeout',
	},
];

describe('report', () => {
	it('should count issues by type and page', () => {
		expect(summarize(issues)).toEqual({
			total: 3,
			broken: 1,
			redirect: 1,
			error: 1,
			pages: 2,
		});
		expect(summarize([])).toEqual({
			total: 0,
			broken: 0,
			redirect: 0,
			error: 0,
			pages: 0,
		});
	});

	it('should filter by issue type', () => {
		expect(filterIssues(issues, IssueType.ERROR)).toEqual([issues[2]]);
		expect(filterIssues(issues)).toBe(issues);
	});

	it('should group by sorted page and keep issue order', () => {
		const grouped = groupByPage(issues);
		expect([...grouped.keys()]).toEqual([
			'https://example.com/a',
			'https://example.com/b',
		]);
		expect(grouped.get('https://example.com/b')).toEqual([
			issues[0],
			issues[2],
		]);
	});

	it('should write csv with escaping and N/A for missing statuses', () => {
		expect(toCsv(issues).split('\n')).toEqual([
			'Source Page,Link URL,Anchor Text,Issue Type,Status Code,Redirect To,Error',
			'https://example.com/b,/missing,Missing,BROKEN,404,,',
			'https://example.com/a,/old,"Old, ""classic"" page",REDIRECT,301,https://example.com/new,',
			'https://example.com/b,https://slow.example.com/,[No anchor text],ERROR,N/A,,Timeout',
		]);
	});

	it('should quote fields with a bare carriage return', () => {
		const issue: LinkIssue = {
			sourcePage: 'https://example.com/',
			linkUrl: '/gone',
			anchorText: 'Line one\rLine two',
			statusCode: 410,
			issueType: IssueType.BROKEN,
		};
		expect(toCsv([issue]).split('\n')[1]).toBe(
			'https://example.com/,/gone,"Line one\rLine two",BROKEN,410,,',
		);
	});

	it('should write only the header when there are no issues', () => {
		expect(toCsv([])).toBe(
			'Source Page,Link URL,Anchor Text,Issue Type,Status Code,Redirect To,Error',
		);
	});

	it('should render a per-page breakdown', () => {
		expect(stripAnsi(formatText(issues)).split('\n')).toEqual([
			'https://example.com/a (1 issues)',
			'  [301] /old "Old, "classic" page" → https://example.com/new',
			'https://example.com/b (2 issues)',
			'  [404] /missing "Missing"',
			'  [ERR] https://slow.example.com/ "[No anchor text]" (Timeout)',
			'ERROR: Found 3 problematic links across 2 pages: 1 broken, 1 redirects, 1 errors.',
		]);
	});

	it('should say so when there is nothing to report', () => {
		expect(stripAnsi(formatText([]))).toBe('✓ No issues found.');
	});
});
