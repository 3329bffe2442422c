import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
	collectUrls,
	exitCodeFor,
	limitPages,
	parseHeaders,
	parseIssueType,
	parseTimeout,
} from '../src/flags.js';
import { IssueType } from '../src/types.js';

const inputPath = path.resolve('test/fixtures/input/pages.txt');

describe('cli flags', () => {
	describe('collectUrls', () => {
		it('should read urls from a file and skip blank lines', async () => {
			const urls = await collectUrls([], inputPath);
			expect(urls).toEqual([
				'https://example.com/a',
				'https://example.com/b',
				'https://example.com/c',
			]);
		});

		it('should put positional urls before the file contents', async () => {
			const urls = await collectUrls([' https://example.com/first '], inputPath);
			expect(urls[0]).toBe('https://example.com/first');
			expect(urls).toHaveLength(4);
		});

		it('should fail when the input file is missing', async () => {
			await expect(
				collectUrls([], '/path/does/not/exist.txt'),
			).rejects.toThrow(/ENOENT/);
		});
	});

	describe('limitPages', () => {
		const urls = Array.from(
			{ length: 105 },
			(_, i) => `https://example.com/${i}`,
		);

		it('should keep the first 100 pages by default', () => {
			const limited = limitPages(urls);
			expect(limited.urls).toHaveLength(100);
			expect(limited.urls[99]).toBe('https://example.com/99');
			expect(limited.dropped).toBe(5);
		});

		it('should honour a custom limit', () => {
			expect(limitPages(urls.slice(0, 3), 2)).toEqual({
				urls: ['https://example.com/0', 'https://example.com/1'],
				dropped: 1,
			});
		});

		it('should drop nothing under the limit', () => {
			expect(limitPages(urls.slice(0, 3)).dropped).toBe(0);
		});

		it('should refuse a limit below one', () => {
			expect(() => limitPages(urls, 0)).toThrow(
				'Invalid flag: MAX-PAGES must be a positive integer.',
			);
		});
	});

	describe('parseTimeout', () => {
		it('should default to 10 seconds', () => {
			expect(parseTimeout(undefined)).toBe(10);
		});

		it('should accept the bounds', () => {
			expect(parseTimeout(5)).toBe(5);
			expect(parseTimeout(30)).toBe(30);
		});

		it.each([4, 31, Number.NaN])('should refuse %s', (timeout) => {
			expect(() => parseTimeout(timeout)).toThrow(
				'Invalid flag: TIMEOUT must be between 5 and 30 seconds.',
			);
		});
	});

	describe('parseIssueType', () => {
		it('should accept issue types in any case', () => {
			expect(parseIssueType('Broken')).toBe(IssueType.BROKEN);
			expect(parseIssueType('redirect')).toBe(IssueType.REDIRECT);
			expect(parseIssueType(undefined)).toBeUndefined();
		});

		it('should refuse unknown issue types', () => {
			expect(() => parseIssueType('slow')).toThrow(
				"Invalid flag: ISSUE-TYPE must be 'broken', 'redirect', or 'error'.",
			);
		});
	});

	describe('parseHeaders', () => {
		it('should split on the first colon', () => {
			expect(
				parseHeaders(['X-Team: docs', 'Referer:https://example.com/']),
			).toEqual({
				'X-Team': 'docs',
				Referer: 'https://example.com/',
			});
		});

		it('should refuse a header without a colon', () => {
			expect(() => parseHeaders(['X-Team docs'])).toThrow(
				'Invalid header format: "X-Team docs". Use "Header-Name:value" format.',
			);
		});

		it('should refuse an empty name or value', () => {
			expect(() => parseHeaders([':docs'])).toThrow(
				'Header name cannot be empty.',
			);
			expect(() => parseHeaders(['X-Team: '])).toThrow(
				'Header value cannot be empty.',
			);
		});
	});

	it('should exit 0 only when the run passed', () => {
		expect(exitCodeFor(true)).toBe(0);
		expect(exitCodeFor(false)).toBe(1);
	});
});
