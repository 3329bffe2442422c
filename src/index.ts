import { EventEmitter } from 'node:events';
import process from 'node:process';
import { setTimeout as sleep } from 'node:timers/promises';
import { createIssue } from './classify.js';
import { getLinks } from './links.js';
import {
	type CheckOptions,
	type InternalCheckOptions,
	processOptions,
} from './options.js';
import { Queue } from './queue.js';
import { type HttpResponse, makeRequest } from './request.js';
import { checkStatus, describeFailure } from './status.js';
import { drainStream, toNodeReadable } from './stream-utils.js';
import type {
	CheckResult,
	ExtractionErrorInfo,
	ExtractionResult,
	LinkCheckInfo,
	LinkIssue,
	PageErrorInfo,
	PageReport,
	ProgressErrorInfo,
	ProgressInfo,
	StatusOutcome,
} from './types.js';

/**
 * Instance class used to perform a check run.
 */
export class LinkChecker extends EventEmitter {
	on(event: 'pagestart', listener: (url: string) => void): this;
	on(event: 'link', listener: (details: LinkCheckInfo) => void): this;
	on(
		event: 'extractionError',
		listener: (details: ExtractionErrorInfo) => void,
	): this;
	on(event: 'pageError', listener: (details: PageErrorInfo) => void): this;
	on(event: 'progress', listener: (details: ProgressInfo) => void): this;
	on(
		event: 'progressError',
		listener: (details: ProgressErrorInfo) => void,
	): this;
	// biome-ignore lint/suspicious/noExplicitAny: this can in fact be generic
	on(event: string | symbol, listener: (...arguments_: any[]) => void): this {
		return super.on(event, listener);
	}

	/**
	 * Check every link on the given pages and return the ones with problems.
	 * Pages are checked concurrently, so issues arrive grouped by page in the
	 * order the pages finished, not the order they were passed in.
	 * @param options_ Pages to check and how to check them
	 */
	async check(options_: CheckOptions): Promise<CheckResult> {
		const options = processOptions(options_);

		if (process.env.LINKSWEEP_DEBUG) {
			console.log(options);
		}

		const total = options.urls.length;
		const queue = new Queue({
			concurrency: Math.min(options.concurrency, total),
		});

		const issues: LinkIssue[] = [];
		const pages: PageReport[] = [];
		let completed = 0;

		for (const url of options.urls) {
			queue.add(async () => {
				const report = await this.runPage(url, options);

				// Only this callback touches the aggregate, one page at a time
				pages.push(report);
				issues.push(...report.issues);
				completed++;
				this.reportProgress(options, { completed, total, url });
			});
		}

		await queue.onIdle();

		return {
			passed: issues.length === 0,
			issues,
			pages,
		};
	}

	/**
	 * Check all links found on a single page, in the order they appear.
	 * @param pageUrl Page to fetch and scan
	 * @param options Processed options, see `processOptions`
	 */
	async checkPage(
		pageUrl: string,
		options: InternalCheckOptions,
	): Promise<PageReport> {
		this.emit('pagestart', pageUrl);

		const extraction = await this.extractLinks(pageUrl, options);
		if (!extraction.ok) {
			this.emit('extractionError', { url: pageUrl, reason: extraction.reason });
			return { url: pageUrl, linkCount: 0, issues: [], error: extraction.reason };
		}

		const issues: LinkIssue[] = [];
		for (const link of extraction.links) {
			const outcome: StatusOutcome =
				'error' in link
					? { statusCode: 0, failureReason: 'Invalid URL' }
					: await this.checkStatus(link.resolvedUrl, options);

			const issue = createIssue(pageUrl, link, outcome);
			if (issue) {
				issues.push(issue);
			}
			this.emit('link', { page: pageUrl, link, outcome, issue });

			// Be polite to the servers behind this page's links
			await sleep(options.linkDelay);
		}

		return { url: pageUrl, linkCount: extraction.links.length, issues };
	}

	/**
	 * Fetch a page and list the links it contains. Failing to fetch the page
	 * is reported in the result rather than thrown.
	 * @param pageUrl Page to fetch
	 * @param options Processed options, see `processOptions`
	 */
	async extractLinks(
		pageUrl: string,
		options: InternalCheckOptions,
	): Promise<ExtractionResult> {
		let response: HttpResponse;
		try {
			response = await makeRequest('GET', pageUrl, {
				headers: options.headers,
				timeout: options.requestTimeout,
				redirect: 'follow',
				allowInsecureCerts: options.allowInsecureCerts,
			});
		} catch (error) {
			return { ok: false, reason: describeFailure(error) };
		}

		if (response.status < 200 || response.status >= 300) {
			await drainStream(response.body);
			return { ok: false, reason: `HTTP ${response.status}` };
		}

		if (!response.body) {
			return { ok: true, links: [] };
		}

		try {
			const links = await getLinks(toNodeReadable(response.body), pageUrl);
			return { ok: true, links };
		} catch (error) {
			// The timeout also covers reading the body
			return { ok: false, reason: describeFailure(error) };
		}
	}

	/**
	 * Probe a single absolute URL.
	 * @param url URL to probe
	 * @param options Processed options, see `processOptions`
	 */
	async checkStatus(
		url: string,
		options: InternalCheckOptions,
	): Promise<StatusOutcome> {
		return checkStatus(url, {
			headers: options.headers,
			timeout: options.requestTimeout,
			allowInsecureCerts: options.allowInsecureCerts,
		});
	}

	// onProgress failures are reported through an event, never thrown
	private reportProgress(options: InternalCheckOptions, progress: ProgressInfo) {
		try {
			options.onProgress?.(progress.completed, progress.total, progress.url);
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			this.emit('progressError', { url: progress.url, error: failure });
		}
		this.emit('progress', progress);
	}

	private async runPage(
		url: string,
		options: InternalCheckOptions,
	): Promise<PageReport> {
		try {
			return await this.checkPage(url, options);
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			this.emit('pageError', { url, error: failure });
			return { url, linkCount: 0, issues: [], error: failure.message };
		}
	}
}

/**
 * Convenience method to perform a check run.
 * @param options CheckOptions to be passed on
 */
export async function check(options: CheckOptions) {
	const checker = new LinkChecker();
	const results = await checker.check(options);
	return results;
}

export { classify, createIssue, isRedirectStatus } from './classify.js';
export { getConfig } from './config.js';
export { getLinks, isNavigableHref, NO_ANCHOR_TEXT } from './links.js';
export {
	type CheckOptions,
	DEFAULT_USER_AGENT,
	type InternalCheckOptions,
	processOptions,
} from './options.js';
export {
	filterIssues,
	formatText,
	groupByPage,
	type IssueSummary,
	summarize,
	toCsv,
} from './report.js';
export { resetSharedAgents } from './request.js';
export { checkStatus, describeFailure } from './status.js';
export * from './types.js';
