#!/usr/bin/env node

import process from 'node:process';
import chalk from 'chalk';
import meow from 'meow';
import { getConfig } from './config.js';
import {
	collectUrls,
	DEFAULT_MAX_PAGES,
	exitCodeFor,
	limitPages,
	MAX_TIMEOUT,
	MIN_TIMEOUT,
	parseHeaders,
	parseIssueType,
	parseTimeout,
} from './flags.js';
import {
	type CheckOptions,
	type CheckResult,
	filterIssues,
	formatText,
	LinkChecker,
	resetSharedAgents,
	summarize,
	toCsv,
} from './index.js';
import { Format, Logger, parseFormat, parseVerbosity } from './logger.js';

const cli = meow(
	`
	Usage
		$ linksweep URL... [ --arguments ]

	Positional arguments

		URL
			The pages whose links should be checked. Only links found on these
			pages are checked; nothing is crawled recursively.

	Flags

		--input, -i
			Read page URLs from a file, one per line. Blank lines are ignored.

		--config
			Path to the config file to use. Looks for \`linksweep.config.json\` by default.

		--timeout
			Request timeout in seconds, between ${MIN_TIMEOUT} and ${MAX_TIMEOUT}. Defaults to 10.

		--concurrency
			The number of pages to check simultaneously. Defaults to 5.

		--delay
			Pause after each link check on a page, in milliseconds. Defaults to 100.

		--max-pages
			Check at most this many pages; extra URLs are dropped. Defaults to ${DEFAULT_MAX_PAGES}.

		--issue-type
			Only report one kind of issue: 'broken', 'redirect', or 'error'.

		--format, -f
			Return the data in CSV or JSON format.

		--header, -h
			List of additional headers to be include in the request. use key:value notation.

		--user-agent
			The user agent passed in all HTTP requests. Defaults to a desktop Chrome user agent.

		--allow-insecure-certs
			Allow invalid or self-signed SSL certificates. Defaults to false.

		--verbosity
			Override the default verbosity for this command. Available options are
			'debug', 'info', 'warning', 'error', and 'none'.  Defaults to 'warning'.

		--silent
			Only show issues and errors.

		--help
			Show this command.

		--version
			Show the version number.

	Examples
		$ linksweep https://example.com/
		$ linksweep https://example.com/a https://example.com/b --timeout 20
		$ linksweep --input pages.txt --format CSV > issues.csv
		$ linksweep --input pages.txt --issue-type broken
`,
	{
		importMeta: import.meta,
		flags: {
			config: { type: 'string' },
			input: { type: 'string', shortFlag: 'i' },
			concurrency: { type: 'number' },
			timeout: { type: 'number' },
			delay: { type: 'number' },
			maxPages: { type: 'number' },
			issueType: {
				type: 'string',
				choices: ['broken', 'redirect', 'error'],
			},
			format: { type: 'string', shortFlag: 'f' },
			silent: { type: 'boolean' },
			verbosity: { type: 'string' },
			userAgent: { type: 'string' },
			header: { type: 'string', shortFlag: 'h', isMultiple: true },
			allowInsecureCerts: { type: 'boolean' },
		},
		booleanDefault: undefined,
	},
);

async function main() {
	if (cli.input.length === 0 && !cli.flags.input) {
		cli.showHelp();
		return;
	}

	const flags = await getConfig(cli.flags);
	const start = Date.now();
	const verbosity = parseVerbosity(flags);
	const format = parseFormat(flags);
	const logger = new Logger(verbosity, format);
	const issueType = parseIssueType(flags.issueType);
	const timeout = parseTimeout(flags.timeout);
	const headers = parseHeaders(flags.header ?? []);

	const collected = await collectUrls(cli.input, flags.input);
	if (collected.length === 0) {
		throw new Error('Please provide at least one URL to check.');
	}

	const { urls, dropped } = limitPages(collected, flags.maxPages);
	if (dropped > 0) {
		logger.warn(
			chalk.yellow(
				`Too many URLs (${collected.length}). Only checking the first ${urls.length}.`,
			),
		);
	}

	logger.error(`→ checking ${urls.length} page(s) for broken links`);

	const checker = new LinkChecker();
	checker.on('extractionError', ({ url, reason }) => {
		logger.warn(
			`${chalk.yellow('[SKIP]')} ${chalk.gray(url)} ${chalk.dim(`(could not load page: ${reason})`)}`,
		);
	});
	checker.on('pageError', ({ url, error }) => {
		logger.error(`${chalk.red('[FAIL]')} ${chalk.gray(url)}: ${error.message}`);
	});
	checker.on('progressError', ({ url, error }) => {
		logger.warn(`Progress update for ${url} failed: ${error.message}`);
	});
	checker.on('link', ({ link, outcome }) => {
		const status = outcome.failureReason ?? outcome.statusCode.toString();
		logger.debug(`  [${status}] ${link.originalHref}`);
	});

	const options: CheckOptions = {
		urls,
		timeout,
		concurrency: flags.concurrency,
		linkDelay: flags.delay,
		userAgent: flags.userAgent,
		headers,
		allowInsecureCerts: flags.allowInsecureCerts,
		onProgress(completed, total, url) {
			logger.info(`Checked ${completed}/${total} pages... (${url.slice(0, 60)})`);
		},
	};

	let result: CheckResult;
	try {
		result = await checker.check(options);
	} finally {
		await resetSharedAgents();
	}
	const issues = filterIssues(result.issues, issueType);
	const passed = issues.length === 0;

	if (format === Format.JSON) {
		console.log(
			JSON.stringify(
				{ passed, summary: summarize(issues), issues, pages: result.pages },
				null,
				2,
			),
		);
	} else if (format === Format.CSV) {
		console.log(toCsv(issues));
	} else {
		logger.error(formatText(issues));
		const total = (Date.now() - start) / 1000;
		logger.error(
			`Checked ${chalk.yellow(result.pages.length.toString())} pages in ${chalk.cyan(total.toString())} seconds.`,
		);
	}
	gracefulExit(exitCodeFor(passed));
}

/**
 * Exit the process gracefully with a timeout fallback.
 * This allows Node.js a brief moment to clean up resources (like closing
 * connection pools) but forces exit after 100ms to prevent hanging.
 */
function gracefulExit(code: number): void {
	process.exitCode = code;
	const exitTimer = setTimeout(() => {
		process.exit(code);
	}, 100);
	exitTimer.unref();
}

try {
	await main();
} catch (error) {
	console.error(error instanceof Error ? error.message : error);
	gracefulExit(1);
}
