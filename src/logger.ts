export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARNING = 2,
	ERROR = 3,
	NONE = 4,
}

export enum Format {
	TEXT = 0,
	JSON = 1,
	CSV = 2,
}

/**
 * Human-readable output. Only TEXT runs log anything: JSON and CSV runs
 * print their data on stdout and nothing else.
 */
export class Logger {
	public level: LogLevel;
	public format: Format;

	constructor(level: LogLevel, format: Format) {
		this.level = level;
		this.format = format;
	}

	debug(message?: string) {
		if (this.level <= LogLevel.DEBUG && this.format === Format.TEXT) {
			console.debug(message);
		}
	}

	info(message?: string) {
		if (this.level <= LogLevel.INFO && this.format === Format.TEXT) {
			console.info(message);
		}
	}

	warn(message?: string) {
		if (this.level <= LogLevel.WARNING && this.format === Format.TEXT) {
			// note: this is `console.log` on purpose.  `console.warn` maps to
			// `console.error`, which would print these messages to stderr.
			console.log(message);
		}
	}

	error(message?: string) {
		if (this.level <= LogLevel.ERROR && this.format === Format.TEXT) {
			console.error(message);
		}
	}
}

const levelNames = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'NONE'] as const;
const formatNames = ['TEXT', 'JSON', 'CSV'] as const;

function isLevelName(value: string): value is (typeof levelNames)[number] {
	return levelNames.some((name) => name === value);
}

function isFormatName(value: string): value is (typeof formatNames)[number] {
	return formatNames.some((name) => name === value);
}

export function parseVerbosity(flags: {
	silent?: boolean;
	verbosity?: string;
}): LogLevel {
	if (flags.silent && flags.verbosity) {
		throw new Error(
			'The SILENT and VERBOSITY flags cannot both be defined. Please consider using VERBOSITY only.',
		);
	}

	if (flags.silent) {
		return LogLevel.ERROR;
	}

	if (!flags.verbosity) {
		return LogLevel.WARNING;
	}

	const verbosity = flags.verbosity.toUpperCase();
	if (!isLevelName(verbosity)) {
		throw new Error(
			`Invalid flag: VERBOSITY must be one of [${levelNames.join(',')}]`,
		);
	}

	return LogLevel[verbosity];
}

export function parseFormat(flags: { format?: string }): Format {
	if (!flags.format) {
		return Format.TEXT;
	}

	const format = flags.format.toUpperCase();
	if (!isFormatName(format)) {
		throw new Error("Invalid flag: FORMAT must be 'TEXT', 'JSON', or 'CSV'.");
	}

	return Format[format];
}
