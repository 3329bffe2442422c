import { afterEach, describe, expect, it, vi } from 'vitest';
import {
	Format,
	Logger,
	LogLevel,
	parseFormat,
	parseVerbosity,
} from '../src/logger.js';

describe('logger', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should only print messages at or above its level', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {});
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const logger = new Logger(LogLevel.WARNING, Format.TEXT);
		logger.info('hidden');
		logger.warn('shown');
		expect(info).not.toHaveBeenCalled();
		expect(log).toHaveBeenCalledWith('shown');
	});

	it('should stay quiet for machine formats', () => {
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		const logger = new Logger(LogLevel.DEBUG, Format.CSV);
		logger.error('not in the csv');
		expect(error).not.toHaveBeenCalled();
	});

	describe('parseVerbosity', () => {
		it('should default to warning', () => {
			expect(parseVerbosity({})).toBe(LogLevel.WARNING);
		});

		it('should map silent to error', () => {
			expect(parseVerbosity({ silent: true })).toBe(LogLevel.ERROR);
		});

		it('should accept names in any case', () => {
			expect(parseVerbosity({ verbosity: 'debug' })).toBe(LogLevel.DEBUG);
			expect(parseVerbosity({ verbosity: 'None' })).toBe(LogLevel.NONE);
		});

		it('should refuse unknown names', () => {
			expect(() => parseVerbosity({ verbosity: 'loud' })).toThrow(
				'Invalid flag: VERBOSITY must be one of [DEBUG,INFO,WARNING,ERROR,NONE]',
			);
		});

		it('should refuse silent together with verbosity', () => {
			expect(() => parseVerbosity({ silent: true, verbosity: 'info' })).toThrow(
				/cannot both be defined/,
			);
		});
	});

	describe('parseFormat', () => {
		it('should default to text', () => {
			expect(parseFormat({})).toBe(Format.TEXT);
		});

		it('should accept names in any case', () => {
			expect(parseFormat({ format: 'csv' })).toBe(Format.CSV);
			expect(parseFormat({ format: 'JSON' })).toBe(Format.JSON);
		});

		it('should refuse unknown formats', () => {
			expect(() => parseFormat({ format: 'xml' })).toThrow(
				"Invalid flag: FORMAT must be 'TEXT', 'JSON', or 'CSV'.",
			);
		});
	});
});
