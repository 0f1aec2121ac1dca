import { describe, it, expect } from 'vitest';
import { createLogger, createLoggerOptions, createSilentLogger } from '../index.js';

describe('createLoggerOptions', () => {
	it('sets the service name and extra base context', () => {
		const options = createLoggerOptions({ level: 'debug', serviceName: 'template-sync', base: { region: 'eu' } });

		expect(options.level).toBe('debug');
		expect(options.base).toEqual({ service: 'template-sync', region: 'eu' });
		expect(options.transport).toBeUndefined();
	});

	it('adds the pino-pretty transport when pretty output is requested', () => {
		const options = createLoggerOptions({ level: 'info', serviceName: 'template-sync', pretty: true });

		expect(options.transport).toEqual({
			target: 'pino-pretty',
			options: {
				colorize: true,
				translateTime: 'SYS:standard',
				ignore: 'pid,hostname',
			},
		});
	});

	it('formats the level as its label', () => {
		const options = createLoggerOptions({ level: 'info', serviceName: 'template-sync' });

		expect(options.formatters?.level?.('warn', 40)).toEqual({ level: 'warn' });
	});
});

describe('createLogger', () => {
	it('creates a logger at the configured level', () => {
		const logger = createLogger({ level: 'warn', serviceName: 'template-sync' });
		expect(logger.level).toBe('warn');
	});

	it('creates a silent logger', () => {
		expect(createSilentLogger().level).toBe('silent');
	});
});
