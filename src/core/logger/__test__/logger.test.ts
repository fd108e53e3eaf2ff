import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, createLogger, redactSensitiveData } from '../index.js';

const originalLevel = process.env.DOCSTORE_LOG_LEVEL;
const originalRedact = process.env.REDACT_SECRETS;

beforeEach(() => {
	delete process.env.DOCSTORE_LOG_LEVEL;
	delete process.env.REDACT_SECRETS;
});

afterEach(() => {
	if (originalLevel === undefined) {
		delete process.env.DOCSTORE_LOG_LEVEL;
	} else {
		process.env.DOCSTORE_LOG_LEVEL = originalLevel;
	}
	if (originalRedact === undefined) {
		delete process.env.REDACT_SECRETS;
	} else {
		process.env.REDACT_SECRETS = originalRedact;
	}
});

describe('Logger Core Functionality', () => {
	describe('Logger Construction and Level Management', () => {
		it('creates logger with default info level', () => {
			const testLogger = new Logger({ silent: true });
			expect(testLogger.getLevel()).toBe('info');
		});

		it('respects DOCSTORE_LOG_LEVEL environment variable', () => {
			process.env.DOCSTORE_LOG_LEVEL = 'debug';
			const testLogger = new Logger({ silent: true });
			expect(testLogger.getLevel()).toBe('debug');
		});

		it('ignores invalid DOCSTORE_LOG_LEVEL and falls back to info', () => {
			process.env.DOCSTORE_LOG_LEVEL = 'invalid_level';
			const testLogger = new Logger({ silent: true });
			expect(testLogger.getLevel()).toBe('info');
		});

		it('prefers the level option over the environment', () => {
			process.env.DOCSTORE_LOG_LEVEL = 'debug';
			const testLogger = new Logger({ level: 'warn', silent: true });
			expect(testLogger.getLevel()).toBe('warn');
		});

		it('setLevel updates level correctly', () => {
			const testLogger = new Logger({ silent: true });
			testLogger.setLevel('error');
			expect(testLogger.getLevel()).toBe('error');
		});

		it('setLevel rejects invalid levels and keeps current level', () => {
			const testLogger = new Logger({ level: 'info', silent: true });
			testLogger.setLevel('invalid_level');
			expect(testLogger.getLevel()).toBe('info');
		});

		it('reports whether a level is enabled', () => {
			const testLogger = new Logger({ level: 'warn', silent: true });
			expect(testLogger.isLevelEnabled('error')).toBe(true);
			expect(testLogger.isLevelEnabled('debug')).toBe(false);
		});
	});

	describe('Instances are independent', () => {
		it('changing one logger level leaves another untouched', () => {
			const first = createLogger({ level: 'info', silent: true });
			const second = createLogger({ level: 'info', silent: true });
			first.setLevel('debug');
			expect(first.getLevel()).toBe('debug');
			expect(second.getLevel()).toBe('info');
		});
	});

	describe('Basic Logging Methods API', () => {
		it('all logging methods accept messages with and without metadata', () => {
			const testLogger = new Logger({ level: 'silly', silent: true });
			const logMethods = [
				testLogger.error.bind(testLogger),
				testLogger.warn.bind(testLogger),
				testLogger.info.bind(testLogger),
				testLogger.verbose.bind(testLogger),
				testLogger.debug.bind(testLogger),
				testLogger.silly.bind(testLogger),
			];

			logMethods.forEach(fn => {
				expect(() => fn('message')).not.toThrow();
				expect(() => fn('with meta', { test: true, nested: { value: 1 } })).not.toThrow();
			});
		});
	});
});

describe('Environment Scope', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('is not affected by invalid variables it does not read', () => {
		vi.stubEnv('DOCSTORE_EMBEDDING_DIMENSION', 'abc');

		const testLogger = new Logger({ level: 'silly', silent: true });

		expect(testLogger.getLevel()).toBe('silly');
		expect(() => testLogger.info('password=test-secret')).not.toThrow();
		expect(new Logger({ silent: true }).getLevel()).toBe('info');
	});

	it('reads REDACT_SECRETS once at construction', () => {
		process.env.REDACT_SECRETS = 'false';
		const testLogger = new Logger({ silent: true });
		process.env.REDACT_SECRETS = 'true';

		expect(testLogger.isRedactingSecrets()).toBe(false);
		expect(testLogger.createChild().isRedactingSecrets()).toBe(false);
		expect(new Logger({ silent: true }).isRedactingSecrets()).toBe(true);
		expect(new Logger({ silent: true, redactSecrets: false }).isRedactingSecrets()).toBe(false);
	});
});

describe('Child Logger Creation', () => {
	it('inherits the parent level unless overridden', () => {
		const parentLogger = new Logger({ level: 'debug', silent: true });

		const childLogger = parentLogger.createChild();
		expect(childLogger).toBeInstanceOf(Logger);
		expect(childLogger.getLevel()).toBe('debug');

		const customChildLogger = parentLogger.createChild({ level: 'error' });
		expect(customChildLogger.getLevel()).toBe('error');
	});
});

describe('Secret Redaction', () => {
	it('masks key/value style secrets', () => {
		expect(redactSensitiveData('connect password=test-secret host=db')).toBe(
			'connect password=***REDACTED*** host=db'
		);
	});

	it('masks quoted JSON style secrets', () => {
		expect(redactSensitiveData('{"apiKey":"test-secret","index":"docs"}')).toBe(
			'{"apiKey":"***REDACTED***","index":"docs"}'
		);
	});

	it('leaves messages untouched when disabled', () => {
		expect(redactSensitiveData('token: test-secret', false)).toBe('token: test-secret');
	});

	it('leaves messages without secrets untouched', () => {
		expect(redactSensitiveData('Created table documents')).toBe('Created table documents');
	});
});
