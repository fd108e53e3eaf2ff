import { describe, it, expect } from 'vitest';
import { Secret, requireSecret, resolveSecret, serializeSecret } from '../secret.js';
import { ConfigurationError } from '../backend/types.js';

describe('Secret', () => {
	it('should resolve the first environment variable that is set', () => {
		const secret = Secret.fromEnvVar(['PRIMARY_CONN', 'FALLBACK_CONN']);

		expect(resolveSecret(secret, { FALLBACK_CONN: 'postgres://fallback' })).toBe('postgres://fallback');
		expect(resolveSecret(secret, { PRIMARY_CONN: 'postgres://primary', FALLBACK_CONN: 'x' })).toBe(
			'postgres://primary'
		);
	});

	it('should fail for a strict secret with nothing set', () => {
		expect(() => resolveSecret(Secret.fromEnvVar('MISSING_CONN'), {})).toThrow(
			'None of the following authentication environment variables are set: MISSING_CONN'
		);
	});

	it('should return undefined for a non-strict secret with nothing set', () => {
		expect(resolveSecret(Secret.fromEnvVar('MISSING_KEY', false), {})).toBeUndefined();
	});

	it('should make requireSecret fail even when the secret is not strict', () => {
		expect(() => requireSecret(Secret.fromEnvVar('MISSING_KEY', false), 'API key', {})).toThrow(
			ConfigurationError
		);
	});

	it('should return token values directly', () => {
		expect(resolveSecret(Secret.fromToken('test-secret'), {})).toBe('test-secret');
	});

	it('should serialize environment secrets as references', () => {
		expect(serializeSecret(Secret.fromEnvVar('PG_CONN_STR'))).toEqual({
			type: 'env_var',
			envVars: ['PG_CONN_STR'],
			strict: true,
		});
	});

	it('should refuse to serialize token secrets', () => {
		expect(() => serializeSecret(Secret.fromToken('test-secret'))).toThrow(
			'Cannot serialize token-based secrets. Use an environment variable secret instead.'
		);
	});
});
