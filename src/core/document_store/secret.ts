/**
 * Deferred credentials
 *
 * Connection strings, endpoints and API keys are configured as secrets that
 * resolve to concrete strings only when a connection is opened. Environment
 * variable secrets serialize as references; token secrets never serialize.
 *
 * @module document_store/secret
 */

import { z } from 'zod';
import { ConfigurationError } from './backend/types.js';

const EnvVarSecretSchema = z
	.object({
		type: z.literal('env_var'),
		envVars: z.array(z.string().min(1)).min(1),
		strict: z.boolean().default(true),
	})
	.strict();

const TokenSecretSchema = z
	.object({
		type: z.literal('token'),
		token: z.string().min(1),
	})
	.strict();

export const SecretSchema = z.discriminatedUnion('type', [EnvVarSecretSchema, TokenSecretSchema]);

export type Secret = z.output<typeof SecretSchema>;
export type SecretInput = z.input<typeof SecretSchema>;

export const Secret = {
	/**
	 * Reads the first of `envVars` that is set. A strict secret with none set
	 * fails on resolve.
	 */
	fromEnvVar(envVars: string | string[], strict: boolean = true): Secret {
		return { type: 'env_var', envVars: Array.isArray(envVars) ? envVars : [envVars], strict };
	},

	fromToken(token: string): Secret {
		return { type: 'token', token };
	},
};

/**
 * @returns The concrete value, or undefined for a non-strict env secret with nothing set
 * @throws {ConfigurationError} For a strict env secret with nothing set
 */
export function resolveSecret(secret: Secret, env: NodeJS.ProcessEnv = process.env): string | undefined {
	if (secret.type === 'token') {
		return secret.token;
	}
	for (const name of secret.envVars) {
		const value = env[name];
		if (value) {
			return value;
		}
	}
	if (secret.strict) {
		throw new ConfigurationError(
			`None of the following authentication environment variables are set: ${secret.envVars.join(', ')}`,
			secret.envVars
		);
	}
	return undefined;
}

/**
 * Like resolveSecret, but a missing value is always a ConfigurationError.
 */
export function requireSecret(secret: Secret, what: string, env: NodeJS.ProcessEnv = process.env): string {
	const value = resolveSecret(secret, env);
	if (!value) {
		throw new ConfigurationError(`Missing ${what}. Provide it directly or through the environment.`, [what]);
	}
	return value;
}

/**
 * Serializable form of a secret
 *
 * @throws {ConfigurationError} For token secrets, which would leak the credential
 */
export function serializeSecret(secret: Secret): Secret {
	if (secret.type === 'token') {
		throw new ConfigurationError(
			'Cannot serialize token-based secrets. Use an environment variable secret instead.'
		);
	}
	return { type: 'env_var', envVars: [...secret.envVars], strict: secret.strict };
}
