import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env without overriding what the host already set
config({ override: false });

const booleanFlag = (fallback: boolean) =>
	z
		.enum(['true', 'false'])
		.optional()
		.transform(value => (value === undefined ? fallback : value === 'true'));

const optionalInt = z
	.string()
	.optional()
	.transform(value => (value ? parseInt(value, 10) : undefined))
	.pipe(z.number().int().positive().optional());

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	DOCSTORE_LOG_LEVEL: z.string().optional(),
	REDACT_SECRETS: booleanFlag(true),
	// PostgreSQL / pgvector
	PG_CONN_STR: z.string().optional(),
	// Azure AI Search
	AZURE_SEARCH_SERVICE_ENDPOINT: z.string().optional(),
	AZURE_SEARCH_API_KEY: z.string().optional(),
	// Store selection for createDocumentStoreFromEnv()
	DOCSTORE_BACKEND: z.enum(['pgvector', 'azure-ai-search', 'in-memory']).default('in-memory'),
	DOCSTORE_COLLECTION: z.string().default('documents'),
	DOCSTORE_EMBEDDING_DIMENSION: optionalInt,
});

export type Env = z.infer<typeof envSchema>;

const loggerEnvSchema = envSchema.pick({ DOCSTORE_LOG_LEVEL: true, REDACT_SECRETS: true });

export type LoggerEnv = z.infer<typeof loggerEnvSchema>;

function invalidEnvironment(error: z.ZodError): Error {
	return new Error(`Invalid environment: ${error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')}`);
}

/**
 * Reads the environment on every call so tests and long-running hosts
 * observe changes to process.env.
 */
export function getEnv(): Env {
	const parsed = envSchema.safeParse(process.env);
	if (!parsed.success) {
		throw invalidEnvironment(parsed.error);
	}
	return parsed.data;
}

/**
 * Only the variables a Logger reads at construction
 */
export function getLoggerEnv(): LoggerEnv {
	const parsed = loggerEnvSchema.safeParse(process.env);
	if (!parsed.success) {
		throw invalidEnvironment(parsed.error);
	}
	return parsed.data;
}
