/**
 * Document Store Configuration Module
 *
 * Zod schemas for every backend. Configuration is validated once, at store
 * construction; the parsed (defaulted) form is what adapters receive.
 *
 * Supported backends:
 * - pgvector: PostgreSQL with the pgvector extension
 * - azure-ai-search: Azure AI Search index
 * - in-memory: process-local storage for development and tests
 *
 * @module document_store/config
 */

import { z } from 'zod';
import {
	AZURE_HNSW_LIMITS,
	DEFAULTS,
	DuplicatePolicy,
	HNSW_LIMITS,
	SEARCH_STRATEGIES,
	SIMILARITY_METRICS,
	ERROR_MESSAGES,
} from './constants.js';
import { METADATA_FIELD_KINDS } from './metadata-fields.js';
import { SecretSchema } from './secret.js';
import { ConfigurationError } from './backend/types.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const IdentifierSchema = z
	.string()
	.regex(IDENTIFIER, 'must start with a letter or underscore and contain only letters, digits and underscores');

/**
 * Approximate (HNSW) index options
 */
const ApproximateIndexSchema = z
	.object({
		/** Index identity */
		name: IdentifierSchema.default(DEFAULTS.APPROXIMATE_INDEX_NAME),

		/** Drop and rebuild the index when it already exists */
		recreateIfExists: z.boolean().default(false),

		/** Graph degree */
		m: z.number().int().min(HNSW_LIMITS.MIN_M).max(HNSW_LIMITS.MAX_M).optional(),

		/** Build-time search breadth */
		efConstruction: z
			.number()
			.int()
			.min(HNSW_LIMITS.MIN_EF_CONSTRUCTION)
			.max(HNSW_LIMITS.MAX_EF_CONSTRUCTION)
			.optional(),

		/** Query-time search breadth, applied per session before similarity queries */
		efSearch: z
			.number()
			.int()
			.min(HNSW_LIMITS.MIN_EF_SEARCH)
			.max(HNSW_LIMITS.MAX_EF_SEARCH)
			.optional(),
	})
	.strict();

export type ApproximateIndexConfig = z.output<typeof ApproximateIndexSchema>;

export type VectorSearchConfig =
	| { metric: SimilarityMetricOption; strategy: 'exact' }
	| { metric: SimilarityMetricOption; strategy: 'approximate'; index: ApproximateIndexConfig };

const MetricSchema = z.enum([
	SIMILARITY_METRICS.COSINE,
	SIMILARITY_METRICS.INNER_PRODUCT,
	SIMILARITY_METRICS.L2,
]);

type SimilarityMetricOption = z.output<typeof MetricSchema>;

const VectorSearchSchema = z
	.object({
		metric: MetricSchema.default(DEFAULTS.METRIC),
		strategy: z.enum([SEARCH_STRATEGIES.EXACT, SEARCH_STRATEGIES.APPROXIMATE]).default(DEFAULTS.STRATEGY),
		index: ApproximateIndexSchema.optional(),
	})
	.strict()
	.superRefine((data, ctx) => {
		if (data.strategy === SEARCH_STRATEGIES.EXACT && data.index) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "Index options apply only to the 'approximate' strategy",
				path: ['index'],
			});
		}
	})
	.transform((data): VectorSearchConfig => {
		if (data.strategy === SEARCH_STRATEGIES.APPROXIMATE) {
			return {
				metric: data.metric,
				strategy: 'approximate',
				index: data.index ?? ApproximateIndexSchema.parse({}),
			};
		}
		return { metric: data.metric, strategy: 'exact' };
	});

/**
 * Base Document Store Configuration Schema
 *
 * Options shared by every backend.
 */
const BaseStoreSchema = z.object({
	/** Length of every stored embedding. Changing it requires recreating storage. */
	embeddingDimension: z
		.number()
		.int()
		.positive()
		.default(DEFAULTS.EMBEDDING_DIMENSION)
		.describe('Embedding dimension'),

	/** Similarity metric and search strategy */
	vectorSearch: VectorSearchSchema.default({}),

	/** Declared metadata fields, name -> kind */
	metadataFields: z
		.record(
			IdentifierSchema,
			z.enum(METADATA_FIELD_KINDS, {
				errorMap: () => ({
					message: `Unsupported metadata field type. Expected one of: ${METADATA_FIELD_KINDS.join(', ')}`,
				}),
			})
		)
		.default({}),

	/** Create the backing table/index on first access when it does not exist */
	createIfMissing: z.boolean().default(true),

	/** Policy used when write() is called without one */
	duplicatePolicy: z
		.enum([DuplicatePolicy.FAIL, DuplicatePolicy.SKIP, DuplicatePolicy.OVERWRITE])
		.default(DEFAULTS.DUPLICATE_POLICY),

	/** Log level for this store's logger */
	logLevel: z.string().optional(),

	/** 'debug' appends native backend error text to thrown messages */
	errorDetail: z.enum(['redacted', 'debug']).default('redacted'),
});

export type ErrorDetail = z.output<typeof BaseStoreSchema>['errorDetail'];

/**
 * PgVector Store Configuration
 *
 * @example
 * ```typescript
 * const config: DocumentStoreConfig = {
 *   type: 'pgvector',
 *   connectionString: Secret.fromEnvVar('PG_CONN_STR'),
 *   tableName: 'documents',
 *   embeddingDimension: 768,
 *   vectorSearch: { metric: 'cosine_similarity', strategy: 'approximate', index: { m: 16 } },
 * };
 * ```
 */
const PgVectorStoreSchema = BaseStoreSchema.extend({
	type: z.literal('pgvector'),

	/** PostgreSQL connection string (URI or keyword/value form) */
	connectionString: SecretSchema.default({ type: 'env_var', envVars: [DEFAULTS.PG_CONN_ENV] }),

	/** Schema the table lives in; must already exist */
	schemaName: IdentifierSchema.default(DEFAULTS.PG_SCHEMA),

	tableName: IdentifierSchema.default(DEFAULTS.PG_TABLE),

	/** Full-text search configuration used for keyword retrieval */
	language: z
		.string()
		.regex(/^[a-z_]+$/, 'must be a text search configuration name')
		.default(DEFAULTS.PG_LANGUAGE),

	keywordIndexName: IdentifierSchema.default(DEFAULTS.PG_KEYWORD_INDEX),

	/** Drop the table during initialization */
	recreateTable: z.boolean().default(false),
}).strict();

/**
 * Azure AI Search Store Configuration
 *
 * @example
 * ```typescript
 * const config: DocumentStoreConfig = {
 *   type: 'azure-ai-search',
 *   indexName: 'articles',
 *   embeddingDimension: 768,
 *   metadataFields: { category: 'text', year: 'integer' },
 * };
 * ```
 */
const AzureAISearchStoreSchema = BaseStoreSchema.extend({
	type: z.literal('azure-ai-search'),

	/** Search service URL */
	endpoint: SecretSchema.default({
		type: 'env_var',
		envVars: [DEFAULTS.AZURE_ENDPOINT_ENV],
		strict: false,
	}),

	/** Admin API key */
	apiKey: SecretSchema.default({ type: 'env_var', envVars: [DEFAULTS.AZURE_API_KEY_ENV], strict: false }),

	/** Lowercase letters, digits and dashes */
	indexName: z
		.string()
		.regex(/^[a-z0-9][a-z0-9-]*$/, 'must contain only lowercase letters, digits and dashes')
		.max(128)
		.default(DEFAULTS.AZURE_INDEX),

	/** Search REST API version override */
	apiVersion: z.string().optional(),
}).strict();

/**
 * In-Memory Store Configuration
 */
const InMemoryStoreSchema = BaseStoreSchema.extend({
	type: z.literal('in-memory'),
	collectionName: z.string().min(1).default(DEFAULTS.MEMORY_COLLECTION),
}).strict();

const RESERVED_AZURE_FIELDS = ['id', 'content', 'embedding'];

/**
 * Discriminated union of all supported store configurations
 */
export const DocumentStoreSchema = z
	.discriminatedUnion('type', [PgVectorStoreSchema, AzureAISearchStoreSchema, InMemoryStoreSchema], {
		errorMap: (issue, ctx) => {
			if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
				return {
					message: `Invalid backend type. Expected 'pgvector', 'azure-ai-search' or 'in-memory'.`,
				};
			}
			return { message: ctx.defaultError };
		},
	})
	.superRefine((data, ctx) => {
		if (data.type === 'azure-ai-search') {
			if (data.vectorSearch.strategy === SEARCH_STRATEGIES.APPROXIMATE) {
				const { index } = data.vectorSearch;
				if (index.recreateIfExists) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						message: 'Azure AI Search cannot rebuild its vector index without deleting the stored documents',
						path: ['vectorSearch', 'index', 'recreateIfExists'],
					});
				}
				for (const option of ['m', 'efConstruction', 'efSearch'] as const) {
					const value = index[option];
					const { min, max } = AZURE_HNSW_LIMITS[option];
					if (value !== undefined && (value < min || value > max)) {
						ctx.addIssue({
							code: z.ZodIssueCode.custom,
							message: `Azure AI Search accepts ${min} to ${max}`,
							path: ['vectorSearch', 'index', option],
						});
					}
				}
			}
			for (const name of Object.keys(data.metadataFields)) {
				if (RESERVED_AZURE_FIELDS.includes(name)) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						message: `Metadata field '${name}' collides with a built-in index field`,
						path: ['metadataFields', name],
					});
				}
			}
		}
	});

/** What callers pass in */
export type DocumentStoreConfig = z.input<typeof DocumentStoreSchema>;

/** What adapters receive */
export type ResolvedDocumentStoreConfig = z.output<typeof DocumentStoreSchema>;

export type PgVectorStoreConfig = Extract<ResolvedDocumentStoreConfig, { type: 'pgvector' }>;
export type AzureAISearchStoreConfig = Extract<ResolvedDocumentStoreConfig, { type: 'azure-ai-search' }>;
export type InMemoryStoreConfig = Extract<ResolvedDocumentStoreConfig, { type: 'in-memory' }>;

/**
 * Validates and defaults a store configuration
 *
 * @throws {ConfigurationError} Listing every `path: message` issue
 */
export function parseStoreConfig(config: unknown): ResolvedDocumentStoreConfig {
	const result = DocumentStoreSchema.safeParse(config);
	if (!result.success) {
		const issues = result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
		throw new ConfigurationError(`${ERROR_MESSAGES.INVALID_CONFIG}: ${issues.join(', ')}`, issues, result.error);
	}
	return result.data;
}
