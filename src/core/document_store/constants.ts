/**
 * Document Store Module Constants
 *
 * Central location for log prefixes, error messages and configuration defaults.
 *
 * @module document_store/constants
 */

/**
 * Log prefixes for consistent logging across the document store module
 */
export const LOG_PREFIXES = {
	STORE: '[DocumentStore]',
	FACTORY: '[DocumentStore:Factory]',
	WRITE: '[DocumentStore:Write]',
	INDEX: '[DocumentStore:Index]',
	PGVECTOR: '[DocumentStore:PgVector]',
	AZURE: '[DocumentStore:AzureAISearch]',
	MEMORY: '[DocumentStore:Memory]',
} as const;

/**
 * Error messages for the document store module
 */
export const ERROR_MESSAGES = {
	// Connection errors
	CONNECTION_FAILED: 'Failed to connect to the document store backend',
	NOT_CONNECTED: 'Document store is not connected',

	// Schema and index errors
	SCHEMA_INIT_FAILED: 'Could not initialize the document store schema',
	STORAGE_MISSING: 'The backing table or index does not exist and createIfMissing is disabled',
	INDEX_CHECK_FAILED: 'Could not check whether the vector index exists',
	INDEX_BUILD_FAILED: 'Could not build the vector index',
	INDEX_DROP_FAILED: 'Could not drop the vector index',
	RECREATE_UNSUPPORTED: 'This backend cannot rebuild its vector index without deleting the stored documents',
	DROP_STORAGE_FAILED: 'Could not delete the document store table or index',

	// Operation errors
	COUNT_FAILED: 'Could not count documents',
	WRITE_FAILED: 'Could not write documents',
	FILTER_FAILED: 'Could not filter documents',
	DELETE_FAILED: 'Could not delete documents',
	SEARCH_FAILED: 'Could not retrieve documents',
	DUPLICATE_DOCUMENT: 'A document with the same id already exists',

	// Argument errors
	EMPTY_QUERY: 'query must be a non-empty string',
	EMPTY_EMBEDDING: 'queryEmbedding must be a non-empty array of numbers',
	INVALID_TOP_K: 'topK must be a positive integer',

	// Configuration errors
	INVALID_CONFIG: 'Invalid document store configuration',
} as const;

/**
 * Backend type identifiers
 */
export const BACKEND_TYPES = {
	PGVECTOR: 'pgvector',
	AZURE_AI_SEARCH: 'azure-ai-search',
	IN_MEMORY: 'in-memory',
} as const;

export type BackendType = (typeof BACKEND_TYPES)[keyof typeof BACKEND_TYPES];

/**
 * Similarity metrics
 *
 * cosine_similarity and inner_product are similarities (higher is better);
 * l2_distance is a distance (lower is better).
 */
export const SIMILARITY_METRICS = {
	COSINE: 'cosine_similarity',
	INNER_PRODUCT: 'inner_product',
	L2: 'l2_distance',
} as const;

export type SimilarityMetric = (typeof SIMILARITY_METRICS)[keyof typeof SIMILARITY_METRICS];

export const SEARCH_STRATEGIES = {
	EXACT: 'exact',
	APPROXIMATE: 'approximate',
} as const;

export type SearchStrategy = (typeof SEARCH_STRATEGIES)[keyof typeof SEARCH_STRATEGIES];

/**
 * Duplicate handling for a single write call. Never persisted.
 */
export const DuplicatePolicy = {
	FAIL: 'fail',
	SKIP: 'skip',
	OVERWRITE: 'overwrite',
} as const;

export type DuplicatePolicy = (typeof DuplicatePolicy)[keyof typeof DuplicatePolicy];

/**
 * Default configuration values
 */
export const DEFAULTS = {
	EMBEDDING_DIMENSION: 768,
	TOP_K: 10,
	METRIC: SIMILARITY_METRICS.COSINE,
	STRATEGY: SEARCH_STRATEGIES.EXACT,
	DUPLICATE_POLICY: DuplicatePolicy.FAIL,
	APPROXIMATE_INDEX_NAME: 'document_store_hnsw_index',

	// PGVector defaults
	PG_CONN_ENV: 'PG_CONN_STR',
	PG_SCHEMA: 'public',
	PG_TABLE: 'documents',
	PG_LANGUAGE: 'english',
	PG_KEYWORD_INDEX: 'document_store_keyword_index',
	PG_INSERT_CHUNK: 1000,

	// Azure AI Search defaults
	AZURE_ENDPOINT_ENV: 'AZURE_SEARCH_SERVICE_ENDPOINT',
	AZURE_API_KEY_ENV: 'AZURE_SEARCH_API_KEY',
	AZURE_INDEX: 'default',
	AZURE_VECTOR_PROFILE: 'default-vector-config',
	AZURE_UPLOAD_BATCH: 1000,
	AZURE_EMPTY_EMBEDDING_VALUE: -10.0,

	// In-memory defaults
	MEMORY_COLLECTION: 'documents',
} as const;

/**
 * HNSW parameter bounds shared by all backends
 */
export const HNSW_LIMITS = {
	MIN_M: 2,
	MAX_M: 100,
	MIN_EF_CONSTRUCTION: 4,
	MAX_EF_CONSTRUCTION: 1000,
	MIN_EF_SEARCH: 1,
	MAX_EF_SEARCH: 1000,
} as const;

/**
 * Narrower bounds Azure AI Search enforces on its HNSW parameters
 */
export const AZURE_HNSW_LIMITS = {
	m: { min: 4, max: 10 },
	efConstruction: { min: 100, max: 1000 },
	efSearch: { min: 100, max: 1000 },
} as const;
