/**
 * Document Store Module
 *
 * Backend-agnostic storage, filtering and similarity search for documents
 * with optional embeddings.
 *
 * Features:
 * - PostgreSQL (pgvector), Azure AI Search and in-memory backends
 * - One filter language compiled to SQL or OData
 * - fail / skip / overwrite duplicate handling with all-or-nothing writes
 * - HNSW index lifecycle for the approximate search strategy
 *
 * @module document_store
 *
 * @example
 * ```typescript
 * import { createDocumentStore, DuplicatePolicy } from './document_store';
 *
 * const store = await createDocumentStore({ type: 'pgvector', embeddingDimension: 768 });
 *
 * await store.write(documents, DuplicatePolicy.OVERWRITE);
 *
 * const hits = await store.vectorSearch(queryEmbedding, {
 *   topK: 5,
 *   filters: { field: 'meta.category', operator: '==', value: 'news' },
 * });
 *
 * await store.close();
 * ```
 */

// Export types
export type { Document, DocumentBlob, MetadataValue, TabularPayload } from './document.js';
export type {
	DocumentStoreConfig,
	ResolvedDocumentStoreConfig,
	PgVectorStoreConfig,
	AzureAISearchStoreConfig,
	InMemoryStoreConfig,
	VectorSearchConfig,
	ApproximateIndexConfig,
	ErrorDetail,
} from './config.js';
export type {
	DocumentStoreBackend,
	BackendOptions,
	KeywordSearchRequest,
	VectorSearchRequest,
} from './backend/document-store-backend.js';
export type {
	KeywordSearchOptions,
	VectorSearchOptions,
	DocumentStoreInfo,
	SerializedDocumentStore,
} from './document-store.js';
export type { MetadataFieldKind, MetadataFieldMap } from './metadata-fields.js';

// Export error classes
export {
	DocumentStoreError,
	ConfigurationError,
	FilterSyntaxError,
	DuplicateDocumentError,
	InvalidArgumentError,
	InvalidDocumentError,
	VectorDimensionError,
} from './backend/types.js';

// Export the store and its factories
export { DocumentStore } from './document-store.js';
export {
	createDocumentStore,
	createDocumentStoreFromEnv,
	buildDocumentStore,
	type CreateDocumentStoreOptions,
} from './factory.js';

// Export building blocks
export { DocumentStoreSchema, parseStoreConfig } from './config.js';
export { Secret, resolveSecret, type SecretInput } from './secret.js';
export * from './filters/index.js';
export {
	VectorIndexManager,
	type ApproximateIndexDefinition,
	type IndexAction,
	type IndexState,
	type VectorIndexOperations,
} from './index-lifecycle.js';
export { prepareWriteBatch, planWrite, writtenCount, type WritePlan } from './write-pipeline.js';
export { cosineSimilarity, dotProduct, l2Distance, sortByMetric } from './similarity.js';

// Export constants
export {
	BACKEND_TYPES,
	DEFAULTS,
	DuplicatePolicy,
	SEARCH_STRATEGIES,
	SIMILARITY_METRICS,
	type BackendType,
	type SearchStrategy,
	type SimilarityMetric,
} from './constants.js';
export { METADATA_FIELD_KINDS } from './metadata-fields.js';
