/**
 * Document Store Factory
 *
 * Factory functions that validate a configuration, load the matching backend
 * adapter on demand and return a ready-to-use store. Nothing connects until
 * the first operation.
 *
 * @module document_store/factory
 */

import { createLogger, type Logger } from '../logger/index.js';
import { getEnv } from '../env.js';
import type { DocumentStoreBackend } from './backend/document-store-backend.js';
import { parseStoreConfig, type DocumentStoreConfig, type ResolvedDocumentStoreConfig } from './config.js';
import { BACKEND_TYPES, LOG_PREFIXES } from './constants.js';
import { DocumentStore } from './document-store.js';

export interface CreateDocumentStoreOptions {
	/** Logger shared by the store and its adapter */
	logger?: Logger;
}

/**
 * Creates a document store
 *
 * @throws {ConfigurationError} If the configuration is invalid or credentials are missing
 *
 * @example
 * ```typescript
 * const store = await createDocumentStore({
 *   type: 'pgvector',
 *   tableName: 'articles',
 *   embeddingDimension: 768,
 *   vectorSearch: { metric: 'cosine_similarity', strategy: 'approximate', index: { m: 16, efSearch: 40 } },
 * });
 * ```
 */
export async function createDocumentStore(
	config: DocumentStoreConfig,
	options: CreateDocumentStoreOptions = {}
): Promise<DocumentStore> {
	return buildDocumentStore(parseStoreConfig(config), options);
}

/**
 * Creates a document store from an already validated configuration
 */
export async function buildDocumentStore(
	config: ResolvedDocumentStoreConfig,
	options: CreateDocumentStoreOptions = {}
): Promise<DocumentStore> {
	const logger = options.logger ?? createLogger({ level: config.logLevel });
	const backend = await createBackend(config, logger);
	logger.debug(`${LOG_PREFIXES.FACTORY} Created ${config.type} document store`, {
		embeddingDimension: config.embeddingDimension,
		strategy: config.vectorSearch.strategy,
	});
	return new DocumentStore(config, backend, logger);
}

/**
 * Creates a document store from environment variables
 *
 * Reads DOCSTORE_BACKEND, DOCSTORE_COLLECTION, DOCSTORE_EMBEDDING_DIMENSION and
 * DOCSTORE_LOG_LEVEL; credentials come from the backend's default variables.
 */
export async function createDocumentStoreFromEnv(options: CreateDocumentStoreOptions = {}): Promise<DocumentStore> {
	return createDocumentStore(configFromEnv(), options);
}

function configFromEnv(): DocumentStoreConfig {
	const env = getEnv();
	const shared = {
		embeddingDimension: env.DOCSTORE_EMBEDDING_DIMENSION,
		logLevel: env.DOCSTORE_LOG_LEVEL,
	};

	switch (env.DOCSTORE_BACKEND) {
		case BACKEND_TYPES.PGVECTOR:
			return { type: BACKEND_TYPES.PGVECTOR, tableName: env.DOCSTORE_COLLECTION, ...shared };
		case BACKEND_TYPES.AZURE_AI_SEARCH:
			return { type: BACKEND_TYPES.AZURE_AI_SEARCH, indexName: env.DOCSTORE_COLLECTION, ...shared };
		case BACKEND_TYPES.IN_MEMORY:
			return { type: BACKEND_TYPES.IN_MEMORY, collectionName: env.DOCSTORE_COLLECTION, ...shared };
	}
}

async function createBackend(config: ResolvedDocumentStoreConfig, logger: Logger): Promise<DocumentStoreBackend> {
	switch (config.type) {
		case BACKEND_TYPES.PGVECTOR: {
			const { PgVectorBackend } = await import('./backend/pgvector.js');
			return new PgVectorBackend(config, { logger });
		}
		case BACKEND_TYPES.AZURE_AI_SEARCH: {
			const { AzureAISearchBackend } = await import('./backend/azure-ai-search.js');
			return new AzureAISearchBackend(config, { logger });
		}
		case BACKEND_TYPES.IN_MEMORY: {
			const { InMemoryBackend } = await import('./backend/in-memory.js');
			return new InMemoryBackend(config, { logger });
		}
	}
}
