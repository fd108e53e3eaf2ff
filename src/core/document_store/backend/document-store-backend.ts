/**
 * Document Store Backend Interface
 *
 * Defines the contract each storage engine implements. The orchestrator
 * validates arguments, parses filters and prepares write batches before any
 * of these methods is called, so adapters receive well-formed input only.
 *
 * Implementations:
 * - PgVector: PostgreSQL table with a vector column
 * - Azure AI Search: managed search index
 * - In-Memory: process-local maps for development and tests
 *
 * @module document_store/backend/document-store-backend
 */

import type { BackendType, DuplicatePolicy, SimilarityMetric } from '../constants.js';
import type { Document } from '../document.js';
import type { FilterExpression } from '../filters/index.js';
import type { IndexState } from '../index-lifecycle.js';
import type { Logger } from '../../logger/index.js';

/**
 * Collaborators an adapter may be handed at construction
 */
export interface BackendOptions {
	/** Shared with the owning store; adapters create their own when absent */
	logger?: Logger;
}

export interface KeywordSearchRequest {
	query: string;
	filter?: FilterExpression;
	topK: number;
}

export interface VectorSearchRequest {
	embedding: number[];
	filter?: FilterExpression;
	topK: number;
	metric: SimilarityMetric;
}

/**
 * DocumentStoreBackend Interface
 *
 * @example
 * ```typescript
 * class MyBackend implements DocumentStoreBackend {
 *   async count(): Promise<number> {
 *     const { rows } = await this.client.query('SELECT COUNT(*) FROM docs');
 *     return Number(rows[0].count);
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface DocumentStoreBackend {
	// Connection management

	/**
	 * Opens the single session this adapter uses
	 *
	 * @throws {ConfigurationError} If credentials cannot be resolved
	 * @throws {DocumentStoreError} If the backend is unreachable
	 */
	connect(): Promise<void>;

	/** Releases the session. Safe to call when not connected. */
	disconnect(): Promise<void>;

	isConnected(): boolean;

	getBackendType(): BackendType;

	/**
	 * Creates the backing table or index when missing and runs the vector
	 * index lifecycle. Called once per session by the orchestrator.
	 *
	 * @throws {ConfigurationError} If storage is missing and createIfMissing is off
	 */
	initialize(): Promise<IndexState>;

	// Document operations

	count(): Promise<number>;

	/**
	 * Persists a prepared batch as one unit
	 *
	 * @returns Number of documents inserted or overwritten
	 * @throws {DuplicateDocumentError} Under 'fail' when an id is already stored
	 */
	writeDocuments(documents: Document[], policy: DuplicatePolicy): Promise<number>;

	/** All documents matching the filter, or every document without one */
	filterDocuments(filter?: FilterExpression): Promise<Document[]>;

	/** Ids that are not stored are ignored */
	deleteDocuments(ids: string[]): Promise<void>;

	// Retrieval

	/** Best `topK` matches by rank score, descending */
	keywordSearch(request: KeywordSearchRequest): Promise<Document[]>;

	/** Best `topK` matches for the metric, each with its score */
	vectorSearch(request: VectorSearchRequest): Promise<Document[]>;

	/** Removes the table, index or collection and everything in it */
	dropStorage(): Promise<void>;
}
