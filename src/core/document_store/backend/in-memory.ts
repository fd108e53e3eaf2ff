/**
 * In-Memory Document Store Backend
 *
 * Process-local implementation of the DocumentStoreBackend interface with the
 * same observable semantics as the database backends. Used for development
 * and tests.
 *
 * Features:
 * - Exact scoring for every similarity metric
 * - Filter evaluation straight from the AST
 * - A registry of approximate indexes so the index lifecycle runs unchanged
 *
 * Limitations:
 * - Data lives as long as the adapter instance
 * - Keyword ranking is a plain term count
 *
 * @module document_store/backend/in-memory
 */

import type { DocumentStoreBackend, BackendOptions, KeywordSearchRequest, VectorSearchRequest } from './document-store-backend.js';
import { ConfigurationError, DocumentStoreError, type InMemoryStoreConfig } from './types.js';
import { Logger, createLogger } from '../../logger/index.js';
import { BACKEND_TYPES, ERROR_MESSAGES, LOG_PREFIXES, type BackendType, type DuplicatePolicy } from '../constants.js';
import type { Document } from '../document.js';
import { matchesFilter, type FilterExpression } from '../filters/index.js';
import {
	VectorIndexManager,
	type ApproximateIndexDefinition,
	type IndexState,
	type VectorIndexOperations,
} from '../index-lifecycle.js';
import { scoreVectors, sortByMetric } from '../similarity.js';
import { planWrite, writtenCount } from '../write-pipeline.js';

const TERM = /[\p{L}\p{N}]+/gu;

function terms(text: string): string[] {
	return text.toLowerCase().match(TERM) ?? [];
}

/**
 * InMemoryBackend Class
 *
 * @example
 * ```typescript
 * const backend = new InMemoryBackend(parseStoreConfig({ type: 'in-memory', embeddingDimension: 3 }));
 * await backend.connect();
 * await backend.initialize();
 * await backend.writeDocuments([{ id: 'a', embedding: [1, 0, 0] }], 'fail');
 * ```
 */
export class InMemoryBackend implements DocumentStoreBackend {
	private readonly config: InMemoryStoreConfig;
	private readonly logger: Logger;
	private readonly indexManager: VectorIndexManager;
	private connected = false;
	private storageExists = false;
	private efSearch: number | undefined;

	private readonly documents = new Map<string, Document>();
	private readonly indexes = new Map<string, ApproximateIndexDefinition>();

	constructor(config: InMemoryStoreConfig, options: BackendOptions = {}) {
		this.config = config;
		this.logger = options.logger ?? createLogger({ level: config.logLevel });

		const operations: VectorIndexOperations = {
			indexExists: async name => this.indexes.has(name),
			createIndex: async definition => {
				this.indexes.set(definition.name, { ...definition });
			},
			dropIndex: async name => {
				this.indexes.delete(name);
			},
			setSearchBreadth: async efSearch => {
				this.efSearch = efSearch;
			},
		};
		this.indexManager = new VectorIndexManager(operations, {
			logger: this.logger,
			errorDetail: config.errorDetail,
		});

		this.logger.debug(`${LOG_PREFIXES.MEMORY} Initialized`, {
			collection: config.collectionName,
			dimension: config.embeddingDimension,
		});
	}

	// Connection management

	async connect(): Promise<void> {
		this.connected = true;
		this.logger.debug(`${LOG_PREFIXES.MEMORY} Connected`, { collection: this.config.collectionName });
	}

	async disconnect(): Promise<void> {
		this.connected = false;
		this.logger.debug(`${LOG_PREFIXES.MEMORY} Disconnected`);
	}

	isConnected(): boolean {
		return this.connected;
	}

	getBackendType(): BackendType {
		return BACKEND_TYPES.IN_MEMORY;
	}

	async initialize(): Promise<IndexState> {
		this.assertConnected('initialize');
		if (!this.storageExists) {
			if (!this.config.createIfMissing) {
				throw new ConfigurationError(
					`${ERROR_MESSAGES.STORAGE_MISSING}: collection '${this.config.collectionName}'`,
					['createIfMissing']
				);
			}
			this.storageExists = true;
			this.logger.debug(`${LOG_PREFIXES.MEMORY} Created collection '${this.config.collectionName}'`);
		}
		return this.indexManager.ensureIndex(this.config.vectorSearch);
	}

	/**
	 * Approximate indexes currently registered, by name
	 */
	listIndexes(): ApproximateIndexDefinition[] {
		return [...this.indexes.values()].map(definition => ({ ...definition }));
	}

	/**
	 * Query-time breadth most recently applied
	 */
	getSearchBreadth(): number | undefined {
		return this.efSearch;
	}

	// Document operations

	async count(): Promise<number> {
		this.assertConnected('count');
		return this.documents.size;
	}

	async writeDocuments(documents: Document[], policy: DuplicatePolicy): Promise<number> {
		this.assertConnected('write');
		const existing = new Set(documents.map(document => document.id).filter(id => this.documents.has(id)));
		const plan = planWrite(documents, existing, policy);

		for (const document of [...plan.inserts, ...plan.overwrites]) {
			this.documents.set(document.id, structuredClone(document));
		}

		this.logger.debug(`${LOG_PREFIXES.MEMORY} Wrote documents`, {
			inserted: plan.inserts.length,
			overwritten: plan.overwrites.length,
			skipped: plan.skipped.length,
		});
		return writtenCount(plan);
	}

	async filterDocuments(filter?: FilterExpression): Promise<Document[]> {
		this.assertConnected('filter');
		return this.select(filter).map(document => structuredClone(document));
	}

	async deleteDocuments(ids: string[]): Promise<void> {
		this.assertConnected('delete');
		let removed = 0;
		for (const id of ids) {
			if (this.documents.delete(id)) removed++;
		}
		this.logger.debug(`${LOG_PREFIXES.MEMORY} Deleted documents`, { requested: ids.length, removed });
	}

	// Retrieval

	async keywordSearch(request: KeywordSearchRequest): Promise<Document[]> {
		this.assertConnected('keywordSearch');
		const queryTerms = new Set(terms(request.query));

		const scored: Document[] = [];
		for (const document of this.select(request.filter)) {
			const score = terms(document.content ?? '').filter(term => queryTerms.has(term)).length;
			if (score > 0) {
				scored.push({ ...structuredClone(document), score });
			}
		}

		return scored.sort((a, b) => (b.score ?? 0) - (a.score ?? 0)).slice(0, request.topK);
	}

	async vectorSearch(request: VectorSearchRequest): Promise<Document[]> {
		this.assertConnected('vectorSearch');
		await this.indexManager.prepareQuery(this.config.vectorSearch);

		const scored: Document[] = [];
		for (const document of this.select(request.filter)) {
			if (!document.embedding) continue;
			scored.push({
				...structuredClone(document),
				score: scoreVectors(request.metric, request.embedding, document.embedding),
			});
		}

		return sortByMetric(scored, request.metric).slice(0, request.topK);
	}

	async dropStorage(): Promise<void> {
		this.assertConnected('deleteStorage');
		this.documents.clear();
		this.indexes.clear();
		this.storageExists = false;
		this.logger.info(`${LOG_PREFIXES.MEMORY} Dropped collection '${this.config.collectionName}'`);
	}

	private select(filter?: FilterExpression): Document[] {
		const all = [...this.documents.values()];
		return filter ? all.filter(document => matchesFilter(filter, document)) : all;
	}

	private assertConnected(operation: string): void {
		if (!this.connected) {
			throw new DocumentStoreError(ERROR_MESSAGES.NOT_CONNECTED, operation);
		}
	}
}
