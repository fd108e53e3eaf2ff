/**
 * Document Store
 *
 * Backend-agnostic front of the module. Every public operation validates its
 * arguments and parses its filter first, then runs inside {@link withSession}:
 * connect if needed, initialize storage once per session, execute, and map
 * any native failure onto the error taxonomy.
 *
 * @module document_store/document-store
 */

import { z } from 'zod';
import type { Logger } from '../logger/index.js';
import type { DocumentStoreBackend } from './backend/document-store-backend.js';
import {
	InvalidArgumentError,
	VectorDimensionError,
	toDocumentStoreError,
	type DocumentStoreError,
	type ResolvedDocumentStoreConfig,
} from './backend/types.js';
import { parseStoreConfig } from './config.js';
import {
	DEFAULTS,
	ERROR_MESSAGES,
	LOG_PREFIXES,
	SEARCH_STRATEGIES,
	SIMILARITY_METRICS,
	type BackendType,
	type DuplicatePolicy,
	type SimilarityMetric,
} from './constants.js';
import type { Document } from './document.js';
import { parseFilter, type FilterExpression, type FilterInput } from './filters/index.js';
import type { IndexState } from './index-lifecycle.js';
import { valueMatchesKind } from './metadata-fields.js';
import { serializeSecret } from './secret.js';
import { prepareWriteBatch, resolvePolicy } from './write-pipeline.js';

export interface KeywordSearchOptions {
	filters?: FilterInput;
	topK?: number;
}

export interface VectorSearchOptions {
	filters?: FilterInput;
	topK?: number;
	/** Defaults to the configured metric */
	metric?: SimilarityMetric;
}

/**
 * Snapshot reported by getInfo()
 */
export interface DocumentStoreInfo {
	backend: BackendType;
	connected: boolean;
	initialized: boolean;
	embeddingDimension: number;
	metric: SimilarityMetric;
	strategy: ResolvedDocumentStoreConfig['vectorSearch']['strategy'];
	indexState?: IndexState;
}

/**
 * Serialized form: the backend type and the options to rebuild the store with
 */
export interface SerializedDocumentStore {
	type: BackendType;
	init_parameters: Record<string, unknown>;
}

const SerializedStoreSchema = z.object({
	type: z.string(),
	init_parameters: z.record(z.unknown()),
});

const METRICS: readonly SimilarityMetric[] = [
	SIMILARITY_METRICS.COSINE,
	SIMILARITY_METRICS.INNER_PRODUCT,
	SIMILARITY_METRICS.L2,
];

const OPERATION_MESSAGES: Record<string, string> = {
	count: ERROR_MESSAGES.COUNT_FAILED,
	write: ERROR_MESSAGES.WRITE_FAILED,
	filter: ERROR_MESSAGES.FILTER_FAILED,
	delete: ERROR_MESSAGES.DELETE_FAILED,
	keywordSearch: ERROR_MESSAGES.SEARCH_FAILED,
	vectorSearch: ERROR_MESSAGES.SEARCH_FAILED,
	deleteStorage: ERROR_MESSAGES.DROP_STORAGE_FAILED,
};

function isSimilarityMetric(value: unknown): value is SimilarityMetric {
	return METRICS.some(metric => metric === value);
}

/**
 * DocumentStore Class
 *
 * Usually built through `createDocumentStore()`, which picks the adapter.
 *
 * @example
 * ```typescript
 * const store = await createDocumentStore({ type: 'in-memory', embeddingDimension: 3 });
 * await store.write([{ id: 'a', content: 'hello', embedding: [1, 0, 0] }]);
 * const hits = await store.vectorSearch([1, 0, 0], { topK: 5 });
 * ```
 */
export class DocumentStore {
	private initialization: Promise<IndexState> | undefined;
	private indexState: IndexState | undefined;

	constructor(
		private readonly config: ResolvedDocumentStoreConfig,
		private readonly backend: DocumentStoreBackend,
		private readonly logger: Logger
	) {}

	/**
	 * Number of stored documents
	 */
	async count(): Promise<number> {
		return this.withSession('count', backend => backend.count());
	}

	/**
	 * Writes a batch under a duplicate policy
	 *
	 * @param policy - Defaults to the configured `duplicatePolicy`
	 * @returns Number of documents inserted or overwritten
	 * @throws {InvalidDocumentError} If any element is not a well-formed document
	 * @throws {VectorDimensionError} If an embedding has the wrong length
	 * @throws {DuplicateDocumentError} Under 'fail' when an id already exists
	 */
	async write(documents: Document[], policy?: DuplicatePolicy): Promise<number> {
		const resolved = resolvePolicy(policy, this.config.duplicatePolicy);
		const batch = prepareWriteBatch(documents, {
			embeddingDimension: this.config.embeddingDimension,
			policy: resolved,
		});
		this.validateMetadata(batch);

		if (batch.length === 0) {
			return 0;
		}

		const written = await this.withSession('write', backend => backend.writeDocuments(batch, resolved));
		this.logger.info(`${LOG_PREFIXES.WRITE} Wrote ${written} of ${batch.length} document(s)`, { policy: resolved });
		return written;
	}

	/**
	 * Documents matching `filters`, or all documents
	 *
	 * @throws {FilterSyntaxError} Before any backend call when the filter is malformed
	 */
	async filter(filters?: FilterInput): Promise<Document[]> {
		const expression = this.parse(filters);
		return this.withSession('filter', backend => backend.filterDocuments(expression));
	}

	/**
	 * Documents with the given ids; ids that are not stored are absent from the result
	 */
	async getDocuments(ids: string[]): Promise<Document[]> {
		this.assertIds(ids, 'filter');
		if (ids.length === 0) {
			return [];
		}
		const expression = parseFilter({ field: 'id', operator: 'in', value: ids });
		return this.withSession('filter', backend => backend.filterDocuments(expression));
	}

	/**
	 * Deletes by id. Empty input does nothing; unknown ids are ignored.
	 */
	async delete(ids: string[]): Promise<void> {
		this.assertIds(ids, 'delete');
		if (ids.length === 0) {
			return;
		}
		await this.withSession('delete', backend => backend.deleteDocuments([...new Set(ids)]));
	}

	/**
	 * Full-text retrieval, best rank first
	 */
	async keywordSearch(query: string, options: KeywordSearchOptions = {}): Promise<Document[]> {
		if (typeof query !== 'string' || query.trim().length === 0) {
			throw new InvalidArgumentError(ERROR_MESSAGES.EMPTY_QUERY, 'keywordSearch');
		}
		const topK = this.resolveTopK(options.topK, 'keywordSearch');
		const filter = this.parse(options.filters);

		return this.withSession('keywordSearch', backend => backend.keywordSearch({ query, filter, topK }));
	}

	/**
	 * Similarity retrieval. Similarity metrics sort descending, l2_distance ascending.
	 *
	 * @throws {VectorDimensionError} Before any backend call when the length is wrong
	 */
	async vectorSearch(queryEmbedding: number[], options: VectorSearchOptions = {}): Promise<Document[]> {
		if (
			!Array.isArray(queryEmbedding) ||
			queryEmbedding.length === 0 ||
			!queryEmbedding.every(value => typeof value === 'number' && Number.isFinite(value))
		) {
			throw new InvalidArgumentError(ERROR_MESSAGES.EMPTY_EMBEDDING, 'vectorSearch');
		}
		if (queryEmbedding.length !== this.config.embeddingDimension) {
			throw new VectorDimensionError('vectorSearch', this.config.embeddingDimension, queryEmbedding.length);
		}

		const metric = options.metric ?? this.config.vectorSearch.metric;
		if (!isSimilarityMetric(metric)) {
			throw new InvalidArgumentError(
				`Unknown similarity metric '${String(metric)}'. Expected one of: ${METRICS.join(', ')}`,
				'vectorSearch'
			);
		}
		const topK = this.resolveTopK(options.topK, 'vectorSearch');
		const filter = this.parse(options.filters);

		const { vectorSearch } = this.config;
		if (vectorSearch.strategy === SEARCH_STRATEGIES.APPROXIMATE && metric !== vectorSearch.metric) {
			this.logger.warn(
				`${LOG_PREFIXES.STORE} Querying with '${metric}' while index '${vectorSearch.index.name}' was built for '${vectorSearch.metric}'; the index will not be used`
			);
		}

		return this.withSession('vectorSearch', backend =>
			backend.vectorSearch({ embedding: [...queryEmbedding], filter, topK, metric })
		);
	}

	/**
	 * Drops the table, index or collection. The next operation initializes again.
	 */
	async deleteStorage(): Promise<void> {
		try {
			if (!this.backend.isConnected()) {
				await this.backend.connect();
			}
			await this.backend.dropStorage();
		} catch (error) {
			throw this.translate(error, 'deleteStorage');
		}
		this.initialization = undefined;
		this.indexState = undefined;
		this.logger.info(`${LOG_PREFIXES.STORE} Storage deleted`);
	}

	/**
	 * Releases the connection. A later call reconnects.
	 */
	async close(): Promise<void> {
		try {
			await this.backend.disconnect();
		} catch (error) {
			throw this.translate(error, 'close');
		}
	}

	getInfo(): DocumentStoreInfo {
		const info: DocumentStoreInfo = {
			backend: this.backend.getBackendType(),
			connected: this.backend.isConnected(),
			initialized: this.indexState !== undefined,
			embeddingDimension: this.config.embeddingDimension,
			metric: this.config.vectorSearch.metric,
			strategy: this.config.vectorSearch.strategy,
		};
		if (this.indexState) info.indexState = this.indexState;
		return info;
	}

	/**
	 * Serializes the configuration. Environment-variable secrets are kept as
	 * references; token secrets cannot be serialized.
	 *
	 * @throws {ConfigurationError} If the configuration holds a token secret
	 */
	toJSON(): SerializedDocumentStore {
		const { type, ...rest } = this.config;
		const init_parameters: Record<string, unknown> = structuredClone(rest);
		if (this.config.type === 'pgvector') {
			init_parameters.connectionString = serializeSecret(this.config.connectionString);
		} else if (this.config.type === 'azure-ai-search') {
			init_parameters.endpoint = serializeSecret(this.config.endpoint);
			init_parameters.apiKey = serializeSecret(this.config.apiKey);
		}
		return { type, init_parameters };
	}

	/**
	 * Rebuilds a store from {@link toJSON} output
	 */
	static async fromJSON(data: unknown, logger?: Logger): Promise<DocumentStore> {
		const parsed = SerializedStoreSchema.safeParse(data);
		if (!parsed.success) {
			throw new InvalidArgumentError("Serialized store must have 'type' and 'init_parameters'", 'fromJSON');
		}
		const config = parseStoreConfig({ ...parsed.data.init_parameters, type: parsed.data.type });
		const { buildDocumentStore } = await import('./factory.js');
		return buildDocumentStore(config, logger ? { logger } : {});
	}

	// Session handling

	/**
	 * Connects if needed, initializes once per session, then runs `task`
	 */
	private async withSession<T>(operation: string, task: (backend: DocumentStoreBackend) => Promise<T>): Promise<T> {
		try {
			if (!this.backend.isConnected()) {
				await this.backend.connect();
			}
			await this.ensureInitialized();
			return await task(this.backend);
		} catch (error) {
			throw this.translate(error, operation);
		}
	}

	private async ensureInitialized(): Promise<IndexState> {
		if (!this.initialization) {
			this.logger.debug(`${LOG_PREFIXES.STORE} Initializing storage`, { backend: this.backend.getBackendType() });
			this.initialization = this.backend.initialize();
		}
		try {
			const state = await this.initialization;
			this.indexState = state;
			return state;
		} catch (error) {
			this.initialization = undefined;
			throw error;
		}
	}

	private translate(error: unknown, operation: string): DocumentStoreError {
		return toDocumentStoreError(error, {
			operation,
			message: OPERATION_MESSAGES[operation] ?? ERROR_MESSAGES.CONNECTION_FAILED,
			detail: this.config.errorDetail,
		});
	}

	// Argument validation

	private parse(filters: FilterInput | undefined): FilterExpression | undefined {
		return filters === undefined ? undefined : parseFilter(filters);
	}

	private resolveTopK(topK: number | undefined, operation: string): number {
		const value = topK ?? DEFAULTS.TOP_K;
		if (!Number.isInteger(value) || value <= 0) {
			throw new InvalidArgumentError(ERROR_MESSAGES.INVALID_TOP_K, operation);
		}
		return value;
	}

	private assertIds(ids: unknown, operation: string): void {
		if (!Array.isArray(ids) || !ids.every((id: unknown) => typeof id === 'string')) {
			throw new InvalidArgumentError('ids must be an array of strings', operation);
		}
	}

	private validateMetadata(documents: Document[]): void {
		const declared = new Map(Object.entries(this.config.metadataFields));
		for (const document of documents) {
			for (const [key, value] of Object.entries(document.metadata ?? {})) {
				const kind = declared.get(key);
				if (kind !== undefined && !valueMatchesKind(kind, value)) {
					throw new InvalidArgumentError(
						`Metadata field '${key}' of document '${document.id}' must be of type ${kind}`,
						'write'
					);
				}
			}
		}
	}
}
