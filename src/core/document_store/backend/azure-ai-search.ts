/**
 * Azure AI Search Backend
 *
 * Implementation of the DocumentStoreBackend interface for an Azure AI Search
 * index.
 *
 * Features:
 * - One search index per store with a dense vector field
 * - Declared metadata fields as top-level filterable index fields
 * - OData filters, keyword and vector queries
 * - Check-then-replace duplicate handling with compensation on failure
 *
 * Limitations:
 * - The similarity metric is fixed when the index is built
 * - Blob and tabular payloads are not stored
 *
 * @module document_store/backend/azure-ai-search
 */

import {
	AzureKeyCredential,
	SearchIndexClient,
	type SearchClient,
	type SearchField,
	type SearchIndex,
	type SearchOptions,
	type VectorSearchAlgorithmConfiguration,
	type VectorSearchAlgorithmMetric,
} from '@azure/search-documents';
import { isRestError } from '@azure/core-rest-pipeline';
import type { DocumentStoreBackend, BackendOptions, KeywordSearchRequest, VectorSearchRequest } from './document-store-backend.js';
import {
	ConfigurationError,
	DocumentStoreError,
	InvalidArgumentError,
	toDocumentStoreError,
	type AzureAISearchStoreConfig,
} from './types.js';
import { Logger, createLogger } from '../../logger/index.js';
import {
	BACKEND_TYPES,
	DEFAULTS,
	ERROR_MESSAGES,
	LOG_PREFIXES,
	SEARCH_STRATEGIES,
	SIMILARITY_METRICS,
	type BackendType,
	type DuplicatePolicy,
	type SimilarityMetric,
} from '../constants.js';
import type { Document, MetadataValue } from '../document.js';
import { bindODataFilter, compileODataFilter, type FilterExpression } from '../filters/index.js';
import {
	VectorIndexManager,
	type ApproximateIndexDefinition,
	type IndexState,
	type VectorIndexOperations,
} from '../index-lifecycle.js';
import { AZURE_FIELD_TYPES } from '../metadata-fields.js';
import { requireSecret } from '../secret.js';
import { fromAzureScore, sortByMetric } from '../similarity.js';
import { planWrite, writtenCount } from '../write-pipeline.js';

/** A stored search document: id, content, embedding and one field per metadata key */
export type AzureSearchRecord = Record<string, unknown>;

const AZURE_METRICS: Record<SimilarityMetric, VectorSearchAlgorithmMetric> = {
	[SIMILARITY_METRICS.COSINE]: 'cosine',
	[SIMILARITY_METRICS.INNER_PRODUCT]: 'dotProduct',
	[SIMILARITY_METRICS.L2]: 'euclidean',
};

const EXHAUSTIVE_ALGORITHM = 'exhaustive-knn';

function isNotFound(error: unknown): boolean {
	return isRestError(error) && error.statusCode === 404;
}

function isMetadataValue(value: unknown): value is MetadataValue {
	return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * AzureAISearchBackend Class
 *
 * Endpoint and API key are resolved at construction; a missing one is a
 * ConfigurationError before any network call.
 *
 * @example
 * ```typescript
 * const backend = new AzureAISearchBackend(parseStoreConfig({
 *   type: 'azure-ai-search',
 *   indexName: 'articles',
 *   embeddingDimension: 768,
 *   metadataFields: { category: 'text' },
 * }));
 * await backend.connect();
 * await backend.initialize();
 * ```
 */
export class AzureAISearchBackend implements DocumentStoreBackend {
	private indexClient: SearchIndexClient | undefined;
	private searchClient: SearchClient<AzureSearchRecord> | undefined;
	private readonly config: AzureAISearchStoreConfig;
	private readonly logger: Logger;
	private readonly indexManager: VectorIndexManager;
	private readonly endpoint: string;
	private readonly apiKey: string;
	private readonly filterableFields: ReadonlySet<string>;
	private readonly emptyEmbedding: number[];

	constructor(config: AzureAISearchStoreConfig, options: BackendOptions = {}) {
		this.config = config;
		this.logger = options.logger ?? createLogger({ level: config.logLevel });
		this.endpoint = requireSecret(config.endpoint, 'Azure AI Search endpoint');
		this.apiKey = requireSecret(config.apiKey, 'Azure AI Search API key');
		this.filterableFields = new Set(['id', ...Object.keys(config.metadataFields)]);
		this.emptyEmbedding = new Array<number>(config.embeddingDimension).fill(DEFAULTS.AZURE_EMPTY_EMBEDDING_VALUE);

		const operations: VectorIndexOperations = {
			indexExists: () => this.searchIndexExists(),
			createIndex: async definition => {
				await this.requireIndexClient().createIndex(this.buildSearchIndex(definition));
			},
		};
		this.indexManager = new VectorIndexManager(operations, {
			logger: this.logger,
			errorDetail: config.errorDetail,
		});

		this.logger.debug(`${LOG_PREFIXES.AZURE} Initialized`, {
			indexName: config.indexName,
			dimension: config.embeddingDimension,
		});
	}

	// Connection management

	async connect(): Promise<void> {
		if (this.indexClient) {
			this.logger.debug(`${LOG_PREFIXES.AZURE} Already connected`);
			return;
		}
		const clientOptions = this.config.apiVersion ? { serviceVersion: this.config.apiVersion } : {};
		const indexClient = new SearchIndexClient(this.endpoint, new AzureKeyCredential(this.apiKey), clientOptions);
		this.indexClient = indexClient;
		this.searchClient = indexClient.getSearchClient<AzureSearchRecord>(this.config.indexName);
		this.logger.info(`${LOG_PREFIXES.AZURE} Connected to search service`, { indexName: this.config.indexName });
	}

	async disconnect(): Promise<void> {
		this.indexClient = undefined;
		this.searchClient = undefined;
		this.logger.debug(`${LOG_PREFIXES.AZURE} Disconnected`);
	}

	isConnected(): boolean {
		return this.indexClient !== undefined;
	}

	getBackendType(): BackendType {
		return BACKEND_TYPES.AZURE_AI_SEARCH;
	}

	/**
	 * The exact strategy still needs a search index; the approximate one is
	 * created, kept or rebuilt by the index manager.
	 */
	async initialize(): Promise<IndexState> {
		const exists = await this.step('initialize', ERROR_MESSAGES.SCHEMA_INIT_FAILED, () => this.searchIndexExists());

		if (!exists && !this.config.createIfMissing) {
			throw new ConfigurationError(`${ERROR_MESSAGES.STORAGE_MISSING}: index '${this.config.indexName}'`, [
				'createIfMissing',
			]);
		}

		if (!exists && this.config.vectorSearch.strategy === SEARCH_STRATEGIES.EXACT) {
			this.logger.info(`${LOG_PREFIXES.AZURE} Creating index '${this.config.indexName}'`);
			await this.step('initialize', ERROR_MESSAGES.SCHEMA_INIT_FAILED, () =>
				this.requireIndexClient().createIndex(this.buildSearchIndex())
			);
		}

		return this.indexManager.ensureIndex(this.config.vectorSearch);
	}

	// Document operations

	async count(): Promise<number> {
		return this.step('count', ERROR_MESSAGES.COUNT_FAILED, () => this.requireSearchClient().getDocumentsCount());
	}

	/**
	 * Existing ids are looked up first and their stored versions kept, so a
	 * failed upload can be undone: overwritten documents are re-uploaded and
	 * newly inserted ones deleted.
	 */
	async writeDocuments(documents: Document[], policy: DuplicatePolicy): Promise<number> {
		const records = documents.map(document => this.toRecord(document));
		const client = this.requireSearchClient();

		const snapshots = new Map<string, AzureSearchRecord>();
		for (const document of documents) {
			const stored = await this.step('write', ERROR_MESSAGES.WRITE_FAILED, () => this.fetchRecord(document.id));
			if (stored) snapshots.set(document.id, stored);
		}

		const plan = planWrite(documents, new Set(snapshots.keys()), policy);
		const pending = new Set([...plan.inserts, ...plan.overwrites].map(document => document.id));
		const uploads = records.filter(record => typeof record.id === 'string' && pending.has(record.id));

		const attempted: string[] = [];
		try {
			for (let start = 0; start < uploads.length; start += DEFAULTS.AZURE_UPLOAD_BATCH) {
				const batch = uploads.slice(start, start + DEFAULTS.AZURE_UPLOAD_BATCH);
				for (const record of batch) {
					if (typeof record.id === 'string') attempted.push(record.id);
				}
				const result = await client.uploadDocuments(batch);
				const failed = result.results.filter(item => !item.succeeded);
				if (failed.length > 0) {
					throw new Error(
						`${failed.length} document(s) were rejected: ${failed.map(item => `${item.key} (${item.errorMessage ?? item.statusCode})`).join(', ')}`
					);
				}
			}
		} catch (error) {
			await this.compensate(attempted, snapshots);
			throw this.translate(error, 'write', ERROR_MESSAGES.WRITE_FAILED);
		}

		this.logger.debug(`${LOG_PREFIXES.AZURE} Wrote documents`, {
			inserted: plan.inserts.length,
			overwritten: plan.overwrites.length,
			skipped: plan.skipped.length,
		});
		return writtenCount(plan);
	}

	async filterDocuments(filter?: FilterExpression): Promise<Document[]> {
		const options: SearchOptions<AzureSearchRecord> = {};
		const odata = this.toODataFilter(filter);
		if (odata) options.filter = odata;
		return this.search('filter', ERROR_MESSAGES.FILTER_FAILED, '*', options, score => score);
	}

	async deleteDocuments(ids: string[]): Promise<void> {
		if (ids.length === 0) {
			return;
		}
		await this.step('delete', ERROR_MESSAGES.DELETE_FAILED, () => this.requireSearchClient().deleteDocuments('id', ids));
		this.logger.debug(`${LOG_PREFIXES.AZURE} Deleted documents`, { requested: ids.length });
	}

	// Retrieval

	async keywordSearch(request: KeywordSearchRequest): Promise<Document[]> {
		const options: SearchOptions<AzureSearchRecord> = { top: request.topK };
		const odata = this.toODataFilter(request.filter);
		if (odata) options.filter = odata;
		const results = await this.search('keywordSearch', ERROR_MESSAGES.SEARCH_FAILED, request.query, options, score => score);
		return results.slice(0, request.topK);
	}

	/**
	 * Scores are mapped from the service's relevance scale back onto the
	 * configured metric.
	 */
	async vectorSearch(request: VectorSearchRequest): Promise<Document[]> {
		const configured = this.config.vectorSearch.metric;
		if (request.metric !== configured) {
			throw new InvalidArgumentError(
				`Azure AI Search indexes are built for a single metric; this index uses '${configured}', not '${request.metric}'`,
				'vectorSearch'
			);
		}

		const options: SearchOptions<AzureSearchRecord> = {
			top: request.topK,
			vectorSearchOptions: {
				queries: [
					{
						kind: 'vector',
						vector: request.embedding,
						kNearestNeighborsCount: request.topK,
						fields: ['embedding'],
						exhaustive: this.config.vectorSearch.strategy === SEARCH_STRATEGIES.EXACT,
					},
				],
			},
		};
		const odata = this.toODataFilter(request.filter);
		if (odata) options.filter = odata;

		const results = await this.search('vectorSearch', ERROR_MESSAGES.SEARCH_FAILED, undefined, options, score =>
			fromAzureScore(request.metric, score)
		);
		return sortByMetric(results, request.metric).slice(0, request.topK);
	}

	async dropStorage(): Promise<void> {
		const client = this.requireIndexClient();
		try {
			await client.deleteIndex(this.config.indexName);
		} catch (error) {
			if (!isNotFound(error)) {
				throw this.translate(error, 'deleteStorage', ERROR_MESSAGES.DROP_STORAGE_FAILED);
			}
		}
		this.logger.info(`${LOG_PREFIXES.AZURE} Deleted index '${this.config.indexName}'`);
	}

	// Index helpers

	private async searchIndexExists(): Promise<boolean> {
		try {
			await this.requireIndexClient().getIndex(this.config.indexName);
			return true;
		} catch (error) {
			if (isNotFound(error)) return false;
			throw error;
		}
	}

	/**
	 * Index schema. Without an approximate definition the vector field uses
	 * exhaustive KNN with the configured metric.
	 */
	buildSearchIndex(approximate?: ApproximateIndexDefinition): SearchIndex {
		const metric = AZURE_METRICS[approximate?.metric ?? this.config.vectorSearch.metric];
		const algorithm: VectorSearchAlgorithmConfiguration = approximate
			? {
					name: approximate.name,
					kind: 'hnsw',
					parameters: {
						metric,
						...(approximate.m !== undefined ? { m: approximate.m } : {}),
						...(approximate.efConstruction !== undefined ? { efConstruction: approximate.efConstruction } : {}),
						...(this.config.vectorSearch.strategy === SEARCH_STRATEGIES.APPROXIMATE &&
						this.config.vectorSearch.index.efSearch !== undefined
							? { efSearch: this.config.vectorSearch.index.efSearch }
							: {}),
					},
				}
			: { name: EXHAUSTIVE_ALGORITHM, kind: 'exhaustiveKnn', parameters: { metric } };

		const fields: SearchField[] = [
			{ name: 'id', type: 'Edm.String', key: true, filterable: true },
			{ name: 'content', type: 'Edm.String', searchable: true },
			{
				name: 'embedding',
				type: 'Collection(Edm.Single)',
				searchable: true,
				vectorSearchDimensions: this.config.embeddingDimension,
				vectorSearchProfileName: DEFAULTS.AZURE_VECTOR_PROFILE,
			},
		];
		for (const [name, kind] of Object.entries(this.config.metadataFields)) {
			fields.push({ name, type: AZURE_FIELD_TYPES[kind], filterable: true });
		}

		return {
			name: this.config.indexName,
			fields,
			vectorSearch: {
				algorithms: [algorithm],
				profiles: [{ name: DEFAULTS.AZURE_VECTOR_PROFILE, algorithmConfigurationName: algorithm.name }],
			},
		};
	}

	// Record mapping

	private toRecord(document: Document): AzureSearchRecord {
		if (document.blob || document.tabular) {
			this.logger.warn(
				`${LOG_PREFIXES.AZURE} Document '${document.id}' carries blob or tabular data, which this backend does not store`
			);
		}

		const record: AzureSearchRecord = {
			id: document.id,
			content: document.content ?? null,
			embedding: document.embedding ?? this.emptyEmbedding,
		};
		for (const [key, value] of Object.entries(document.metadata ?? {})) {
			if (!(key in this.config.metadataFields)) {
				throw new InvalidArgumentError(
					`Metadata key '${key}' of document '${document.id}' is not a declared metadata field of this index`,
					'write'
				);
			}
			record[key] = value;
		}
		return record;
	}

	private toDocument(record: AzureSearchRecord, score?: number): Document {
		const document: Document = { id: String(record.id), metadata: {} };
		if (typeof record.content === 'string') document.content = record.content;

		const embedding = record.embedding;
		if (Array.isArray(embedding) && embedding.every((value: unknown) => typeof value === 'number')) {
			const vector = embedding.map(Number);
			if (!vector.every(value => value === DEFAULTS.AZURE_EMPTY_EMBEDDING_VALUE)) {
				document.embedding = vector;
			}
		}

		for (const key of Object.keys(this.config.metadataFields)) {
			const value = record[key];
			if (isMetadataValue(value)) {
				document.metadata = { ...document.metadata, [key]: value };
			}
		}
		if (score !== undefined) document.score = score;
		return document;
	}

	private async fetchRecord(id: string): Promise<AzureSearchRecord | undefined> {
		try {
			return await this.requireSearchClient().getDocument(id);
		} catch (error) {
			if (isNotFound(error)) return undefined;
			throw error;
		}
	}

	private async compensate(attempted: string[], snapshots: Map<string, AzureSearchRecord>): Promise<void> {
		const client = this.requireSearchClient();
		const restore = attempted.flatMap(id => {
			const snapshot = snapshots.get(id);
			return snapshot ? [snapshot] : [];
		});
		const remove = attempted.filter(id => !snapshots.has(id));

		try {
			if (restore.length > 0) await client.uploadDocuments(restore);
			if (remove.length > 0) await client.deleteDocuments('id', remove);
			this.logger.warn(`${LOG_PREFIXES.AZURE} Write failed and was rolled back`, {
				restored: restore.length,
				removed: remove.length,
			});
		} catch (error) {
			this.logger.error(`${LOG_PREFIXES.AZURE} Write failed and could not be rolled back`, {
				restored: restore.length,
				removed: remove.length,
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}

	// Query helpers

	private toODataFilter(filter?: FilterExpression): string | undefined {
		if (!filter) return undefined;
		const odata = bindODataFilter(compileODataFilter(filter, { filterableFields: this.filterableFields }));
		this.logger.debug(`${LOG_PREFIXES.AZURE} Compiled filter`, { filter: odata });
		return odata;
	}

	private async search(
		operation: string,
		message: string,
		searchText: string | undefined,
		options: SearchOptions<AzureSearchRecord>,
		convertScore: (score: number) => number
	): Promise<Document[]> {
		const client = this.requireSearchClient();
		this.logger.debug(`${LOG_PREFIXES.AZURE} Executing search`, { operation, searchText, filter: options.filter });
		return this.step(operation, message, async () => {
			const response = await client.search(searchText, options);
			const documents: Document[] = [];
			for await (const result of response.results) {
				documents.push(this.toDocument(result.document, convertScore(result.score)));
			}
			return documents;
		});
	}

	private requireIndexClient(): SearchIndexClient {
		if (!this.indexClient) {
			throw new DocumentStoreError(ERROR_MESSAGES.NOT_CONNECTED, 'query');
		}
		return this.indexClient;
	}

	private requireSearchClient(): SearchClient<AzureSearchRecord> {
		if (!this.searchClient) {
			throw new DocumentStoreError(ERROR_MESSAGES.NOT_CONNECTED, 'query');
		}
		return this.searchClient;
	}

	private async step<T>(operation: string, message: string, task: () => Promise<T>): Promise<T> {
		try {
			return await task();
		} catch (error) {
			throw this.translate(error, operation, message);
		}
	}

	private translate(error: unknown, operation: string, message: string): DocumentStoreError {
		if (error instanceof DocumentStoreError) {
			return error;
		}
		this.logger.debug(`${LOG_PREFIXES.AZURE} ${message}`, {
			operation,
			error: error instanceof Error ? error.message : String(error),
		});
		return toDocumentStoreError(error, { operation, message, detail: this.config.errorDetail });
	}
}
