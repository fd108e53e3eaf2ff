/**
 * Vector Index Lifecycle Manager
 *
 * Decides whether an approximate (HNSW) index must be built, kept or rebuilt
 * for the configured search strategy. The manager does not read back the
 * parameters an existing index was built with: an index that exists and is
 * not flagged for recreation is kept, with a warning.
 *
 * @module document_store/index-lifecycle
 */

import type { Logger } from '../logger/index.js';
import { ERROR_MESSAGES, LOG_PREFIXES, SEARCH_STRATEGIES, type SimilarityMetric } from './constants.js';
import { ConfigurationError, toDocumentStoreError, type ErrorDetail, type VectorSearchConfig } from './backend/types.js';

/**
 * What a backend needs to build an approximate index
 */
export interface ApproximateIndexDefinition {
	name: string;
	metric: SimilarityMetric;
	m?: number;
	efConstruction?: number;
}

/**
 * Index primitives each backend provides
 */
export interface VectorIndexOperations {
	indexExists(name: string): Promise<boolean>;
	createIndex(definition: ApproximateIndexDefinition): Promise<void>;
	/** Omitted by backends whose index cannot be dropped without its documents */
	dropIndex?(name: string): Promise<void>;
	/** Session-scoped query-time breadth. Backends without one omit it. */
	setSearchBreadth?(efSearch: number): Promise<void>;
}

export type IndexAction = 'none' | 'created' | 'kept' | 'recreated';

/**
 * Result of one ensureIndex() call
 */
export interface IndexState {
	strategy: VectorSearchConfig['strategy'];
	action: IndexAction;
	indexName?: string;
	metric: SimilarityMetric;
	/** False when an existing index was kept without checking its build parameters */
	verified: boolean;
}

export interface VectorIndexManagerOptions {
	logger: Logger;
	errorDetail: ErrorDetail;
}

export class VectorIndexManager {
	private readonly logger: Logger;
	private readonly errorDetail: ErrorDetail;
	private lastState: IndexState | undefined;

	constructor(
		private readonly operations: VectorIndexOperations,
		options: VectorIndexManagerOptions
	) {
		this.logger = options.logger;
		this.errorDetail = options.errorDetail;
	}

	/**
	 * State reported by the most recent successful ensureIndex()
	 */
	getLastState(): IndexState | undefined {
		return this.lastState;
	}

	/**
	 * Brings the approximate index in line with `config`. Safe to call again.
	 *
	 * @throws {DocumentStoreError} When checking, building or dropping fails
	 */
	async ensureIndex(config: VectorSearchConfig): Promise<IndexState> {
		if (config.strategy === SEARCH_STRATEGIES.EXACT) {
			this.logger.debug(`${LOG_PREFIXES.INDEX} Exact strategy, no index needed`);
			return this.record({ strategy: config.strategy, action: 'none', metric: config.metric, verified: true });
		}

		const { index, metric } = config;
		const definition: ApproximateIndexDefinition = { name: index.name, metric };
		if (index.m !== undefined) definition.m = index.m;
		if (index.efConstruction !== undefined) definition.efConstruction = index.efConstruction;

		const exists = await this.step(ERROR_MESSAGES.INDEX_CHECK_FAILED, () =>
			this.operations.indexExists(index.name)
		);

		if (!exists) {
			await this.build(definition);
			return this.record({ strategy: config.strategy, action: 'created', indexName: index.name, metric, verified: true });
		}

		if (!index.recreateIfExists) {
			this.logger.warn(
				`${LOG_PREFIXES.INDEX} Index '${index.name}' already exists and was kept. It may have been built with a different metric or parameters; set recreateIfExists to rebuild it.`,
				{ indexName: index.name, metric }
			);
			return this.record({ strategy: config.strategy, action: 'kept', indexName: index.name, metric, verified: false });
		}

		const { dropIndex } = this.operations;
		if (!dropIndex) {
			throw new ConfigurationError(ERROR_MESSAGES.RECREATE_UNSUPPORTED, ['vectorSearch.index.recreateIfExists']);
		}
		this.logger.info(`${LOG_PREFIXES.INDEX} Recreating index '${index.name}'`);
		await this.step(ERROR_MESSAGES.INDEX_DROP_FAILED, () => dropIndex.call(this.operations, index.name));
		await this.build(definition);
		return this.record({ strategy: config.strategy, action: 'recreated', indexName: index.name, metric, verified: true });
	}

	/**
	 * Applies query-time tuning before a similarity query
	 */
	async prepareQuery(config: VectorSearchConfig): Promise<void> {
		if (config.strategy !== SEARCH_STRATEGIES.APPROXIMATE) return;
		const { efSearch } = config.index;
		if (efSearch === undefined || !this.operations.setSearchBreadth) return;
		await this.step(ERROR_MESSAGES.SEARCH_FAILED, () => this.operations.setSearchBreadth?.(efSearch) ?? Promise.resolve());
	}

	private async build(definition: ApproximateIndexDefinition): Promise<void> {
		this.logger.info(`${LOG_PREFIXES.INDEX} Building index '${definition.name}'`, {
			metric: definition.metric,
			m: definition.m,
			efConstruction: definition.efConstruction,
		});
		await this.step(ERROR_MESSAGES.INDEX_BUILD_FAILED, () => this.operations.createIndex(definition));
	}

	private async step<T>(message: string, run: () => Promise<T>): Promise<T> {
		try {
			return await run();
		} catch (error) {
			this.logger.debug(`${LOG_PREFIXES.INDEX} ${message}`, {
				error: error instanceof Error ? error.message : String(error),
			});
			throw toDocumentStoreError(error, { operation: 'index', message, detail: this.errorDetail });
		}
	}

	private record(state: IndexState): IndexState {
		this.lastState = state;
		return state;
	}
}
