/**
 * PgVector Backend
 *
 * Implementation of the DocumentStoreBackend interface for PostgreSQL with the
 * pgvector extension.
 *
 * Features:
 * - One table per store with a fixed-dimension vector column
 * - Native upsert (ON CONFLICT) for duplicate handling inside one transaction
 * - HNSW index lifecycle and session-scoped ef_search
 * - Full-text keyword search over content
 * - Expression indexes for declared metadata fields
 *
 * @module document_store/backend/pgvector
 */

// Requires pgvector >= 0.5.0 for HNSW indexes

import { Client, escapeIdentifier, escapeLiteral, type QueryResult, type QueryResultRow } from 'pg';
import type { DocumentStoreBackend, BackendOptions, KeywordSearchRequest, VectorSearchRequest } from './document-store-backend.js';
import {
	ConfigurationError,
	DocumentStoreError,
	DuplicateDocumentError,
	formatErrorMessage,
	toDocumentStoreError,
	type PgVectorStoreConfig,
} from './types.js';
import { Logger, createLogger } from '../../logger/index.js';
import {
	BACKEND_TYPES,
	DEFAULTS,
	DuplicatePolicy,
	ERROR_MESSAGES,
	LOG_PREFIXES,
	SIMILARITY_METRICS,
	type BackendType,
	type SimilarityMetric,
} from '../constants.js';
import type { Document, DocumentBlob, MetadataValue } from '../document.js';
import { compileSqlFilter, type FilterExpression } from '../filters/index.js';
import {
	VectorIndexManager,
	type ApproximateIndexDefinition,
	type IndexState,
	type VectorIndexOperations,
} from '../index-lifecycle.js';
import { postgresMetadataExpression } from '../metadata-fields.js';
import { requireSecret } from '../secret.js';

const UNIQUE_VIOLATION = '23505';

const COLUMNS = [
	'id',
	'embedding',
	'content',
	'tabular',
	'blob_data',
	'blob_meta',
	'blob_mime_type',
	'metadata',
] as const;

const OPERATOR_CLASSES: Record<SimilarityMetric, string> = {
	[SIMILARITY_METRICS.COSINE]: 'vector_cosine_ops',
	[SIMILARITY_METRICS.INNER_PRODUCT]: 'vector_ip_ops',
	[SIMILARITY_METRICS.L2]: 'vector_l2_ops',
};

const DISTANCE_OPERATORS: Record<SimilarityMetric, string> = {
	[SIMILARITY_METRICS.COSINE]: '<=>',
	[SIMILARITY_METRICS.INNER_PRODUCT]: '<#>',
	[SIMILARITY_METRICS.L2]: '<->',
};

/**
 * Score expressions over the raw operator. `<=>` is cosine distance and
 * `<#>` the negated inner product.
 */
const SCORE_EXPRESSIONS: Record<SimilarityMetric, (distance: string) => string> = {
	[SIMILARITY_METRICS.COSINE]: distance => `1 - (${distance})`,
	[SIMILARITY_METRICS.INNER_PRODUCT]: distance => `(${distance}) * -1`,
	[SIMILARITY_METRICS.L2]: distance => distance,
};

type DocumentRow = {
	id: string;
	embedding: string | number[] | null;
	content: string | null;
	tabular: Array<Record<string, unknown>> | null;
	blob_data: Uint8Array | null;
	blob_meta: Record<string, unknown> | null;
	blob_mime_type: string | null;
	metadata: Record<string, MetadataValue> | null;
	score?: number | string | null;
};

/**
 * pgvector returns vectors in their text form, `[1,2,3]`
 */
export const parseVector = (value: string): number[] => {
	if (value.startsWith('[') && value.endsWith(']')) {
		const body = value.substring(1, value.length - 1);
		return body.length === 0 ? [] : body.split(',').map(Number);
	}
	return [];
};

export const formatVector = (vector: number[]): string => `[${vector.join(',')}]`;

function isUniqueViolation(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

/**
 * PgVectorBackend Class
 *
 * @example
 * ```typescript
 * const backend = new PgVectorBackend(parseStoreConfig({
 *   type: 'pgvector',
 *   connectionString: Secret.fromEnvVar('PG_CONN_STR'),
 *   embeddingDimension: 768,
 * }));
 * await backend.connect();
 * await backend.initialize();
 * ```
 */
export class PgVectorBackend implements DocumentStoreBackend {
	private client: Client | undefined;
	private readonly config: PgVectorStoreConfig;
	private readonly logger: Logger;
	private readonly indexManager: VectorIndexManager;
	private readonly table: string;

	constructor(config: PgVectorStoreConfig, options: BackendOptions = {}) {
		this.config = config;
		this.logger = options.logger ?? createLogger({ level: config.logLevel });
		this.table = `${escapeIdentifier(config.schemaName)}.${escapeIdentifier(config.tableName)}`;

		const operations: VectorIndexOperations = {
			indexExists: name => this.indexExists(name),
			createIndex: definition => this.createHnswIndex(definition),
			dropIndex: async name => {
				await this.exec(`DROP INDEX IF EXISTS ${escapeIdentifier(config.schemaName)}.${escapeIdentifier(name)}`);
			},
			setSearchBreadth: async efSearch => {
				await this.exec(`SET hnsw.ef_search = ${Math.trunc(efSearch)}`);
			},
		};
		this.indexManager = new VectorIndexManager(operations, {
			logger: this.logger,
			errorDetail: config.errorDetail,
		});

		this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Initialized`, {
			table: this.table,
			dimension: config.embeddingDimension,
		});
	}

	// Connection management

	async connect(): Promise<void> {
		if (this.client) {
			this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Already connected`);
			return;
		}

		const connectionString = requireSecret(this.config.connectionString, 'PostgreSQL connection string');
		this.logger.info(`${LOG_PREFIXES.PGVECTOR} Connecting to PostgreSQL`);

		const client = new Client({ connectionString });
		try {
			await client.connect();
		} catch (error) {
			this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Connection failed`, { error: String(error) });
			throw toDocumentStoreError(error, {
				operation: 'connect',
				message: ERROR_MESSAGES.CONNECTION_FAILED,
				detail: this.config.errorDetail,
			});
		}
		this.client = client;
		this.logger.info(`${LOG_PREFIXES.PGVECTOR} Successfully connected`);
	}

	async disconnect(): Promise<void> {
		if (!this.client) {
			this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Already disconnected`);
			return;
		}
		const client = this.client;
		this.client = undefined;
		await client.end();
		this.logger.info(`${LOG_PREFIXES.PGVECTOR} Successfully disconnected`);
	}

	isConnected(): boolean {
		return this.client !== undefined;
	}

	getBackendType(): BackendType {
		return BACKEND_TYPES.PGVECTOR;
	}

	/**
	 * Extension, table, keyword index, metadata indexes, then the vector index
	 */
	async initialize(): Promise<IndexState> {
		const { schemaName, tableName } = this.config;
		const fail = ERROR_MESSAGES.SCHEMA_INIT_FAILED;

		await this.run('initialize', fail, 'CREATE EXTENSION IF NOT EXISTS vector');

		if (this.config.recreateTable) {
			this.logger.info(`${LOG_PREFIXES.PGVECTOR} Dropping table ${this.table} before recreating it`);
			await this.run('initialize', fail, `DROP TABLE IF EXISTS ${this.table}`);
		}

		const existing = await this.run<{ exists: boolean }>(
			'initialize',
			fail,
			'SELECT EXISTS (SELECT FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2) AS exists',
			[schemaName, tableName]
		);

		if (!existing.rows[0]?.exists) {
			if (!this.config.createIfMissing) {
				throw new ConfigurationError(`${ERROR_MESSAGES.STORAGE_MISSING}: table ${this.table}`, [
					'createIfMissing',
				]);
			}
			this.logger.info(`${LOG_PREFIXES.PGVECTOR} Creating table ${this.table}`);
			await this.run('initialize', fail, this.createTableStatement());
		}

		await this.ensureKeywordIndex();
		await this.ensureMetadataIndexes();

		return this.indexManager.ensureIndex(this.config.vectorSearch);
	}

	// Document operations

	async count(): Promise<number> {
		const result = await this.run<{ count: string }>(
			'count',
			ERROR_MESSAGES.COUNT_FAILED,
			`SELECT COUNT(*) AS count FROM ${this.table}`
		);
		return Number(result.rows[0]?.count ?? 0);
	}

	/**
	 * One transaction per call. 'fail' is a plain INSERT so the primary key
	 * rejects existing ids; 'skip' and 'overwrite' use ON CONFLICT.
	 */
	async writeDocuments(documents: Document[], policy: DuplicatePolicy): Promise<number> {
		if (documents.length === 0) {
			return 0;
		}

		await this.run('write', ERROR_MESSAGES.WRITE_FAILED, 'BEGIN');
		let written = 0;
		try {
			for (let start = 0; start < documents.length; start += DEFAULTS.PG_INSERT_CHUNK) {
				const chunk = documents.slice(start, start + DEFAULTS.PG_INSERT_CHUNK);
				const { sql, params } = this.insertStatement(chunk, policy);
				const result = await this.exec<{ id: string }>(sql, params);
				written += result.rows.length;
			}
			await this.exec('COMMIT');
		} catch (error) {
			await this.rollback();
			throw this.translate(error, 'write', ERROR_MESSAGES.WRITE_FAILED);
		}

		this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Wrote documents`, {
			requested: documents.length,
			written,
			policy,
		});
		return written;
	}

	async filterDocuments(filter?: FilterExpression): Promise<Document[]> {
		let sql = `SELECT * FROM ${this.table}`;
		let params: unknown[] = [];
		if (filter) {
			const compiled = compileSqlFilter(filter, { metadataFields: this.config.metadataFields });
			sql += ` WHERE ${compiled.clause}`;
			params = compiled.params;
		}
		const result = await this.run<DocumentRow>('filter', ERROR_MESSAGES.FILTER_FAILED, sql, params);
		return result.rows.map(row => this.toDocument(row));
	}

	async deleteDocuments(ids: string[]): Promise<void> {
		if (ids.length === 0) {
			return;
		}
		const result = await this.run(
			'delete',
			ERROR_MESSAGES.DELETE_FAILED,
			`DELETE FROM ${this.table} WHERE id = ANY($1::text[])`,
			[ids]
		);
		this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Deleted documents`, {
			requested: ids.length,
			removed: result.rowCount ?? 0,
		});
	}

	// Retrieval

	async keywordSearch(request: KeywordSearchRequest): Promise<Document[]> {
		const language = escapeLiteral(this.config.language);
		const params: unknown[] = [request.query];
		let where = `to_tsvector(${language}, t.content) @@ query`;

		if (request.filter) {
			const compiled = compileSqlFilter(request.filter, {
				startIndex: 2,
				qualifier: 't',
				metadataFields: this.config.metadataFields,
			});
			where += ` AND ${compiled.clause}`;
			params.push(...compiled.params);
		}
		params.push(request.topK);

		const sql =
			`SELECT t.*, ts_rank_cd(to_tsvector(${language}, t.content), query) AS score ` +
			`FROM ${this.table} t, plainto_tsquery(${language}, $1) query ` +
			`WHERE ${where} ORDER BY score DESC LIMIT $${params.length}`;

		const result = await this.run<DocumentRow>('keywordSearch', ERROR_MESSAGES.SEARCH_FAILED, sql, params);
		return result.rows.map(row => this.toDocument(row));
	}

	/**
	 * Orders by the raw distance operator so an HNSW index built for the same
	 * metric can serve the query; the score column carries the metric's own sign.
	 */
	async vectorSearch(request: VectorSearchRequest): Promise<Document[]> {
		await this.indexManager.prepareQuery(this.config.vectorSearch);

		const distance = `embedding ${DISTANCE_OPERATORS[request.metric]} $1::vector`;
		const params: unknown[] = [formatVector(request.embedding)];
		let where = 'embedding IS NOT NULL';

		if (request.filter) {
			const compiled = compileSqlFilter(request.filter, {
				startIndex: 2,
				metadataFields: this.config.metadataFields,
			});
			where += ` AND ${compiled.clause}`;
			params.push(...compiled.params);
		}
		params.push(request.topK);

		const sql =
			`SELECT *, ${SCORE_EXPRESSIONS[request.metric](distance)} AS score FROM ${this.table} ` +
			`WHERE ${where} ORDER BY ${distance} LIMIT $${params.length}`;

		const result = await this.run<DocumentRow>('vectorSearch', ERROR_MESSAGES.SEARCH_FAILED, sql, params);
		return result.rows.map(row => this.toDocument(row));
	}

	async dropStorage(): Promise<void> {
		await this.run('deleteStorage', ERROR_MESSAGES.DROP_STORAGE_FAILED, `DROP TABLE IF EXISTS ${this.table}`);
		this.logger.info(`${LOG_PREFIXES.PGVECTOR} Dropped table ${this.table}`);
	}

	// Schema helpers

	private createTableStatement(): string {
		return `CREATE TABLE IF NOT EXISTS ${this.table} (
			id VARCHAR(128) PRIMARY KEY,
			embedding VECTOR(${this.config.embeddingDimension}),
			content TEXT,
			tabular JSONB,
			blob_data BYTEA,
			blob_meta JSONB,
			blob_mime_type VARCHAR(255),
			metadata JSONB)`;
	}

	private async indexExists(name: string): Promise<boolean> {
		const result = await this.exec(
			'SELECT 1 FROM pg_indexes WHERE schemaname = $1 AND tablename = $2 AND indexname = $3',
			[this.config.schemaName, this.config.tableName, name]
		);
		return result.rows.length > 0;
	}

	private async createHnswIndex(definition: ApproximateIndexDefinition): Promise<void> {
		const options: string[] = [];
		if (definition.m !== undefined) options.push(`m = ${definition.m}`);
		if (definition.efConstruction !== undefined) options.push(`ef_construction = ${definition.efConstruction}`);

		let sql =
			`CREATE INDEX ${escapeIdentifier(definition.name)} ON ${this.table} ` +
			`USING hnsw (embedding ${OPERATOR_CLASSES[definition.metric]})`;
		if (options.length > 0) {
			sql += ` WITH (${options.join(', ')})`;
		}
		await this.exec(sql);
	}

	private async ensureKeywordIndex(): Promise<void> {
		const name = this.config.keywordIndexName;
		const exists = await this.step('initialize', ERROR_MESSAGES.SCHEMA_INIT_FAILED, () => this.indexExists(name));
		if (exists) {
			return;
		}
		this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Creating keyword index '${name}'`);
		await this.run(
			'initialize',
			ERROR_MESSAGES.SCHEMA_INIT_FAILED,
			`CREATE INDEX ${escapeIdentifier(name)} ON ${this.table} ` +
				`USING GIN (to_tsvector(${escapeLiteral(this.config.language)}, content))`
		);
	}

	private async ensureMetadataIndexes(): Promise<void> {
		for (const [key, kind] of Object.entries(this.config.metadataFields)) {
			const name = escapeIdentifier(`${this.config.tableName}_meta_${key}_idx`);
			await this.run(
				'initialize',
				ERROR_MESSAGES.SCHEMA_INIT_FAILED,
				`CREATE INDEX IF NOT EXISTS ${name} ON ${this.table} ((${postgresMetadataExpression('metadata', escapeLiteral(key), kind)}))`
			);
		}
	}

	// Statement helpers

	private insertStatement(documents: Document[], policy: DuplicatePolicy): { sql: string; params: unknown[] } {
		const params: unknown[] = [];
		const tuples = documents.map(document => {
			const placeholders = this.toRow(document).map(value => {
				params.push(value);
				return `$${params.length}`;
			});
			return `(${placeholders.join(', ')})`;
		});

		let sql = `INSERT INTO ${this.table} (${COLUMNS.join(', ')}) VALUES ${tuples.join(', ')}`;
		if (policy === DuplicatePolicy.SKIP) {
			sql += ' ON CONFLICT (id) DO NOTHING';
		} else if (policy === DuplicatePolicy.OVERWRITE) {
			const updates = COLUMNS.filter(column => column !== 'id').map(column => `${column} = EXCLUDED.${column}`);
			sql += ` ON CONFLICT (id) DO UPDATE SET ${updates.join(', ')}`;
		}
		return { sql: `${sql} RETURNING id`, params };
	}

	private toRow(document: Document): unknown[] {
		return [
			document.id,
			document.embedding ? formatVector(document.embedding) : null,
			document.content ?? null,
			document.tabular ? JSON.stringify(document.tabular) : null,
			document.blob ? Buffer.from(document.blob.data) : null,
			document.blob?.meta ? JSON.stringify(document.blob.meta) : null,
			document.blob?.mimeType ?? null,
			JSON.stringify(document.metadata ?? {}),
		];
	}

	private toDocument(row: DocumentRow): Document {
		const document: Document = { id: row.id, metadata: { ...(row.metadata ?? {}) } };
		if (row.content !== null) document.content = row.content;
		if (row.embedding !== null) {
			document.embedding = typeof row.embedding === 'string' ? parseVector(row.embedding) : [...row.embedding];
		}
		if (row.tabular !== null) document.tabular = row.tabular;
		if (row.blob_data !== null) {
			const blob: DocumentBlob = { data: new Uint8Array(row.blob_data) };
			if (row.blob_mime_type !== null) blob.mimeType = row.blob_mime_type;
			if (row.blob_meta !== null) blob.meta = row.blob_meta;
			document.blob = blob;
		}
		if (row.score !== undefined && row.score !== null) document.score = Number(row.score);
		return document;
	}

	// Execution helpers

	private requireClient(): Client {
		if (!this.client) {
			throw new DocumentStoreError(ERROR_MESSAGES.NOT_CONNECTED, 'query');
		}
		return this.client;
	}

	private async exec<R extends QueryResultRow = QueryResultRow>(
		sql: string,
		params: unknown[] = []
	): Promise<QueryResult<R>> {
		const client = this.requireClient();
		this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Executing statement`, { sql, params });
		return client.query<R>(sql, params);
	}

	private async run<R extends QueryResultRow = QueryResultRow>(
		operation: string,
		message: string,
		sql: string,
		params: unknown[] = []
	): Promise<QueryResult<R>> {
		return this.step(operation, message, () => this.exec<R>(sql, params));
	}

	private async step<T>(operation: string, message: string, task: () => Promise<T>): Promise<T> {
		try {
			return await task();
		} catch (error) {
			throw this.translate(error, operation, message);
		}
	}

	private async rollback(): Promise<void> {
		try {
			await this.exec('ROLLBACK');
		} catch (error) {
			this.logger.debug(`${LOG_PREFIXES.PGVECTOR} Rollback failed`, { error: String(error) });
		}
	}

	private translate(error: unknown, operation: string, message: string): DocumentStoreError {
		if (error instanceof DocumentStoreError) {
			return error;
		}
		this.logger.debug(`${LOG_PREFIXES.PGVECTOR} ${message}`, {
			operation,
			error: error instanceof Error ? error.message : String(error),
		});
		if (isUniqueViolation(error)) {
			return new DuplicateDocumentError(
				formatErrorMessage(ERROR_MESSAGES.DUPLICATE_DOCUMENT, error, this.config.errorDetail),
				[],
				error
			);
		}
		return toDocumentStoreError(error, { operation, message, detail: this.config.errorDetail });
	}
}
