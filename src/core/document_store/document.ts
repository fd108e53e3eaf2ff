/**
 * Document model
 *
 * Documents are transient value objects owned by the caller. The store only
 * reads them on write and builds fresh ones on read.
 *
 * @module document_store/document
 */

import { z } from 'zod';

/**
 * Scalar metadata value
 */
export type MetadataValue = string | number | boolean;

/**
 * Raw binary payload carried alongside a document
 */
export interface DocumentBlob {
	data: Uint8Array;
	mimeType?: string;
	meta?: Record<string, unknown>;
}

/**
 * Tabular payload, one JSON record per row
 */
export type TabularPayload = Array<Record<string, unknown>>;

/**
 * A stored record
 *
 * @example
 * ```typescript
 * const doc: Document = {
 *   id: 'doc-1',
 *   content: 'Postgres supports JSONB',
 *   embedding: [0.1, 0.2, 0.3],
 *   metadata: { category: 'db', year: 2024 },
 * };
 * ```
 */
export interface Document {
	/** Unique within a store instance */
	id: string;
	content?: string;
	/** Exactly embeddingDimension components when present */
	embedding?: number[];
	metadata?: Record<string, MetadataValue>;
	blob?: DocumentBlob;
	tabular?: TabularPayload;
	/** Rank or similarity score, set on search results only */
	score?: number;
}

const MetadataValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

const BlobSchema = z.object({
	data: z.instanceof(Uint8Array),
	mimeType: z.string().optional(),
	meta: z.record(z.unknown()).optional(),
});

/**
 * Runtime shape of a document accepted by write()
 */
export const DocumentSchema = z.object({
	id: z.string({ required_error: 'id must be a string', invalid_type_error: 'id must be a string' }).min(1, 'id must not be empty'),
	content: z.string().nullish(),
	embedding: z.array(z.number().finite()).nullish(),
	metadata: z.record(MetadataValueSchema).nullish(),
	blob: BlobSchema.nullish(),
	tabular: z.array(z.record(z.unknown())).nullish(),
	score: z.number().nullish(),
});

/**
 * Normalizes a validated document: nullish fields become absent and the
 * score, which is output-only, is dropped.
 */
export function normalizeDocument(parsed: z.infer<typeof DocumentSchema>): Document {
	const document: Document = { id: parsed.id, metadata: { ...(parsed.metadata ?? {}) } };
	if (parsed.content !== null && parsed.content !== undefined) document.content = parsed.content;
	if (parsed.embedding !== null && parsed.embedding !== undefined) {
		document.embedding = [...parsed.embedding];
	}
	if (parsed.blob !== null && parsed.blob !== undefined) {
		const blob: DocumentBlob = { data: parsed.blob.data };
		if (parsed.blob.mimeType !== undefined) blob.mimeType = parsed.blob.mimeType;
		if (parsed.blob.meta !== undefined) blob.meta = parsed.blob.meta;
		document.blob = blob;
	}
	if (parsed.tabular !== null && parsed.tabular !== undefined) document.tabular = parsed.tabular;
	return document;
}
