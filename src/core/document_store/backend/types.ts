/**
 * Document Store Backend Types and Error Classes
 *
 * Every backend-native failure is translated into one of the classes below at
 * the adapter boundary. Messages are safe to show; the native error stays on
 * `cause` and its text only reaches the debug logs unless `errorDetail` is
 * set to 'debug'.
 *
 * @module document_store/backend/types
 */

import type { DocumentStoreBackend } from './document-store-backend.js';

export type { DocumentStoreBackend };

import type { ErrorDetail } from '../config.js';

export type {
	DocumentStoreConfig,
	ResolvedDocumentStoreConfig,
	PgVectorStoreConfig,
	AzureAISearchStoreConfig,
	InMemoryStoreConfig,
	VectorSearchConfig,
	ApproximateIndexConfig,
	ErrorDetail,
} from '../config.js';

/**
 * Base Document Store Error Class
 *
 * Any backend execution failure: connectivity, integrity violations not
 * classified as duplicates, index build/drop failures.
 *
 * @example
 * ```typescript
 * throw new DocumentStoreError('Could not count documents', 'count', pgError);
 * ```
 */
export class DocumentStoreError extends Error {
	constructor(
		override message: string,
		/** The operation that failed (e.g., 'write', 'filter', 'index') */
		public readonly operation: string,
		/** The underlying error that caused this error, if any */
		public override readonly cause?: unknown
	) {
		super(message);
		this.name = 'DocumentStoreError';
	}
}

/**
 * Configuration Error
 *
 * Missing or invalid credentials, endpoint or options, and unsupported
 * metadata field types. Raised at construction or index-definition time.
 */
export class ConfigurationError extends DocumentStoreError {
	constructor(
		override message: string,
		/** Offending option paths, when known */
		public readonly issues: string[] = [],
		public override readonly cause?: unknown
	) {
		super(message, 'configuration', cause);
		this.name = 'ConfigurationError';
	}
}

/**
 * Filter Syntax Error
 *
 * A malformed filter expression. Always raised before any backend call.
 */
export class FilterSyntaxError extends DocumentStoreError {
	constructor(
		message: string,
		/** Location of the offending node, e.g. `operands[1].value` */
		public readonly path: string = '',
		cause?: unknown
	) {
		super(path ? `${message} (at ${path})` : message, 'filter', cause);
		this.name = 'FilterSyntaxError';
	}
}

/**
 * Duplicate Document Error
 *
 * Raised when a write with the 'fail' policy meets an id that already exists.
 * Nothing from that call is persisted.
 */
export class DuplicateDocumentError extends DocumentStoreError {
	constructor(
		override message: string,
		/** The conflicting ids, when the backend reports them */
		public readonly documentIds: string[] = [],
		public override readonly cause?: unknown
	) {
		super(message, 'write', cause);
		this.name = 'DuplicateDocumentError';
	}
}

/**
 * Invalid Argument Error
 *
 * The caller passed something unusable: an empty query, a non-positive topK,
 * a malformed document. Raised before any backend call.
 */
export class InvalidArgumentError extends DocumentStoreError {
	constructor(override message: string, operation: string, cause?: unknown) {
		super(message, operation, cause);
		this.name = 'InvalidArgumentError';
	}
}

/**
 * Invalid Document Error
 *
 * A write batch contained an element that is not a well-formed document.
 */
export class InvalidDocumentError extends InvalidArgumentError {
	constructor(
		override message: string,
		/** Position of the offending element in the batch */
		public readonly index: number
	) {
		super(message, 'write');
		this.name = 'InvalidDocumentError';
	}
}

/**
 * Vector Dimension Error
 *
 * An embedding whose length differs from the configured embeddingDimension.
 *
 * @example
 * ```typescript
 * throw new VectorDimensionError('vectorSearch', expected, actual);
 * ```
 */
export class VectorDimensionError extends InvalidArgumentError {
	constructor(
		operation: string,
		/** The configured embedding dimension */
		public readonly expectedDimension: number,
		/** The length actually received */
		public readonly actualDimension: number,
		documentId?: string
	) {
		super(
			`Embedding dimension mismatch${documentId ? ` for document '${documentId}'` : ''}: expected ${expectedDimension}, got ${actualDimension}`,
			operation
		);
		this.name = 'VectorDimensionError';
	}
}

/**
 * Controls how much of a native error is exposed on thrown messages.
 */
export interface ErrorTranslation {
	/** Operation name recorded on the thrown error */
	operation: string;
	/** Human-readable sentence used as the message */
	message: string;
	/** 'debug' appends the native message */
	detail: ErrorDetail;
}

/**
 * Wraps a native failure in a DocumentStoreError. Errors that already belong
 * to the taxonomy pass through unchanged.
 */
export function toDocumentStoreError(error: unknown, translation: ErrorTranslation): DocumentStoreError {
	if (error instanceof DocumentStoreError) {
		return error;
	}
	return new DocumentStoreError(
		formatErrorMessage(translation.message, error, translation.detail),
		translation.operation,
		error
	);
}

/**
 * The message thrown for a native failure at the given detail level
 */
export function formatErrorMessage(message: string, error: unknown, detail: ErrorDetail): string {
	if (detail === 'debug') {
		return `${message}: ${error instanceof Error ? error.message : String(error)}`;
	}
	return `${message}. See the debug logs for details.`;
}
