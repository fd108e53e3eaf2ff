/**
 * Write Pipeline
 *
 * Backend-independent half of `write()`: batch validation, in-batch duplicate
 * resolution and, for adapters that check-then-replace, the plan that splits
 * a batch into inserts, overwrites and skips. Adapters with a native upsert
 * only need {@link prepareWriteBatch}.
 *
 * @module document_store/write-pipeline
 */

import { DuplicatePolicy, ERROR_MESSAGES } from './constants.js';
import { DocumentSchema, normalizeDocument, type Document } from './document.js';
import {
	DuplicateDocumentError,
	InvalidArgumentError,
	InvalidDocumentError,
	VectorDimensionError,
} from './backend/types.js';

const POLICIES: readonly DuplicatePolicy[] = [DuplicatePolicy.FAIL, DuplicatePolicy.SKIP, DuplicatePolicy.OVERWRITE];

/**
 * Outcome of planning a batch against the ids already stored
 */
export interface WritePlan {
	/** Ids not yet stored */
	inserts: Document[];
	/** Ids already stored, replaced in full */
	overwrites: Document[];
	/** Ids already stored and left untouched */
	skipped: Document[];
}

export interface WriteBatchOptions {
	embeddingDimension: number;
	policy: DuplicatePolicy;
}

export function isDuplicatePolicy(value: unknown): value is DuplicatePolicy {
	return POLICIES.some(policy => policy === value);
}

/**
 * @throws {InvalidArgumentError} When the value is not a known policy
 */
export function resolvePolicy(value: unknown, fallback: DuplicatePolicy): DuplicatePolicy {
	if (value === undefined) {
		return fallback;
	}
	if (!isDuplicatePolicy(value)) {
		throw new InvalidArgumentError(
			`Unknown duplicate policy '${String(value)}'. Expected one of: ${POLICIES.join(', ')}`,
			'write'
		);
	}
	return value;
}

/**
 * Validates a batch and resolves duplicates within it
 *
 * The whole batch is rejected when any element is malformed. Ids repeated
 * inside the batch follow the policy: 'fail' rejects the batch, 'skip' keeps
 * the first occurrence, 'overwrite' keeps the last.
 *
 * @throws {InvalidArgumentError} When `documents` is not an array
 * @throws {InvalidDocumentError} For the first malformed element
 * @throws {VectorDimensionError} For the first embedding of the wrong length
 * @throws {DuplicateDocumentError} For repeated ids under 'fail'
 */
export function prepareWriteBatch(documents: unknown, options: WriteBatchOptions): Document[] {
	if (!Array.isArray(documents)) {
		throw new InvalidArgumentError('documents must be an array of documents', 'write');
	}

	const batch: Document[] = documents.map((raw: unknown, index) => {
		const result = DocumentSchema.safeParse(raw);
		if (!result.success) {
			const issues = result.error.errors.map(e => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message));
			throw new InvalidDocumentError(`Invalid document at position ${index}: ${issues.join(', ')}`, index);
		}
		const document = normalizeDocument(result.data);
		if (document.embedding && document.embedding.length !== options.embeddingDimension) {
			throw new VectorDimensionError('write', options.embeddingDimension, document.embedding.length, document.id);
		}
		return document;
	});

	const unique = new Map<string, Document>();
	const repeated = new Set<string>();
	for (const document of batch) {
		if (!unique.has(document.id)) {
			unique.set(document.id, document);
			continue;
		}
		repeated.add(document.id);
		if (options.policy === DuplicatePolicy.OVERWRITE) {
			unique.delete(document.id);
			unique.set(document.id, document);
		}
	}

	if (repeated.size > 0 && options.policy === DuplicatePolicy.FAIL) {
		const ids = [...repeated];
		throw new DuplicateDocumentError(`${ERROR_MESSAGES.DUPLICATE_DOCUMENT}: ${ids.join(', ')}`, ids);
	}

	return [...unique.values()];
}

/**
 * Splits a prepared batch against the ids currently stored
 *
 * @throws {DuplicateDocumentError} Under 'fail' when any id is already stored
 */
export function planWrite(documents: Document[], existingIds: ReadonlySet<string>, policy: DuplicatePolicy): WritePlan {
	const plan: WritePlan = { inserts: [], overwrites: [], skipped: [] };

	for (const document of documents) {
		if (!existingIds.has(document.id)) {
			plan.inserts.push(document);
		} else if (policy === DuplicatePolicy.OVERWRITE) {
			plan.overwrites.push(document);
		} else {
			plan.skipped.push(document);
		}
	}

	if (policy === DuplicatePolicy.FAIL && plan.skipped.length > 0) {
		const ids = plan.skipped.map(document => document.id);
		throw new DuplicateDocumentError(`${ERROR_MESSAGES.DUPLICATE_DOCUMENT}: ${ids.join(', ')}`, ids);
	}

	return plan;
}

/**
 * Number of documents a plan persists
 */
export function writtenCount(plan: WritePlan): number {
	return plan.inserts.length + plan.overwrites.length;
}
