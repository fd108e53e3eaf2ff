/**
 * Similarity metrics
 *
 * Exact scoring for the in-memory backend, result ordering for every backend,
 * and conversion of Azure AI Search relevance scores back to metric values.
 *
 * @module document_store/similarity
 */

import { SIMILARITY_METRICS, type SimilarityMetric } from './constants.js';
import type { Document } from './document.js';

export function dotProduct(a: number[], b: number[]): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += (a[i] ?? 0) * (b[i] ?? 0);
	}
	return sum;
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero norm
 */
export function cosineSimilarity(a: number[], b: number[]): number {
	const normA = Math.sqrt(dotProduct(a, a));
	const normB = Math.sqrt(dotProduct(b, b));
	if (normA === 0 || normB === 0) {
		return 0;
	}
	return dotProduct(a, b) / (normA * normB);
}

export function l2Distance(a: number[], b: number[]): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		const diff = (a[i] ?? 0) - (b[i] ?? 0);
		sum += diff * diff;
	}
	return Math.sqrt(sum);
}

export function scoreVectors(metric: SimilarityMetric, a: number[], b: number[]): number {
	switch (metric) {
		case SIMILARITY_METRICS.COSINE:
			return cosineSimilarity(a, b);
		case SIMILARITY_METRICS.INNER_PRODUCT:
			return dotProduct(a, b);
		case SIMILARITY_METRICS.L2:
			return l2Distance(a, b);
	}
}

/**
 * Distances sort ascending, similarities descending
 */
export function isDistanceMetric(metric: SimilarityMetric): boolean {
	return metric === SIMILARITY_METRICS.L2;
}

/**
 * Sorts scored documents best first. Ties keep their input order.
 */
export function sortByMetric(documents: Document[], metric: SimilarityMetric): Document[] {
	const direction = isDistanceMetric(metric) ? 1 : -1;
	return [...documents].sort((a, b) => direction * ((a.score ?? 0) - (b.score ?? 0)));
}

/**
 * Azure AI Search normalizes every metric into a relevance score where higher
 * is better. This maps it back onto the configured metric's own scale.
 *
 * - euclidean: score = 1 / (1 + distance)
 * - cosine: score = 1 / (2 - similarity)
 * - dotProduct: score is the raw inner product
 */
export function fromAzureScore(metric: SimilarityMetric, score: number): number {
	switch (metric) {
		case SIMILARITY_METRICS.L2:
			return score > 0 ? 1 / score - 1 : Number.POSITIVE_INFINITY;
		case SIMILARITY_METRICS.COSINE:
			return score > 0 ? 2 - 1 / score : -1;
		case SIMILARITY_METRICS.INNER_PRODUCT:
			return score;
	}
}
