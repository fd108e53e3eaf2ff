/**
 * In-process filter evaluation
 *
 * Reference semantics for the compiled dialects: a missing field makes `==`,
 * ordering and `in` false and `!=`, `not in` true. Values of different types
 * never compare equal.
 *
 * @module document_store/filters/evaluate
 */

import type { Document } from '../document.js';
import type { ComparisonExpression, FilterExpression, FilterScalar } from './types.js';

function readField(expr: ComparisonExpression, document: Document): FilterScalar | undefined {
	if (expr.field.kind === 'attribute') {
		return expr.field.name === 'id' ? document.id : document.content;
	}
	return document.metadata?.[expr.field.key];
}

function compareOrdered(actual: FilterScalar | undefined, expected: FilterScalar): number | undefined {
	if (typeof actual === 'number' && typeof expected === 'number') return actual - expected;
	if (typeof actual === 'string' && typeof expected === 'string') {
		if (actual === expected) return 0;
		return actual < expected ? -1 : 1;
	}
	return undefined;
}

function evaluateComparison(expr: ComparisonExpression, document: Document): boolean {
	const actual = readField(expr, document);
	const { operator, value } = expr;

	if (operator === 'in' || operator === 'not in') {
		const items = Array.isArray(value) ? value : [];
		const found = actual !== undefined && actual !== null && items.some(item => item === actual);
		return operator === 'in' ? found : !found;
	}

	const expected = Array.isArray(value) ? null : value;
	const present = actual !== undefined && actual !== null;

	switch (operator) {
		case '==':
			return expected === null ? !present : present && actual === expected;
		case '!=':
			return expected === null ? present : !present || actual !== expected;
		default: {
			const diff = present ? compareOrdered(actual, expected) : undefined;
			if (diff === undefined) return false;
			if (operator === '>') return diff > 0;
			if (operator === '>=') return diff >= 0;
			if (operator === '<') return diff < 0;
			return diff <= 0;
		}
	}
}

/**
 * Whether a document satisfies a filter
 */
export function matchesFilter(expr: FilterExpression, document: Document): boolean {
	if (expr.type === 'comparison') {
		return evaluateComparison(expr, document);
	}
	switch (expr.operator) {
		case 'AND':
			return expr.operands.every(operand => matchesFilter(operand, document));
		case 'OR':
			return expr.operands.some(operand => matchesFilter(operand, document));
		case 'NOT':
			return !expr.operands.every(operand => matchesFilter(operand, document));
	}
}
