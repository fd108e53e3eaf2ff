/**
 * Filter AST
 *
 * Backend-neutral boolean filter expressions. A node is either a comparison
 * leaf or a logical combinator, never both.
 *
 * @module document_store/filters/types
 */

export const COMPARISON_OPERATORS = ['==', '!=', '>', '>=', '<', '<=', 'in', 'not in'] as const;
export const LOGICAL_OPERATORS = ['AND', 'OR', 'NOT'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];
export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];

/** A single comparable value */
export type FilterScalar = string | number | boolean | null;

/** Scalars for ==, !=, ordering; homogeneous lists for in / not in */
export type FilterValue = FilterScalar | Array<string | number | boolean>;

/**
 * Which stored attribute a comparison reads
 *
 * `id` and `content` are document attributes; anything else is a metadata key.
 */
export type FieldRef = { kind: 'attribute'; name: 'id' | 'content' } | { kind: 'metadata'; key: string };

export interface ComparisonExpression {
	type: 'comparison';
	field: FieldRef;
	operator: ComparisonOperator;
	value: FilterValue;
}

export interface LogicalExpression {
	type: 'logical';
	operator: LogicalOperator;
	operands: FilterExpression[];
}

export type FilterExpression = ComparisonExpression | LogicalExpression;

/**
 * The wire shape callers pass in
 *
 * @example
 * ```typescript
 * const filter: FilterInput = {
 *   logicalOperator: 'AND',
 *   operands: [
 *     { field: 'meta.category', operator: '==', value: 'news' },
 *     { field: 'meta.year', operator: '>=', value: 2020 },
 *   ],
 * };
 * ```
 */
export type FilterInput =
	| { field: string; operator: ComparisonOperator; value: FilterValue }
	| { logicalOperator: LogicalOperator; operands: FilterInput[] };

/**
 * A compiled fragment and its ordered bind values
 */
export interface CompiledFilter {
	clause: string;
	params: FilterScalar[];
}

export type FilterDialect = 'sql' | 'odata';
