/**
 * Filter parser
 *
 * Validates caller input and builds the typed AST. Every malformed node is
 * reported as a FilterSyntaxError carrying the path of the node.
 *
 * @module document_store/filters/parse
 */

import { FilterSyntaxError } from '../backend/types.js';
import {
	COMPARISON_OPERATORS,
	LOGICAL_OPERATORS,
	type ComparisonExpression,
	type ComparisonOperator,
	type FieldRef,
	type FilterExpression,
	type FilterScalar,
	type FilterValue,
	type LogicalOperator,
} from './types.js';

const ORDERING_OPERATORS: ReadonlySet<ComparisonOperator> = new Set(['>', '>=', '<', '<=']);

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isComparisonOperator(value: unknown): value is ComparisonOperator {
	return COMPARISON_OPERATORS.some(op => op === value);
}

function isLogicalOperator(value: unknown): value is LogicalOperator {
	return LOGICAL_OPERATORS.some(op => op === value);
}

function join(path: string, segment: string): string {
	return path ? `${path}.${segment}` : segment;
}

function describe(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	return typeof value;
}

/**
 * `id` and `content` address document attributes, `meta.<key>` and bare keys
 * address metadata.
 */
export function parseFieldRef(field: string, path: string = ''): FieldRef {
	if (field === 'id' || field === 'content') {
		return { kind: 'attribute', name: field };
	}
	const key = field.startsWith('meta.') ? field.slice('meta.'.length) : field;
	if (key.length === 0) {
		throw new FilterSyntaxError(`Invalid field '${field}'`, join(path, 'field'));
	}
	return { kind: 'metadata', key };
}

function parseValue(operator: ComparisonOperator, raw: unknown, path: string): FilterValue {
	const at = join(path, 'value');

	if (operator === 'in' || operator === 'not in') {
		if (!Array.isArray(raw)) {
			throw new FilterSyntaxError(`'${operator}' requires a list value, got ${describe(raw)}`, at);
		}
		const items: Array<string | number | boolean> = [];
		let itemType: string | undefined;
		raw.forEach((item: unknown, i) => {
			if (typeof item !== 'string' && typeof item !== 'boolean' && typeof item !== 'number') {
				throw new FilterSyntaxError(`List items must be strings, numbers or booleans`, `${at}[${i}]`);
			}
			if (typeof item === 'number' && !Number.isFinite(item)) {
				throw new FilterSyntaxError(`List items must be finite numbers`, `${at}[${i}]`);
			}
			if (itemType !== undefined && typeof item !== itemType) {
				throw new FilterSyntaxError(`List items must all have the same type`, `${at}[${i}]`);
			}
			itemType = typeof item;
			items.push(item);
		});
		return items;
	}

	if (ORDERING_OPERATORS.has(operator)) {
		if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
		if (typeof raw === 'string') return raw;
		throw new FilterSyntaxError(`'${operator}' requires a number or string value, got ${describe(raw)}`, at);
	}

	if (raw === null || typeof raw === 'string' || typeof raw === 'boolean') return raw;
	if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
	throw new FilterSyntaxError(`'${operator}' requires a scalar value, got ${describe(raw)}`, at);
}

function assertAttributeValue(field: FieldRef, value: FilterValue, path: string): void {
	if (field.kind !== 'attribute') return;
	const values: FilterScalar[] = Array.isArray(value) ? value : [value];
	if (values.some(v => v !== null && typeof v !== 'string')) {
		throw new FilterSyntaxError(`Field '${field.name}' can only be compared with strings`, join(path, 'value'));
	}
}

function parseComparison(node: Record<string, unknown>, path: string): ComparisonExpression {
	const { field, operator } = node;
	if (typeof field !== 'string' || field.length === 0) {
		throw new FilterSyntaxError(`Comparison requires a non-empty 'field'`, join(path, 'field'));
	}
	if (!isComparisonOperator(operator)) {
		throw new FilterSyntaxError(`Unknown operator '${String(operator)}'`, join(path, 'operator'));
	}
	if (!('value' in node)) {
		throw new FilterSyntaxError(`Comparison requires a 'value'`, path);
	}
	const ref = parseFieldRef(field, path);
	const value = parseValue(operator, node.value, path);
	assertAttributeValue(ref, value, path);
	return { type: 'comparison', field: ref, operator, value };
}

function parseNode(input: unknown, path: string): FilterExpression {
	if (!isRecord(input)) {
		throw new FilterSyntaxError(`Filter must be an object, got ${describe(input)}`, path);
	}

	const logical = input.logicalOperator ?? input.logical_operator;
	const hasLogical = logical !== undefined;
	const hasComparison = 'operator' in input;

	if (hasLogical && hasComparison) {
		throw new FilterSyntaxError(`Filter node cannot have both 'operator' and 'logicalOperator'`, path);
	}
	if (hasComparison) {
		return parseComparison(input, path);
	}
	if (!hasLogical) {
		throw new FilterSyntaxError(`Filter node must have either 'operator' or 'logicalOperator'`, path);
	}

	if (!isLogicalOperator(logical)) {
		throw new FilterSyntaxError(`Unknown logical operator '${String(logical)}'`, join(path, 'logicalOperator'));
	}
	const { operands } = input;
	if (!Array.isArray(operands)) {
		throw new FilterSyntaxError(`'${logical}' requires an 'operands' list`, join(path, 'operands'));
	}
	if (logical === 'NOT' && operands.length !== 1) {
		throw new FilterSyntaxError(`'NOT' requires exactly one operand, got ${operands.length}`, join(path, 'operands'));
	}
	if (operands.length === 0) {
		throw new FilterSyntaxError(`'${logical}' requires at least one operand`, join(path, 'operands'));
	}

	return {
		type: 'logical',
		operator: logical,
		operands: operands.map((operand: unknown, i) => parseNode(operand, `${join(path, 'operands')}[${i}]`)),
	};
}

/**
 * Parses a caller-supplied filter into the AST
 *
 * @throws {FilterSyntaxError} On any malformed node
 *
 * @example
 * ```typescript
 * const expr = parseFilter({ field: 'meta.year', operator: '>', value: 2020 });
 * ```
 */
export function parseFilter(input: unknown): FilterExpression {
	return parseNode(input, '');
}
