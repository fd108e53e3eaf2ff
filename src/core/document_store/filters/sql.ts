/**
 * SQL filter dialect (PostgreSQL)
 *
 * Compiles the AST into a WHERE fragment with `$n` placeholders. Values and
 * undeclared metadata keys are bound as parameters; only declared field names,
 * which config restricts to identifiers, appear as literals. Every leaf
 * evaluates to TRUE or FALSE, never NULL, so NOT behaves the same as in the
 * other dialects.
 *
 * @module document_store/filters/sql
 */

import {
	postgresMetadataExpression,
	typedJsonbRead,
	valueMatchesKind,
	type JsonbType,
	type MetadataFieldKind,
	type MetadataFieldMap,
} from '../metadata-fields.js';
import type { CompiledFilter, ComparisonExpression, FieldRef, FilterExpression, FilterScalar } from './types.js';

export interface SqlCompileOptions {
	/** Number of the first placeholder (default 1) */
	startIndex?: number;
	/** Table alias prefixed to column references */
	qualifier?: string;
	/**
	 * Declared metadata fields. A comparison whose values fit the declared kind
	 * reads the same expression the field's index is built on.
	 */
	metadataFields?: MetadataFieldMap;
}

const SQL_OPERATORS = {
	'==': '=',
	'!=': '<>',
	'>': '>',
	'>=': '>=',
	'<': '<',
	'<=': '<=',
} as const;

const UNDECLARED_READS: Record<'string' | 'number' | 'boolean', { jsonType: JsonbType; cast: string }> = {
	string: { jsonType: 'string', cast: 'text' },
	number: { jsonType: 'number', cast: 'numeric' },
	boolean: { jsonType: 'boolean', cast: 'boolean' },
};

type ComparedValue = string | number | boolean;

function quoteLiteral(value: string): string {
	return `'${value.replace(/'/g, "''")}'`;
}

class SqlContext {
	readonly params: FilterScalar[] = [];
	private readonly declared: Map<string, MetadataFieldKind>;

	constructor(
		private next: number,
		private readonly prefix: string,
		fields: MetadataFieldMap
	) {
		this.declared = new Map(Object.entries(fields));
	}

	bind(value: FilterScalar): string {
		this.params.push(value);
		return `$${this.next++}`;
	}

	/** Untyped read, NULL only when the value is absent */
	presence(field: FieldRef): string {
		if (field.kind === 'attribute') {
			return `${this.prefix}${field.name}`;
		}
		return `${this.prefix}metadata->>${this.bind(field.key)}::text`;
	}

	/**
	 * Read typed after the compared values. A stored value of another JSON type
	 * reads as NULL, so it fails every comparison except the negated ones.
	 */
	typed(field: FieldRef, values: ComparedValue[]): string {
		if (field.kind === 'attribute') {
			return `${this.prefix}${field.name}`;
		}
		const column = `${this.prefix}metadata`;
		const kind = this.declared.get(field.key);
		if (kind !== undefined && values.every(value => valueMatchesKind(kind, value))) {
			return postgresMetadataExpression(column, quoteLiteral(field.key), kind);
		}
		const sample = values[0];
		const read = UNDECLARED_READS[typeof sample === 'number' ? 'number' : typeof sample === 'boolean' ? 'boolean' : 'string'];
		return typedJsonbRead(column, `${this.bind(field.key)}::text`, read.jsonType, read.cast);
	}
}

function compileComparison(expr: ComparisonExpression, ctx: SqlContext): string {
	const { operator, value } = expr;

	if (operator === 'in' || operator === 'not in') {
		const items = Array.isArray(value) ? value : [];
		if (items.length === 0) {
			return operator === 'in' ? 'FALSE' : 'TRUE';
		}
		const column = ctx.typed(expr.field, items);
		const placeholders = items.map(item => ctx.bind(item)).join(', ');
		return operator === 'in'
			? `COALESCE(${column} IN (${placeholders}), FALSE)`
			: `COALESCE(${column} NOT IN (${placeholders}), TRUE)`;
	}

	const scalar = Array.isArray(value) ? null : value;

	if (scalar === null) {
		if (operator === '==') return `${ctx.presence(expr.field)} IS NULL`;
		if (operator === '!=') return `${ctx.presence(expr.field)} IS NOT NULL`;
		return 'FALSE';
	}

	const column = ctx.typed(expr.field, [scalar]);
	if (operator === '!=') return `${column} IS DISTINCT FROM ${ctx.bind(scalar)}`;
	return `COALESCE(${column} ${SQL_OPERATORS[operator]} ${ctx.bind(scalar)}, FALSE)`;
}

function compileNode(expr: FilterExpression, ctx: SqlContext): string {
	if (expr.type === 'comparison') {
		return compileComparison(expr, ctx);
	}
	const parts = expr.operands.map(operand => compileNode(operand, ctx));
	if (expr.operator === 'NOT') {
		return `NOT (${parts.join(' AND ')})`;
	}
	const joined = parts.join(` ${expr.operator} `);
	return parts.length > 1 ? `(${joined})` : joined;
}

/**
 * Compiles a filter into a PostgreSQL WHERE fragment
 *
 * @example
 * ```typescript
 * const { clause, params } = compileSqlFilter(parseFilter(input), { startIndex: 2 });
 * await client.query(`SELECT * FROM docs WHERE ${clause} LIMIT $1`, [10, ...params]);
 * ```
 */
export function compileSqlFilter(expr: FilterExpression, options: SqlCompileOptions = {}): CompiledFilter {
	const ctx = new SqlContext(
		options.startIndex ?? 1,
		options.qualifier ? `${options.qualifier}.` : '',
		options.metadataFields ?? {}
	);
	const clause = compileNode(expr, ctx);
	return { clause, params: ctx.params };
}
