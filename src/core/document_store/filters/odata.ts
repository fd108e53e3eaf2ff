/**
 * OData filter dialect (Azure AI Search)
 *
 * The search service takes a single `$filter` string and has no bind
 * parameters, so compilation happens in two steps: the AST becomes a template
 * with `@pN` placeholders, then {@link bindODataFilter} encodes each value as
 * an OData literal in one pass over the template.
 *
 * @module document_store/filters/odata
 */

import { FilterSyntaxError } from '../backend/types.js';
import type { CompiledFilter, ComparisonExpression, FilterExpression, FilterScalar } from './types.js';

export interface ODataCompileOptions {
	/** When set, fields outside this set are rejected */
	filterableFields?: ReadonlySet<string>;
}

const ODATA_OPERATORS = {
	'==': 'eq',
	'!=': 'ne',
	'>': 'gt',
	'>=': 'ge',
	'<': 'lt',
	'<=': 'le',
} as const;

const ODATA_FIELD = /^[A-Za-z_][A-Za-z0-9_]*$/;

class ODataContext {
	readonly params: FilterScalar[] = [];

	constructor(private readonly filterable?: ReadonlySet<string>) {}

	bind(value: FilterScalar): string {
		this.params.push(value);
		return `@p${this.params.length}`;
	}

	field(expr: ComparisonExpression): string {
		const name = expr.field.kind === 'attribute' ? expr.field.name : expr.field.key;
		if (!ODATA_FIELD.test(name)) {
			throw new FilterSyntaxError(`Field '${name}' is not a valid search index field name`);
		}
		if (this.filterable && !this.filterable.has(name)) {
			throw new FilterSyntaxError(`Field '${name}' is not filterable in this index`);
		}
		return name;
	}
}

function compileComparison(expr: ComparisonExpression, ctx: ODataContext): string {
	const field = ctx.field(expr);
	const { operator, value } = expr;

	if (operator === 'in' || operator === 'not in') {
		const items = Array.isArray(value) ? value : [];
		if (items.length === 0) {
			return operator === 'in' ? 'false' : 'true';
		}
		const terms = items.map(item => `${field} eq ${ctx.bind(item)}`);
		const any = terms.length > 1 ? `(${terms.join(' or ')})` : terms.join('');
		return operator === 'in' ? any : `not (${terms.join(' or ')})`;
	}

	const scalar = Array.isArray(value) ? null : value;
	return `${field} ${ODATA_OPERATORS[operator]} ${ctx.bind(scalar)}`;
}

function compileNode(expr: FilterExpression, ctx: ODataContext): string {
	if (expr.type === 'comparison') {
		return compileComparison(expr, ctx);
	}
	const parts = expr.operands.map(operand => compileNode(operand, ctx));
	if (expr.operator === 'NOT') {
		return `not (${parts.join(' and ')})`;
	}
	const joined = parts.join(` ${expr.operator.toLowerCase()} `);
	return parts.length > 1 ? `(${joined})` : joined;
}

/**
 * Compiles a filter into an OData template and its ordered values
 */
export function compileODataFilter(expr: FilterExpression, options: ODataCompileOptions = {}): CompiledFilter {
	const ctx = new ODataContext(options.filterableFields);
	const clause = compileNode(expr, ctx);
	return { clause, params: ctx.params };
}

/**
 * Encodes a value as an OData literal
 */
export function toODataLiteral(value: FilterScalar): string {
	if (value === null) return 'null';
	if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`;
	return String(value);
}

/**
 * Substitutes `@pN` placeholders with encoded literals
 *
 * @example
 * ```typescript
 * bindODataFilter({ clause: 'name eq @p1', params: ["O'Hara"] }); // "name eq 'O''Hara'"
 * ```
 */
export function bindODataFilter(compiled: CompiledFilter): string {
	return compiled.clause.replace(/@p(\d+)/g, (placeholder, index: string) => {
		const position = Number(index) - 1;
		if (position < 0 || position >= compiled.params.length) {
			throw new FilterSyntaxError(`Unbound placeholder ${placeholder}`);
		}
		const value = compiled.params[position];
		return toODataLiteral(value === undefined ? null : value);
	});
}
