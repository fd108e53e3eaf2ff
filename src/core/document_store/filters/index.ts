/**
 * Filter Compiler
 *
 * Turns a backend-neutral filter into a parameterized fragment for one
 * dialect. Pure: no backend I/O.
 *
 * @module document_store/filters
 */

import { compileODataFilter, type ODataCompileOptions } from './odata.js';
import { compileSqlFilter, type SqlCompileOptions } from './sql.js';
import type { CompiledFilter, FilterDialect, FilterExpression } from './types.js';

export * from './types.js';
export { parseFilter, parseFieldRef } from './parse.js';
export { compileSqlFilter, type SqlCompileOptions } from './sql.js';
export { compileODataFilter, bindODataFilter, toODataLiteral, type ODataCompileOptions } from './odata.js';
export { matchesFilter } from './evaluate.js';

export type CompileOptions = SqlCompileOptions & ODataCompileOptions;

/**
 * Compiles a parsed filter for the given dialect
 */
export function compileFilter(
	expr: FilterExpression,
	dialect: FilterDialect,
	options: CompileOptions = {}
): CompiledFilter {
	return dialect === 'sql' ? compileSqlFilter(expr, options) : compileODataFilter(expr, options);
}
