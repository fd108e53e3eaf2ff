import { describe, it, expect } from 'vitest';
import { parseFilter } from '../parse.js';
import { compileSqlFilter, type SqlCompileOptions } from '../sql.js';
import { bindODataFilter, compileODataFilter } from '../odata.js';
import { matchesFilter } from '../evaluate.js';
import type { Document } from '../../document.js';
import { selectWithOData, selectWithSql } from './dialect-interpreters.js';

// Mixed-type rows: d3 holds field2 as a string, d6 holds a string no numeric cast accepts
const fixture: Document[] = [
	{ id: 'd0', metadata: { field: 'a', field2: 1 } },
	{ id: 'd1', metadata: { field: 'a', field2: 2 } },
	{ id: 'd2', metadata: { field: 'a', field2: 3 } },
	{ id: 'd3', metadata: { field: 'a', field2: '1' } },
	{ id: 'd4', metadata: { field: 'b', field2: 1 } },
	{ id: 'd5', metadata: { field: 'b', field2: 2 } },
	{ id: 'd6', metadata: { field: 'a', field2: 'n/a' } },
	{ id: 'd7', metadata: { field2: 1 } },
	{ id: 'd8', metadata: { field: 'a', field2: 2 } },
	{ id: 'd9', metadata: { field: 'A', field2: 1 } },
];

function selectAll(input: unknown, sqlOptions: SqlCompileOptions = {}) {
	const expr = parseFilter(input);
	return {
		evaluated: fixture.filter(document => matchesFilter(expr, document)).map(document => document.id),
		sql: selectWithSql(compileSqlFilter(expr, sqlOptions), fixture),
		odata: selectWithOData(bindODataFilter(compileODataFilter(expr)), fixture),
	};
}

function expectEveryDialect(input: unknown, ids: string[]) {
	expect(selectAll(input)).toEqual({ evaluated: ids, sql: ids, odata: ids });
	expect(selectAll(input, { metadataFields: { field: 'text', field2: 'integer' } }).sql).toEqual(ids);
}

describe('filter dialects', () => {
	it('should select the same 3 of 10 documents for AND(field=="a", OR(field2==1, field2==2))', () => {
		expectEveryDialect(
			{
				logicalOperator: 'AND',
				operands: [
					{ field: 'field', operator: '==', value: 'a' },
					{
						logicalOperator: 'OR',
						operands: [
							{ field: 'field2', operator: '==', value: 1 },
							{ field: 'field2', operator: '==', value: 2 },
						],
					},
				],
			},
			['d0', 'd1', 'd8']
		);
	});

	it('should skip stored values of another type in ordered comparisons', () => {
		expectEveryDialect({ field: 'field2', operator: '>', value: 1 }, ['d1', 'd2', 'd5', 'd8']);
	});

	it('should match a string value only against stored strings', () => {
		expectEveryDialect({ field: 'field2', operator: '==', value: '1' }, ['d3']);
	});

	it('should treat a missing field as unequal', () => {
		expectEveryDialect({ field: 'field', operator: '!=', value: 'a' }, ['d4', 'd5', 'd7', 'd9']);
	});

	it('should keep values of another type in not in', () => {
		expectEveryDialect({ field: 'field2', operator: 'not in', value: [1, 2] }, ['d2', 'd3', 'd6']);
	});

	it('should negate comparisons that do not apply to a row', () => {
		expectEveryDialect(
			{ logicalOperator: 'NOT', operands: [{ field: 'field2', operator: '>=', value: 2 }] },
			['d0', 'd3', 'd4', 'd6', 'd7', 'd9']
		);
	});

	it('should agree on presence tests and string ordering', () => {
		expectEveryDialect({ field: 'field', operator: '==', value: null }, ['d7']);
		expectEveryDialect({ field: 'field', operator: '<', value: 'b' }, ['d0', 'd1', 'd2', 'd3', 'd6', 'd8', 'd9']);
	});

	it('should reject an unguarded numeric cast of a mixed-type row', () => {
		expect(() =>
			selectWithSql({ clause: '(metadata->>$1::text)::numeric > $2', params: ['field2', 1] }, fixture)
		).toThrow('invalid input syntax for type numeric: "n/a"');
	});
});
