/**
 * Test-only interpreters for compiled filters, so both dialects can be run
 * against the same in-process fixture.
 */

import type { CompiledFilter, FilterScalar } from '../types.js';
import type { Document } from '../../document.js';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tokenize(pattern: RegExp, source: string): string[] {
	const tokens: string[] = [];
	pattern.lastIndex = 0;
	while (pattern.lastIndex < source.length) {
		const start = pattern.lastIndex;
		const match = pattern.exec(source);
		const token = match?.[1];
		if (token === undefined) {
			throw new Error(`Unexpected input: ${source.slice(start)}`);
		}
		tokens.push(token);
	}
	return tokens;
}

function order(a: unknown, b: unknown): number | undefined {
	if (typeof a === 'number' && typeof b === 'number') return a - b;
	if (typeof a === 'string' && typeof b === 'string') return a === b ? 0 : a < b ? -1 : 1;
	return undefined;
}

class Cursor {
	private position = 0;

	constructor(private readonly tokens: string[]) {}

	peek(offset = 0): string | undefined {
		return this.tokens[this.position + offset];
	}

	next(): string {
		const token = this.tokens[this.position++];
		if (token === undefined) throw new Error('Unexpected end of input');
		return token;
	}

	accept(token: string): boolean {
		if (this.peek() !== token) return false;
		this.position++;
		return true;
	}

	expect(token: string): void {
		const actual = this.next();
		if (actual !== token) throw new Error(`Expected ${token}, got ${actual}`);
	}

	assertDone(): void {
		const rest = this.peek();
		if (rest !== undefined) throw new Error(`Trailing input at ${rest}`);
	}
}

type Json = { json: unknown };
type SqlValue = string | number | boolean | null | Json;
type SqlExpr = (row: Document) => SqlValue;

const SQL_TOKEN = /\s*(\$\d+|'(?:[^']|'')*'|::|->>|->|<>|>=|<=|[=<>(),]|[A-Za-z_][A-Za-z0-9_.]*)/y;
const SQL_COMPARISONS = new Set(['=', '<>', '>', '>=', '<', '<=']);

const isJson = (value: SqlValue): value is Json => typeof value === 'object' && value !== null;

function truth(value: SqlValue): boolean | null {
	if (value === null || typeof value === 'boolean') return value;
	throw new Error(`argument must be type boolean, got ${JSON.stringify(value)}`);
}

function scalar(value: SqlValue): string | number | boolean | null {
	if (isJson(value)) throw new Error('jsonb used where a scalar is expected');
	return value;
}

function sqlCompare(operator: string, left: SqlValue, right: SqlValue): SqlValue {
	const a = scalar(left);
	const b = scalar(right);
	if (a === null || b === null) return null;
	if (typeof a !== typeof b) throw new Error(`operator does not exist: ${typeof a} ${operator} ${typeof b}`);
	if (operator === '=') return a === b;
	if (operator === '<>') return a !== b;
	const diff = order(a, b) ?? (a === b ? 0 : a ? 1 : -1);
	if (operator === '>') return diff > 0;
	if (operator === '>=') return diff >= 0;
	if (operator === '<') return diff < 0;
	return diff <= 0;
}

function sqlCast(value: SqlValue, type: string): SqlValue {
	const input = scalar(value);
	if (input === null) return null;
	if (type === 'text') return String(input);
	if (type === 'boolean') {
		if (typeof input === 'boolean') return input;
		if (input === 'true' || input === 'false') return input === 'true';
		throw new Error(`invalid input syntax for type boolean: "${String(input)}"`);
	}
	if (type === 'numeric' || type === 'double precision' || type === 'integer') {
		const number =
			typeof input === 'number' ? input : typeof input === 'string' && input.trim() !== '' ? Number(input) : NaN;
		if (Number.isNaN(number) || (type === 'integer' && !Number.isInteger(number))) {
			throw new Error(`invalid input syntax for type ${type}: "${String(input)}"`);
		}
		return number;
	}
	throw new Error(`type "${type}" does not exist`);
}

function jsonType(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	return typeof value;
}

function extract(base: SqlValue, key: SqlValue, asText: boolean): SqlValue {
	if (base === null || key === null) return null;
	if (!isJson(base) || typeof key !== 'string') throw new Error('-> requires jsonb and text');
	const value =
		isRecord(base.json) && Object.prototype.hasOwnProperty.call(base.json, key) ? base.json[key] : undefined;
	if (value === undefined) return null;
	if (!asText) return { json: value };
	if (value === null) return null;
	return typeof value === 'string' ? value : JSON.stringify(value);
}

function column(name: string): SqlExpr {
	if (name === 'id') return row => row.id;
	if (name === 'content') return row => row.content ?? null;
	if (name === 'metadata') return row => (row.metadata ? { json: row.metadata } : null);
	throw new Error(`column "${name}" does not exist`);
}

/**
 * Evaluates a compiled PostgreSQL fragment the way the server would: three
 * valued logic, lazy CASE and COALESCE, and a thrown error for any cast or
 * comparison PostgreSQL rejects.
 */
class SqlInterpreter {
	private readonly cursor: Cursor;

	constructor(
		clause: string,
		private readonly params: FilterScalar[]
	) {
		this.cursor = new Cursor(tokenize(SQL_TOKEN, clause));
	}

	parse(): SqlExpr {
		const expr = this.parseOr();
		this.cursor.assertDone();
		return expr;
	}

	private parseOr(): SqlExpr {
		let left = this.parseAnd();
		while (this.cursor.accept('OR')) {
			const l = left;
			const r = this.parseAnd();
			left = row => {
				const a = truth(l(row));
				const b = truth(r(row));
				if (a === true || b === true) return true;
				return a === null || b === null ? null : false;
			};
		}
		return left;
	}

	private parseAnd(): SqlExpr {
		let left = this.parseNot();
		while (this.cursor.accept('AND')) {
			const l = left;
			const r = this.parseNot();
			left = row => {
				const a = truth(l(row));
				const b = truth(r(row));
				if (a === false || b === false) return false;
				return a === null || b === null ? null : true;
			};
		}
		return left;
	}

	private parseNot(): SqlExpr {
		if (this.cursor.accept('NOT')) {
			const inner = this.parseNot();
			return row => {
				const value = truth(inner(row));
				return value === null ? null : !value;
			};
		}
		return this.parsePredicate();
	}

	private parsePredicate(): SqlExpr {
		const c = this.cursor;
		const left = this.parseOperand();
		const next = c.peek();

		if (next !== undefined && SQL_COMPARISONS.has(next)) {
			c.next();
			const right = this.parseOperand();
			return row => sqlCompare(next, left(row), right(row));
		}
		if (next === 'IS') {
			c.next();
			if (c.accept('DISTINCT')) {
				c.expect('FROM');
				const right = this.parseOperand();
				return row => {
					const a = scalar(left(row));
					const b = scalar(right(row));
					if (a === null || b === null) return a !== b;
					return sqlCompare('<>', a, b);
				};
			}
			const negated = c.accept('NOT');
			c.expect('NULL');
			return row => (left(row) === null) !== negated;
		}
		if (next === 'IN' || (next === 'NOT' && c.peek(1) === 'IN')) {
			const negated = c.accept('NOT');
			c.expect('IN');
			c.expect('(');
			const items = [this.parseOperand()];
			while (c.accept(',')) items.push(this.parseOperand());
			c.expect(')');
			return row => {
				const value = left(row);
				const results = items.map(item => sqlCompare('=', value, item(row)));
				const found = results.includes(true) ? true : results.includes(null) ? null : false;
				return negated && found !== null ? !found : found;
			};
		}
		return left;
	}

	private parseOperand(): SqlExpr {
		let value = this.parsePrimary();
		while (this.cursor.accept('::')) {
			let type = this.cursor.next();
			if (type === 'double') {
				this.cursor.expect('precision');
				type = 'double precision';
			}
			const inner = value;
			const target = type;
			value = row => sqlCast(inner(row), target);
		}
		return value;
	}

	private parsePrimary(): SqlExpr {
		const c = this.cursor;
		const token = c.next();

		if (token === 'TRUE') return () => true;
		if (token === 'FALSE') return () => false;
		if (token.startsWith('$')) {
			const index = Number(token.slice(1)) - 1;
			if (index < 0 || index >= this.params.length) throw new Error(`there is no parameter ${token}`);
			const param = this.params[index] ?? null;
			return () => param;
		}
		if (token.startsWith("'")) {
			const text = token.slice(1, -1).replace(/''/g, "'");
			return () => text;
		}
		if (token === 'COALESCE') {
			c.expect('(');
			const args = [this.parseOr()];
			while (c.accept(',')) args.push(this.parseOr());
			c.expect(')');
			return row => {
				for (const arg of args) {
					const value = arg(row);
					if (value !== null) return value;
				}
				return null;
			};
		}
		if (token === 'CASE') {
			c.expect('WHEN');
			const condition = this.parseOr();
			c.expect('THEN');
			const result = this.parseOr();
			c.expect('END');
			return row => (truth(condition(row)) === true ? result(row) : null);
		}
		if (token === 'jsonb_typeof') {
			c.expect('(');
			const arg = this.parseOr();
			c.expect(')');
			return row => {
				const value = arg(row);
				if (value === null) return null;
				if (!isJson(value)) throw new Error('function jsonb_typeof requires jsonb');
				return jsonType(value.json);
			};
		}
		if (token === '(') {
			const inner = this.parseOr();
			c.expect(')');
			return inner;
		}

		const base = column(token.slice(token.indexOf('.') + 1));
		const arrow = c.peek();
		if (arrow === '->' || arrow === '->>') {
			c.next();
			const key = this.parseOperand();
			return row => extract(base(row), key(row), arrow === '->>');
		}
		return base;
	}
}

/**
 * Ids of the documents a compiled SQL WHERE fragment selects
 */
export function selectWithSql(compiled: CompiledFilter, documents: Document[]): string[] {
	const where = new SqlInterpreter(compiled.clause, compiled.params).parse();
	return documents.filter(row => where(row) === true).map(row => row.id);
}

type ODataExpr = (document: Document) => boolean;

const ODATA_TOKEN = /\s*('(?:[^']|'')*'|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|[()]|[A-Za-z_][A-Za-z0-9_]*)/y;
const ODATA_COMPARISONS = new Set(['eq', 'ne', 'gt', 'ge', 'lt', 'le']);

function odataLiteral(token: string): FilterScalar {
	if (token.startsWith("'")) return token.slice(1, -1).replace(/''/g, "'");
	if (token === 'true' || token === 'false') return token === 'true';
	if (token === 'null') return null;
	const number = Number(token);
	if (Number.isNaN(number)) throw new Error(`Invalid literal ${token}`);
	return number;
}

function readField(document: Document, field: string): unknown {
	if (field === 'id') return document.id;
	if (field === 'content') return document.content;
	return document.metadata?.[field];
}

function odataCompare(operator: string, actual: unknown, expected: FilterScalar): boolean {
	const present = actual !== undefined && actual !== null;
	if (operator === 'eq' || operator === 'ne') {
		const equal = expected === null ? !present : present && actual === expected;
		return operator === 'eq' ? equal : !equal;
	}
	const diff = present && expected !== null ? order(actual, expected) : undefined;
	if (diff === undefined) return false;
	if (operator === 'gt') return diff > 0;
	if (operator === 'ge') return diff >= 0;
	if (operator === 'lt') return diff < 0;
	return diff <= 0;
}

/**
 * Evaluates a bound `$filter` string as an index whose fields each hold one
 * type: a value of another type never matches.
 */
class ODataInterpreter {
	private readonly cursor: Cursor;

	constructor(filter: string) {
		this.cursor = new Cursor(tokenize(ODATA_TOKEN, filter));
	}

	parse(): ODataExpr {
		const expr = this.parseOr();
		this.cursor.assertDone();
		return expr;
	}

	private parseOr(): ODataExpr {
		let left = this.parseAnd();
		while (this.cursor.accept('or')) {
			const l = left;
			const r = this.parseAnd();
			left = document => l(document) || r(document);
		}
		return left;
	}

	private parseAnd(): ODataExpr {
		let left = this.parseUnary();
		while (this.cursor.accept('and')) {
			const l = left;
			const r = this.parseUnary();
			left = document => l(document) && r(document);
		}
		return left;
	}

	private parseUnary(): ODataExpr {
		const c = this.cursor;
		if (c.accept('not')) {
			const inner = this.parseUnary();
			return document => !inner(document);
		}
		const token = c.next();
		if (token === '(') {
			const inner = this.parseOr();
			c.expect(')');
			return inner;
		}
		const operator = c.peek();
		if (operator !== undefined && ODATA_COMPARISONS.has(operator)) {
			c.next();
			const expected = odataLiteral(c.next());
			return document => odataCompare(operator, readField(document, token), expected);
		}
		if (token === 'true') return () => true;
		if (token === 'false') return () => false;
		throw new Error(`Unexpected token ${token}`);
	}
}

/**
 * Ids of the documents a bound OData filter selects
 */
export function selectWithOData(filter: string, documents: Document[]): string[] {
	const where = new ODataInterpreter(filter).parse();
	return documents.filter(where).map(document => document.id);
}
