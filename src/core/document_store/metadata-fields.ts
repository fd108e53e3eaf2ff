/**
 * Metadata field kinds
 *
 * The closed set of types a declared metadata field may take, and their
 * native types on each backend. Adding a kind means adding a row to every
 * table below; the Record types make a missing row a compile error.
 *
 * @module document_store/metadata-fields
 */

import type { MetadataValue } from './document.js';

export const METADATA_FIELD_KINDS = ['text', 'boolean', 'integer', 'float'] as const;

export type MetadataFieldKind = (typeof METADATA_FIELD_KINDS)[number];

/** name -> kind */
export type MetadataFieldMap = Record<string, MetadataFieldKind>;

/**
 * Azure AI Search EDM types
 */
export const AZURE_FIELD_TYPES: Record<MetadataFieldKind, 'Edm.String' | 'Edm.Boolean' | 'Edm.Int32' | 'Edm.Double'> = {
	text: 'Edm.String',
	boolean: 'Edm.Boolean',
	integer: 'Edm.Int32',
	float: 'Edm.Double',
};

/**
 * PostgreSQL casts applied to `metadata->>'key'` in expression indexes
 */
export const POSTGRES_CASTS: Record<MetadataFieldKind, string> = {
	text: 'text',
	boolean: 'boolean',
	integer: 'integer',
	float: 'double precision',
};

/** What `jsonb_typeof` returns for a value */
export type JsonbType = 'string' | 'number' | 'boolean';

const JSONB_TYPES: Record<MetadataFieldKind, JsonbType> = {
	text: 'string',
	boolean: 'boolean',
	integer: 'number',
	float: 'number',
};

/** Edm.Int32 bounds */
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

const VALUE_GUARDS: Record<MetadataFieldKind, (value: MetadataValue) => boolean> = {
	text: value => typeof value === 'string',
	boolean: value => typeof value === 'boolean',
	integer: value => typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX,
	float: value => typeof value === 'number',
};

/**
 * Reads one key of a jsonb column as `cast`. NULL when the key is absent or
 * holds another JSON type, so the cast never sees a value it cannot parse.
 *
 * @param keySql - a bound placeholder or an escaped literal
 */
export function typedJsonbRead(column: string, keySql: string, jsonType: JsonbType, cast: string): string {
	return `CASE WHEN jsonb_typeof(${column}->${keySql}) = '${jsonType}' THEN (${column}->>${keySql})::${cast} END`;
}

/**
 * The expression a declared field is indexed on and filtered by
 */
export function postgresMetadataExpression(column: string, keySql: string, kind: MetadataFieldKind): string {
	return typedJsonbRead(column, keySql, JSONB_TYPES[kind], POSTGRES_CASTS[kind]);
}

/**
 * Whether a metadata value can be stored in a field of the given kind
 */
export function valueMatchesKind(kind: MetadataFieldKind, value: MetadataValue): boolean {
	return VALUE_GUARDS[kind](value);
}
