import Ajv from 'ajv';
import type { FromSchema } from 'json-schema-to-ts';

// --- Row Schemas ---
// Every row read from the AddressBook database is checked against one of these
// shapes once, right after the query returns it.

export const tableColumnRowSchema = {
  $id: 'tableColumnRow',
  type: 'object',
  properties: {
    name: { type: 'string' },
  },
  required: ['name'],
  additionalProperties: false,
} as const;

export type TableColumnRow = FromSchema<typeof tableColumnRowSchema>;

export const countRowSchema = {
  $id: 'countRow',
  type: 'object',
  properties: {
    count: { type: 'integer', minimum: 0 },
  },
  required: ['count'],
  additionalProperties: false,
} as const;

export type CountRow = FromSchema<typeof countRowSchema>;

// ABPerson rows carry `rowid` plus whichever mapped columns the table has.
// SQLite typing is per cell: any text or value column may hold a BLOB, which arrives as a
// Buffer and which JSON Schema sees as an object.
export const personRowSchema = {
  $id: 'personRow',
  type: 'object',
  properties: {
    rowid: { type: 'integer' },
  },
  required: ['rowid'],
  additionalProperties: { type: ['string', 'number', 'null', 'object'] },
} as const;

export interface PersonRow {
  rowid: number;
  [column: string]: unknown;
}

export const multiValueRowSchema = {
  $id: 'multiValueRow',
  type: 'object',
  properties: {
    uid: { type: 'integer' },
    property: { type: ['integer', 'null'] },
    label: { type: ['string', 'number', 'null', 'object'] },
    value: { type: ['string', 'number', 'null', 'object'] },
  },
  required: ['uid', 'property', 'label', 'value'],
  additionalProperties: false,
} as const;

export type MultiValueRow = FromSchema<typeof multiValueRowSchema>;

export const multiValueEntryRowSchema = {
  $id: 'multiValueEntryRow',
  type: 'object',
  properties: {
    parentId: { type: 'integer' },
    keyId: { type: ['integer', 'null'] },
    keyName: { type: ['string', 'number', 'null', 'object'] },
    value: { type: ['string', 'number', 'null', 'object'] },
  },
  required: ['parentId', 'keyId', 'keyName', 'value'],
  additionalProperties: false,
} as const;

export type MultiValueEntryRow = FromSchema<typeof multiValueEntryRowSchema>;

// Union types such as ["string", "null"] are part of the row shapes
const ajv = new Ajv({ allowUnionTypes: true });

export const validateTableColumnRow = ajv.compile<TableColumnRow>(tableColumnRowSchema);
export const validateCountRow = ajv.compile<CountRow>(countRowSchema);
export const validatePersonRow = ajv.compile<PersonRow>(personRowSchema);
export const validateMultiValueRow = ajv.compile<MultiValueRow>(multiValueRowSchema);
export const validateMultiValueEntryRow = ajv.compile<MultiValueEntryRow>(multiValueEntryRowSchema);

export function validationErrors(errors: typeof ajv.errors): string {
  return ajv.errorsText(errors);
}
