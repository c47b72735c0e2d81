/**
 * Types for the AddressBook to N-Triples converter
 */
import type { PersonColumn } from './lib/person-columns';

// A non-null cell of an ABPerson row; BLOB columns arrive as Buffers
export type CellValue = string | number | Buffer;

// A non-null cell of a multi-valued field: numbers are read as text, BLOBs stay Buffers
export type FieldCell = string | Buffer;

// AddressBook property codes of the multi-valued fields the mapper knows how to structure
export const MultiValueProperty = {
  Phone: 3,
  Email: 4,
  Address: 5,
  Url: 22,
} as const;

export type FieldKind = 'phone' | 'email' | 'address' | 'url' | 'other';

// One component of a structured value, e.g. the street of a postal address
export interface MultiValueEntry {
  keyId: number | null;
  keyName: string | null;
  value: FieldCell;
}

// One ABMultiValue row of a contact
export interface MultiValueField {
  uid: number;
  property: number;
  kind: FieldKind;
  label: string | null;
  value: FieldCell | null;
  // Position among the contact's fields of the same kind (per property code for `other`)
  ordinal: number;
  entries: MultiValueEntry[];
}

// One ABPerson row with its multi-valued fields
export interface ContactRecord {
  id: number;
  columns: ReadonlyMap<PersonColumn, CellValue>;
  fields: readonly MultiValueField[];
}

export interface ConversionSummary {
  contacts: number;
  triples: number;
  durationMs: number;
}
