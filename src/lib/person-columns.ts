/**
 * How a cell is typed when it becomes a literal.
 *
 * - `text`: plain literal
 * - `integer`: `xsd:integer`
 * - `timestamp`: seconds since 2001-01-01T00:00:00Z as `xsd:dateTime`
 * - `date`: seconds since 2001-01-01T00:00:00Z as `xsd:date`
 */
export type ColumnType = 'text' | 'integer' | 'timestamp' | 'date';

export interface PersonColumnMapping<Column extends string = string> {
  readonly column: Column;
  readonly predicate: string;
  readonly type: ColumnType;
  /** Sentinel values that mean "not set" for this column. */
  readonly skip?: readonly number[];
}

// ABPerson columns in the order their triples are written. Sort keys, sort sections and
// IsPreferredName are bookkeeping for the Contacts UI and are not read.
export const PERSON_COLUMNS = [
  { column: 'First', predicate: 'vcard:given-name', type: 'text' },
  { column: 'Last', predicate: 'vcard:family-name', type: 'text' },
  { column: 'Middle', predicate: 'vcard:additional-name', type: 'text' },
  { column: 'Prefix', predicate: 'vcard:honorific-prefix', type: 'text' },
  { column: 'Suffix', predicate: 'vcard:honorific-suffix', type: 'text' },
  { column: 'Nickname', predicate: 'vcard:nickname', type: 'text' },
  { column: 'FirstPhonetic', predicate: 'abp:FirstPhonetic', type: 'text' },
  { column: 'MiddlePhonetic', predicate: 'abp:MiddlePhonetic', type: 'text' },
  { column: 'LastPhonetic', predicate: 'abp:LastPhonetic', type: 'text' },
  { column: 'Organization', predicate: 'vcard:organization-name', type: 'text' },
  { column: 'Department', predicate: 'vcard:organization-unit', type: 'text' },
  { column: 'JobTitle', predicate: 'vcard:title', type: 'text' },
  { column: 'Note', predicate: 'vcard:note', type: 'text' },
  { column: 'Birthday', predicate: 'vcard:bday', type: 'date' },
  { column: 'Kind', predicate: 'abp:Kind', type: 'integer', skip: [0] },
  { column: 'CreationDate', predicate: 'abp:CreationDate', type: 'timestamp' },
  { column: 'ModificationDate', predicate: 'abp:ModificationDate', type: 'timestamp' },
  { column: 'CompositeNameFallback', predicate: 'abp:CompositeNameFallback', type: 'text' },
  { column: 'DisplayName', predicate: 'abp:DisplayName', type: 'text' },
  { column: 'ExternalIdentifier', predicate: 'abp:ExternalIdentifier', type: 'text' },
  { column: 'ExternalModificationTag', predicate: 'abp:ExternalModificationTag', type: 'text' },
  { column: 'ExternalUUID', predicate: 'abp:ExternalUUID', type: 'text' },
  { column: 'StoreID', predicate: 'abp:StoreID', type: 'integer', skip: [0] },
  { column: 'ExternalRepresentation', predicate: 'abp:ExternalRepresentation', type: 'text' },
  { column: 'PersonLink', predicate: 'abp:PersonLink', type: 'integer', skip: [-1] },
  { column: 'ImageURI', predicate: 'abp:ImageURI', type: 'text' },
  { column: 'guid', predicate: 'abp:guid', type: 'text' },
  { column: 'PhonemeData', predicate: 'abp:PhonemeData', type: 'text' },
] as const;

export type PersonColumn = (typeof PERSON_COLUMNS)[number]['column'];

export const PERSON_COLUMN_MAPPINGS: readonly PersonColumnMapping<PersonColumn>[] = PERSON_COLUMNS;

export const PERSON_COLUMN_NAMES: readonly PersonColumn[] = PERSON_COLUMN_MAPPINGS.map(mapping => mapping.column);

/** Kind value of an ABPerson row describing an organization rather than a person. */
export const KIND_ORGANIZATION = 1;
