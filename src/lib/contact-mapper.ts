import { blankNode, literal, namedNode, quad } from '@rdfjs/data-model';
import type { BlankNode, Literal, NamedNode, Quad, Quad_Object } from '@rdfjs/types';
import { normalizePhoneNumber } from './phone-number';
import { KIND_ORGANIZATION, PERSON_COLUMN_MAPPINGS, PersonColumnMapping } from './person-columns';
import { abp, encodeIriComponent, GN, isAbsoluteIri, RDF, RDFS, term, VCARD, XSD } from './vocabulary';
import type { CellValue, ContactRecord, FieldCell, FieldKind, MultiValueEntry, MultiValueField } from '../types';

export interface MapperOptions {
  /** Calling code used to turn local phone numbers into international ones. */
  countryCallingCode?: string;
}

// Core Data reference date, 2001-01-01T00:00:00Z, in Unix milliseconds
const APPLE_EPOCH_MS = Date.UTC(2001, 0, 1);

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const FIELD_TAG: Record<Exclude<FieldKind, 'other'>, string> = {
  phone: 'tel',
  email: 'email',
  address: 'adr',
  url: 'url',
};

const FIELD_LINK: Record<Exclude<FieldKind, 'other'>, NamedNode> = {
  phone: VCARD.hasTelephone,
  email: VCARD.hasEmail,
  address: VCARD.hasAddress,
  url: VCARD.hasURL,
};

// vCard classes implied by the AddressBook's built-in labels. Labels are user text, so the
// lookups are Maps: a label such as "constructor" must not hit Object.prototype.
const LABEL_TYPES: ReadonlyMap<string, readonly NamedNode[]> = new Map([
  ['Mobile', [VCARD.Cell]],
  ['iPhone', [VCARD.Cell]],
  ['Home', [VCARD.Home]],
  ['Work', [VCARD.Work]],
  ['HomeFAX', [VCARD.Home, VCARD.Fax]],
  ['WorkFAX', [VCARD.Work, VCARD.Fax]],
  ['OtherFAX', [VCARD.Fax]],
  ['Pager', [VCARD.Pager]],
  ['Main', [VCARD.Voice]],
]);

// Address entry keys by name, and by key id for stores whose key table has no name
const ADDRESS_KEYS_BY_NAME: ReadonlyMap<string, NamedNode> = new Map([
  ['Street', VCARD.streetAddress],
  ['City', VCARD.locality],
  ['State', VCARD.region],
  ['ZIP', VCARD.postalCode],
  ['Country', VCARD.countryName],
  ['CountryCode', GN.countryCode],
]);

const ADDRESS_KEYS_BY_ID: ReadonlyMap<number, NamedNode> = new Map([
  [1, VCARD.streetAddress],
  [2, VCARD.countryName],
  [3, VCARD.postalCode],
  [4, VCARD.locality],
  [5, VCARD.region],
  [6, GN.countryCode],
]);

const COLUMN_PREDICATES = new Map<string, NamedNode>(
  PERSON_COLUMN_MAPPINGS.map(mapping => [mapping.column, term(mapping.predicate)]),
);

/** Subject shared by every triple about one contact. */
export function contactSubject(contactId: number): BlankNode {
  return blankNode(`p${contactId}`);
}

/** Sub-resource of one multi-valued field; depends only on the contact, the field kind and its ordinal. */
export function fieldSubject(contactId: number, kind: Exclude<FieldKind, 'other'>, ordinal: number): BlankNode {
  return blankNode(`p${contactId}${FIELD_TAG[kind]}${ordinal}`);
}

/**
 * Turns a raw AddressBook label into display text: built-in labels are stored as
 * `_$!<Mobile>!$_`, custom labels verbatim.
 */
export function displayLabel(label: string | null): string | null {
  if (label === null || label.trim() === '') {
    return null;
  }
  const builtIn = /^_\$!<(.+)>!\$_$/.exec(label);
  return builtIn ? builtIn[1] : label;
}

function isBlank(value: CellValue | undefined): boolean {
  return value === undefined || (typeof value === 'string' && value.trim() === '');
}

function textOf(value: CellValue): string {
  return Buffer.isBuffer(value) ? value.toString('base64') : String(value);
}

// xsd:date and xsd:dateTime lexical forms need a four-digit year
function hasXsdYear(date: Date): boolean {
  const year = date.getUTCFullYear();
  return year >= 1 && year <= 9999;
}

function secondsSinceAppleEpoch(value: CellValue): Date | undefined {
  let seconds: number;
  if (typeof value === 'number') {
    seconds = value;
  } else if (typeof value === 'string' && NUMERIC.test(value.trim())) {
    seconds = Number(value.trim());
  } else {
    return undefined;
  }
  const date = new Date(APPLE_EPOCH_MS + seconds * 1000);
  return Number.isNaN(date.getTime()) || !hasXsdYear(date) ? undefined : date;
}

/**
 * Builds the literal for a person column. Values that do not parse as the column's type are
 * kept as plain literals rather than dropped.
 */
export function columnLiteral(mapping: PersonColumnMapping, value: CellValue): Literal {
  if (Buffer.isBuffer(value)) {
    return literal(value.toString('base64'), XSD.base64Binary);
  }
  switch (mapping.type) {
    case 'integer': {
      const text = String(value).trim();
      return /^[+-]?\d+$/.test(text) ? literal(text, XSD.integer) : literal(String(value));
    }
    case 'timestamp': {
      const date = secondsSinceAppleEpoch(value);
      return date ? literal(date.toISOString(), XSD.dateTime) : literal(String(value));
    }
    case 'date': {
      const date = secondsSinceAppleEpoch(value);
      return date ? literal(date.toISOString().slice(0, 10), XSD.date) : literal(String(value));
    }
    default:
      return literal(String(value));
  }
}

function isSkipped(mapping: PersonColumnMapping, value: CellValue): boolean {
  if (isBlank(value)) {
    return true;
  }
  if (!mapping.skip) {
    return false;
  }
  const numeric = typeof value === 'number' ? value : Number(textOf(value));
  return mapping.skip.includes(numeric);
}

/**
 * The formatted name of a contact: the composed personal name, else the stored display
 * name, composite fallback, organization or nickname.
 */
export function formattedName(contact: ContactRecord): string | undefined {
  const part = (column: 'Prefix' | 'First' | 'Middle' | 'Last' | 'Suffix'): string | undefined => {
    const value = contact.columns.get(column);
    return value === undefined || isBlank(value) ? undefined : textOf(value).trim();
  };
  const composed = [part('Prefix'), part('First'), part('Middle'), part('Last'), part('Suffix')]
    .filter((p): p is string => p !== undefined)
    .join(' ');
  if (composed !== '') {
    return composed;
  }
  for (const column of ['DisplayName', 'CompositeNameFallback', 'Organization', 'Nickname'] as const) {
    const value = contact.columns.get(column);
    if (value !== undefined && !isBlank(value)) {
      return textOf(value).trim();
    }
  }
  return undefined;
}

// Literal for a field cell; BLOBs are written as base64, like BLOB person columns
function cellLiteral(value: FieldCell): Literal {
  return Buffer.isBuffer(value) ? literal(value.toString('base64'), XSD.base64Binary) : literal(value);
}

function phoneValue(raw: string, options: MapperOptions): NamedNode | Literal {
  const normalized = normalizePhoneNumber(raw, { countryCallingCode: options.countryCallingCode }) ?? '';
  return normalized === '' ? literal(raw) : namedNode(`tel:${encodeIriComponent(normalized)}`);
}

function fieldValue(field: MultiValueField, value: FieldCell, options: MapperOptions): Quad_Object {
  if (Buffer.isBuffer(value)) {
    return cellLiteral(value);
  }
  switch (field.kind) {
    case 'phone':
      return phoneValue(value, options);
    case 'email':
      return namedNode(`mailto:${encodeIriComponent(value.trim())}`);
    case 'url':
      return isAbsoluteIri(value.trim()) ? namedNode(value.trim()) : literal(value);
    default:
      return literal(value);
  }
}

function entryPredicate(entry: MultiValueEntry): NamedNode {
  if (entry.keyName !== null && entry.keyName.trim() !== '') {
    return ADDRESS_KEYS_BY_NAME.get(entry.keyName) ?? abp(entry.keyName);
  }
  if (entry.keyId !== null) {
    return ADDRESS_KEYS_BY_ID.get(entry.keyId) ?? abp(`entry_${entry.keyId}`);
  }
  return abp('entry');
}

function hasContent(value: FieldCell | null): value is FieldCell {
  if (value === null) {
    return false;
  }
  return Buffer.isBuffer(value) ? value.length > 0 : value.trim() !== '';
}

function mapStructuredField(
  subject: BlankNode,
  contactId: number,
  field: MultiValueField & { kind: Exclude<FieldKind, 'other'> },
  options: MapperOptions,
): Quad[] {
  const entries = field.entries.filter(entry => hasContent(entry.value));
  if (!hasContent(field.value) && entries.length === 0) {
    return [];
  }

  const node = fieldSubject(contactId, field.kind, field.ordinal);
  const quads: Quad[] = [quad(subject, FIELD_LINK[field.kind], node)];

  const label = displayLabel(field.label);
  if (label !== null) {
    for (const type of LABEL_TYPES.get(label) ?? []) {
      quads.push(quad(node, RDF.type, type));
    }
    quads.push(quad(node, RDFS.label, literal(label)));
  }

  if (field.kind === 'address') {
    if (hasContent(field.value)) {
      quads.push(quad(node, VCARD.streetAddress, cellLiteral(field.value)));
    }
    for (const entry of entries) {
      quads.push(quad(node, entryPredicate(entry), cellLiteral(entry.value)));
    }
    return quads;
  }

  const values = hasContent(field.value) ? [field.value] : entries.map(entry => entry.value);
  for (const value of values) {
    quads.push(quad(node, VCARD.hasValue, fieldValue(field, value, options)));
  }
  return quads;
}

function isStructured(field: MultiValueField): field is MultiValueField & { kind: Exclude<FieldKind, 'other'> } {
  return field.kind !== 'other';
}

/**
 * Maps one contact to its triples, in a fixed order: type, formatted name, person columns
 * in mapping order, then the multi-valued fields in store order.
 */
export function mapContact(contact: ContactRecord, options: MapperOptions = {}): Quad[] {
  const subject = contactSubject(contact.id);
  const kind = contact.columns.get('Kind');
  const isOrganization = kind !== undefined && Number(textOf(kind)) === KIND_ORGANIZATION;
  const quads: Quad[] = [quad(subject, RDF.type, isOrganization ? VCARD.Organization : VCARD.Individual)];

  const name = formattedName(contact);
  if (name !== undefined) {
    quads.push(quad(subject, VCARD.fn, literal(name)));
  }

  for (const mapping of PERSON_COLUMN_MAPPINGS) {
    const value = contact.columns.get(mapping.column);
    if (value === undefined || isSkipped(mapping, value)) {
      continue;
    }
    const predicate = COLUMN_PREDICATES.get(mapping.column) ?? term(mapping.predicate);
    quads.push(quad(subject, predicate, columnLiteral(mapping, value)));
  }

  for (const field of contact.fields) {
    if (isStructured(field)) {
      quads.push(...mapStructuredField(subject, contact.id, field, options));
      continue;
    }
    // Properties without a vCard counterpart keep their AddressBook code
    const predicate = abp(`prop_${field.property}`);
    const values = [field.value, ...field.entries.map(entry => entry.value)].filter(hasContent);
    for (const value of values) {
      quads.push(quad(subject, predicate, cellLiteral(value)));
    }
  }

  return quads;
}
