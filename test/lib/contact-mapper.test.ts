import { columnLiteral, displayLabel, formattedName, mapContact } from '../../src/lib/contact-mapper';
import { formatTriple } from '../../src/lib/ntriples';
import { PERSON_COLUMN_MAPPINGS, PersonColumn, PersonColumnMapping } from '../../src/lib/person-columns';
import type { CellValue, ContactRecord, MultiValueField } from '../../src/types';

const RDF_TYPE = '<http://www.w3.org/1999/02/22-rdf-syntax-ns#type>';
const RDFS_LABEL = '<http://www.w3.org/2000/01/rdf-schema#label>';
const XSD = 'http://www.w3.org/2001/XMLSchema#';
const vcard = (name: string): string => `<http://www.w3.org/2006/vcard/ns#${name}>`;

function contact(id: number, columns: [PersonColumn, CellValue][], fields: MultiValueField[] = []): ContactRecord {
  return { id, columns: new Map(columns), fields };
}

function field(partial: Partial<MultiValueField> & Pick<MultiValueField, 'uid' | 'property' | 'kind'>): MultiValueField {
  return { label: null, value: null, ordinal: 0, entries: [], ...partial };
}

function mappingFor(column: PersonColumn): PersonColumnMapping {
  const mapping = PERSON_COLUMN_MAPPINGS.find(m => m.column === column);
  if (!mapping) {
    throw new Error(`No mapping for ${column}`);
  }
  return mapping;
}

function lines(record: ContactRecord, countryCallingCode?: string): string[] {
  return mapContact(record, { countryCallingCode }).map(q => formatTriple(q).trimEnd());
}

describe('displayLabel', () => {
  it('unwraps built-in labels and keeps custom ones', () => {
    expect(displayLabel('_$!<Mobile>!$_')).toBe('Mobile');
    expect(displayLabel('Gym')).toBe('Gym');
  });

  it('treats missing and blank labels as absent', () => {
    expect(displayLabel(null)).toBeNull();
    expect(displayLabel('  ')).toBeNull();
  });
});

describe('formattedName', () => {
  it('joins the personal name parts in order', () => {
    const record = contact(1, [['Last', 'Example'], ['First', 'Ann'], ['Prefix', 'Dr.'], ['Suffix', 'Jr.']]);
    expect(formattedName(record)).toBe('Dr. Ann Example Jr.');
  });

  it('falls back to the display name before the organization', () => {
    expect(formattedName(contact(1, [['Organization', 'Acme'], ['DisplayName', 'Acme Support']]))).toBe('Acme Support');
    expect(formattedName(contact(1, [['Organization', 'Acme']]))).toBe('Acme');
  });

  it('returns undefined when nothing names the contact', () => {
    expect(formattedName(contact(1, [['Note', 'no name']]))).toBeUndefined();
  });
});

describe('columnLiteral', () => {
  it('converts seconds since 2001-01-01 into xsd:dateTime and xsd:date', () => {
    const created = columnLiteral(mappingFor('CreationDate'), 0);
    expect(created.value).toBe('2001-01-01T00:00:00.000Z');
    expect(created.datatype.value).toBe(`${XSD}dateTime`);

    const birthday = columnLiteral(mappingFor('Birthday'), '86400');
    expect(birthday.value).toBe('2001-01-02');
    expect(birthday.datatype.value).toBe(`${XSD}date`);
  });

  it('keeps values that do not parse as plain literals', () => {
    const created = columnLiteral(mappingFor('CreationDate'), 'yesterday');
    expect(created.value).toBe('yesterday');
    expect(created.datatype.value).toBe(`${XSD}string`);
  });

  it('keeps dates outside years 0001-9999 as plain literals', () => {
    const birthday = columnLiteral(mappingFor('Birthday'), '300000000000');
    expect(birthday.value).toBe('300000000000');
    expect(birthday.datatype.value).toBe(`${XSD}string`);

    const created = columnLiteral(mappingFor('CreationDate'), -70000000000);
    expect(created.value).toBe('-70000000000');
    expect(created.datatype.value).toBe(`${XSD}string`);
  });

  it('types integer columns and BLOBs', () => {
    const kind = columnLiteral(mappingFor('Kind'), 1);
    expect(kind.value).toBe('1');
    expect(kind.datatype.value).toBe(`${XSD}integer`);

    const blob = columnLiteral(mappingFor('ExternalRepresentation'), Buffer.from('hi'));
    expect(blob.value).toBe('aGk=');
    expect(blob.datatype.value).toBe(`${XSD}base64Binary`);
  });
});

describe('mapContact', () => {
  it('maps a person with telephone, email and address nodes', () => {
    const record = contact(
      1,
      [['First', 'Ann'], ['Last', 'Example']],
      [
        field({ uid: 1, property: 3, kind: 'phone', label: '_$!<Mobile>!$_', value: '06 30 123 456' }),
        field({ uid: 2, property: 4, kind: 'email', label: '_$!<Work>!$_', value: ' ann@example.org ' }),
        field({
          uid: 3,
          property: 5,
          kind: 'address',
          label: '_$!<Home>!$_',
          entries: [
            { keyId: 1, keyName: 'Street', value: '1 Main St' },
            { keyId: 4, keyName: 'City', value: 'Springfield' },
            { keyId: 3, keyName: null, value: '12345' },
          ],
        }),
      ],
    );

    expect(lines(record, '36')).toEqual([
      `_:p1 ${RDF_TYPE} ${vcard('Individual')} .`,
      `_:p1 ${vcard('fn')} "Ann Example" .`,
      `_:p1 ${vcard('given-name')} "Ann" .`,
      `_:p1 ${vcard('family-name')} "Example" .`,
      `_:p1 ${vcard('hasTelephone')} _:p1tel0 .`,
      `_:p1tel0 ${RDF_TYPE} ${vcard('Cell')} .`,
      `_:p1tel0 ${RDFS_LABEL} "Mobile" .`,
      `_:p1tel0 ${vcard('hasValue')} <tel:+3630123456> .`,
      `_:p1 ${vcard('hasEmail')} _:p1email0 .`,
      `_:p1email0 ${RDF_TYPE} ${vcard('Work')} .`,
      `_:p1email0 ${RDFS_LABEL} "Work" .`,
      `_:p1email0 ${vcard('hasValue')} <mailto:ann@example.org> .`,
      `_:p1 ${vcard('hasAddress')} _:p1adr0 .`,
      `_:p1adr0 ${RDF_TYPE} ${vcard('Home')} .`,
      `_:p1adr0 ${RDFS_LABEL} "Home" .`,
      `_:p1adr0 ${vcard('street-address')} "1 Main St" .`,
      `_:p1adr0 ${vcard('locality')} "Springfield" .`,
      `_:p1adr0 ${vcard('postal-code')} "12345" .`,
    ]);
  });

  it('maps an organization and writes columns in mapping order', () => {
    const record = contact(2, [['Kind', 1], ['Note', 'line1\nline2'], ['Organization', 'Acme']]);

    expect(lines(record)).toEqual([
      `_:p2 ${RDF_TYPE} ${vcard('Organization')} .`,
      `_:p2 ${vcard('fn')} "Acme" .`,
      `_:p2 ${vcard('organization-name')} "Acme" .`,
      `_:p2 ${vcard('note')} "line1\\nline2" .`,
      `_:p2 <http://www.apple.com/ABPerson#Kind> "1"^^<${XSD}integer> .`,
    ]);
  });

  it('skips blank cells and sentinel values', () => {
    const record = contact(7, [['First', '  '], ['Kind', 0], ['StoreID', 0], ['PersonLink', -1]]);
    expect(lines(record)).toEqual([`_:p7 ${RDF_TYPE} ${vcard('Individual')} .`]);
  });

  it('numbers repeated fields of a kind by ordinal and skips empty ones', () => {
    const record = contact(3, [], [
      field({ uid: 10, property: 3, kind: 'phone', label: 'Gym', value: '+44 20 7946 0000' }),
      field({ uid: 11, property: 3, kind: 'phone', value: '---', ordinal: 1 }),
      field({ uid: 12, property: 3, kind: 'phone', value: ' ', ordinal: 2 }),
    ]);

    expect(lines(record)).toEqual([
      `_:p3 ${RDF_TYPE} ${vcard('Individual')} .`,
      `_:p3 ${vcard('hasTelephone')} _:p3tel0 .`,
      `_:p3tel0 ${RDFS_LABEL} "Gym" .`,
      `_:p3tel0 ${vcard('hasValue')} <tel:+442079460000> .`,
      `_:p3 ${vcard('hasTelephone')} _:p3tel1 .`,
      `_:p3tel1 ${vcard('hasValue')} "---" .`,
    ]);
  });

  it('writes URLs as IRIs only when they are absolute', () => {
    const record = contact(4, [], [
      field({ uid: 20, property: 22, kind: 'url', value: 'https://example.org/ann' }),
      field({ uid: 21, property: 22, kind: 'url', value: 'example dot org', ordinal: 1 }),
    ]);

    expect(lines(record).slice(1)).toEqual([
      `_:p4 ${vcard('hasURL')} _:p4url0 .`,
      `_:p4url0 ${vcard('hasValue')} <https://example.org/ann> .`,
      `_:p4 ${vcard('hasURL')} _:p4url1 .`,
      `_:p4url1 ${vcard('hasValue')} "example dot org" .`,
    ]);
  });

  it('keeps unknown properties under their property code', () => {
    const record = contact(5, [], [field({ uid: 30, property: 46, kind: 'other', value: 'Bob' })]);
    expect(lines(record).slice(1)).toEqual(['_:p5 <http://www.apple.com/ABPerson#prop_46> "Bob" .']);
  });

  it('treats labels and entry keys named like Object members as custom text', () => {
    const record = contact(8, [], [
      field({ uid: 50, property: 3, kind: 'phone', label: 'constructor', value: '+44 20 7946 0000' }),
      field({
        uid: 51,
        property: 5,
        kind: 'address',
        label: 'toString',
        entries: [
          { keyId: 9, keyName: 'toString', value: 'x' },
          { keyId: 10, keyName: '__proto__', value: 'y' },
        ],
      }),
    ]);

    expect(lines(record).slice(1)).toEqual([
      `_:p8 ${vcard('hasTelephone')} _:p8tel0 .`,
      `_:p8tel0 ${RDFS_LABEL} "constructor" .`,
      `_:p8tel0 ${vcard('hasValue')} <tel:+442079460000> .`,
      `_:p8 ${vcard('hasAddress')} _:p8adr0 .`,
      `_:p8adr0 ${RDFS_LABEL} "toString" .`,
      '_:p8adr0 <http://www.apple.com/ABPerson#toString> "x" .',
      '_:p8adr0 <http://www.apple.com/ABPerson#__proto__> "y" .',
    ]);
  });

  it('writes BLOB field values as base64 literals', () => {
    const record = contact(9, [], [
      field({ uid: 60, property: 3, kind: 'phone', value: Buffer.from('hi') }),
      field({
        uid: 61,
        property: 5,
        kind: 'address',
        entries: [{ keyId: 1, keyName: 'Street', value: Buffer.from([1, 2]) }],
      }),
      field({ uid: 62, property: 46, kind: 'other', value: Buffer.alloc(0) }),
    ]);

    expect(lines(record).slice(1)).toEqual([
      `_:p9 ${vcard('hasTelephone')} _:p9tel0 .`,
      `_:p9tel0 ${vcard('hasValue')} "aGk="^^<${XSD}base64Binary> .`,
      `_:p9 ${vcard('hasAddress')} _:p9adr0 .`,
      `_:p9adr0 ${vcard('street-address')} "AQI="^^<${XSD}base64Binary> .`,
    ]);
  });

  it('produces the same triples for the same contact', () => {
    const record = contact(6, [['First', 'Ann']], [field({ uid: 40, property: 4, kind: 'email', value: 'ann@example.org' })]);
    expect(lines(record)).toEqual(lines(record));
  });
});
