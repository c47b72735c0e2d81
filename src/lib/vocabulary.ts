import { namedNode } from '@rdfjs/data-model';
import type { NamedNode } from '@rdfjs/types';

export const NAMESPACES = {
  rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
  rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
  xsd: 'http://www.w3.org/2001/XMLSchema#',
  vcard: 'http://www.w3.org/2006/vcard/ns#',
  abp: 'http://www.apple.com/ABPerson#',
  gn: 'http://www.geonames.org/ontology#',
} as const;

export type Prefix = keyof typeof NAMESPACES;

function isPrefix(value: string): value is Prefix {
  return Object.prototype.hasOwnProperty.call(NAMESPACES, value);
}

/**
 * Expands a prefixed name such as `vcard:hasEmail` into a named node.
 * Names without a known prefix are treated as full IRIs.
 */
export function term(qname: string): NamedNode {
  const separator = qname.indexOf(':');
  if (separator > 0) {
    const prefix = qname.slice(0, separator);
    if (isPrefix(prefix)) {
      return namedNode(NAMESPACES[prefix] + qname.slice(separator + 1));
    }
  }
  return namedNode(qname);
}

export const RDF = {
  type: term('rdf:type'),
};

export const RDFS = {
  label: term('rdfs:label'),
};

export const XSD = {
  string: term('xsd:string'),
  integer: term('xsd:integer'),
  decimal: term('xsd:decimal'),
  date: term('xsd:date'),
  dateTime: term('xsd:dateTime'),
  base64Binary: term('xsd:base64Binary'),
};

export const VCARD = {
  Individual: term('vcard:Individual'),
  Organization: term('vcard:Organization'),
  Cell: term('vcard:Cell'),
  Home: term('vcard:Home'),
  Work: term('vcard:Work'),
  Fax: term('vcard:Fax'),
  Pager: term('vcard:Pager'),
  Voice: term('vcard:Voice'),
  fn: term('vcard:fn'),
  hasTelephone: term('vcard:hasTelephone'),
  hasEmail: term('vcard:hasEmail'),
  hasAddress: term('vcard:hasAddress'),
  hasURL: term('vcard:hasURL'),
  hasValue: term('vcard:hasValue'),
  streetAddress: term('vcard:street-address'),
  locality: term('vcard:locality'),
  region: term('vcard:region'),
  postalCode: term('vcard:postal-code'),
  countryName: term('vcard:country-name'),
};

export const GN = {
  countryCode: term('gn:countryCode'),
};

/** AddressBook-specific predicate for a column or entry key that has no vCard equivalent. */
export function abp(localName: string): NamedNode {
  return namedNode(NAMESPACES.abp + encodeIriComponent(localName));
}

// Characters that may not appear unescaped inside an N-Triples IRIREF
const IRI_FORBIDDEN = /[\u0000- <>"{}|^`\\]/gu;

/**
 * Percent-encodes the characters an IRI reference cannot carry, leaving everything else
 * (including non-ASCII, which the serializer may escape later) untouched.
 */
export function encodeIriComponent(value: string): string {
  return value.replace(IRI_FORBIDDEN, ch => encodeURIComponent(ch));
}

const ABSOLUTE_IRI = /^[A-Za-z][A-Za-z0-9+.-]*:\S/;

export function isAbsoluteIri(value: string): boolean {
  return ABSOLUTE_IRI.test(value) && !/[\u0000- <>"{}|^`\\]/u.test(value);
}
