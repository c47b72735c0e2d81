import type { Quad, Term } from '@rdfjs/types';

const XSD_STRING = 'http://www.w3.org/2001/XMLSchema#string';

export interface SerializeOptions {
  /** Escape every non-ASCII code point as `\uXXXX` / `\UXXXXXXXX`. */
  asciiOnly?: boolean;
}

const ECHAR: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

function uchar(codePoint: number): string {
  const hex = codePoint.toString(16).toUpperCase();
  return codePoint > 0xffff ? `\\U${hex.padStart(8, '0')}` : `\\u${hex.padStart(4, '0')}`;
}

// Code points outside printable ASCII
const NON_ASCII = /[^ -~]/gu;

function escapeNonAscii(value: string): string {
  return value.replace(NON_ASCII, ch => uchar(ch.codePointAt(0) ?? 0));
}

/**
 * Escapes a string for use between the quotes of an N-Triples literal.
 * Quote, backslash and the usual whitespace controls use their short escapes; the remaining
 * C0 controls and DEL use `\u00XX`.
 */
export function escapeLiteral(value: string, options: SerializeOptions = {}): string {
  const escaped = value.replace(/[\\"\u0000-\u001f\u007f]/g, ch => ECHAR[ch] ?? uchar(ch.charCodeAt(0)));
  return options.asciiOnly ? escapeNonAscii(escaped) : escaped;
}

export function escapeIri(value: string, options: SerializeOptions = {}): string {
  return options.asciiOnly ? escapeNonAscii(value) : value;
}

/**
 * Formats a single RDF/JS term in N-Triples syntax.
 */
export function formatTerm(term: Term, options: SerializeOptions = {}): string {
  switch (term.termType) {
    case 'NamedNode':
      return `<${escapeIri(term.value, options)}>`;
    case 'BlankNode':
      return `_:${term.value}`;
    case 'Literal': {
      const lexical = `"${escapeLiteral(term.value, options)}"`;
      if (term.language) {
        return `${lexical}@${term.language}`;
      }
      if (term.datatype && term.datatype.value !== XSD_STRING) {
        return `${lexical}^^<${escapeIri(term.datatype.value, options)}>`;
      }
      return lexical;
    }
    default:
      throw new Error(`Term type "${term.termType}" cannot be written as N-Triples`);
  }
}

/**
 * Formats a quad as one N-Triples line, terminated by a newline. The graph is ignored:
 * everything lands in the default graph.
 */
export function formatTriple(quad: Quad, options: SerializeOptions = {}): string {
  return `${formatTerm(quad.subject, options)} ${formatTerm(quad.predicate, options)} ${formatTerm(quad.object, options)} .\n`;
}
