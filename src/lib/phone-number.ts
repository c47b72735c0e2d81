// Formatting characters stripped before a number is classified
const FORMATTING_CHARS = /[<>()\-\u2011 \t\n\u00a0\u202a\u202c]/g;

// Prefixes that dial out of the local numbering plan, longest first where they overlap
const INTERNATIONAL_PREFIXES = ['0011', '000', '001', '010', '011', '00', '+'];

// Countries whose numbering plan has no trunk prefix
const NO_TRUNK_PREFIX = new Set([
  '420', '45', '372', '30', '39', '371', '352', '356', '377',
  '977', '47', '968', '48', '351', '378', '34', '3906698',
]);

/**
 * Returns the prefix dialled before a local number within the country, e.g. `0` in most of
 * Europe, `06` in Hungary or `1` in the North American Numbering Plan.
 */
export function localTrunkPrefix(countryCallingCode: string): string {
  if (!countryCallingCode) {
    return '';
  }
  if (countryCallingCode.startsWith('1')) {
    return '1';
  }
  if (countryCallingCode.startsWith('7')) {
    return '8';
  }
  if (countryCallingCode === '36') {
    return '06';
  }
  if (NO_TRUNK_PREFIX.has(countryCallingCode)) {
    return '';
  }
  return '0';
}

export interface NormalizeOptions {
  /** Calling code (without `+`) prepended to numbers recognised as local. */
  countryCallingCode?: string;
  /** Reject numbers containing anything other than digits, `+`, `*` and `#`. */
  digitsOnly?: boolean;
}

/**
 * Removes formatting from a phone number.
 *
 * International numbers come back with a leading `+`. Local numbers are made international
 * when a country calling code is given and the number starts with that country's trunk
 * prefix. Short numbers and numbers containing `*` or `#` are left as dialled.
 *
 * @returns the normalized number, or `null` when `digitsOnly` is set and the input has other characters
 */
export function normalizePhoneNumber(phoneNumber: string, options: NormalizeOptions = {}): string | null {
  let number = phoneNumber.toLowerCase().replace(FORMATTING_CHARS, '');
  if (number.startsWith('tel:')) {
    number = number.slice(4);
  }

  const isSpecial = number.length < 5 || number.includes('*') || number.includes('#');

  if (options.digitsOnly && !/^\d+$/.test(number.replace(/[+*#]/g, ''))) {
    return null;
  }

  let isInternational = false;
  const prefix = INTERNATIONAL_PREFIXES.find(p => number.startsWith(p));
  if (prefix !== undefined) {
    number = number.slice(prefix.length);
    isInternational = true;
  } else {
    isInternational = number.length >= 11;
  }

  const countryCode = options.countryCallingCode;
  if (!isInternational && !isSpecial && countryCode) {
    const trunk = localTrunkPrefix(countryCode);
    if (number.startsWith(trunk)) {
      number = countryCode + number.slice(trunk.length);
      isInternational = true;
    }
  }

  return isInternational && !isSpecial ? `+${number}` : number;
}
