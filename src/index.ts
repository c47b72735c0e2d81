// Library entry point
export { convertAddressBook, emitContacts } from './lib/converter';
export type { ConvertOptions } from './lib/converter';
export { AddressBookStore, DEFAULT_BATCH_SIZE } from './store/AddressBookStore';
export type { AddressBookStoreOptions } from './store/AddressBookStore';
export type { IContactStore } from './store/IContactStore';
export { mapContact, contactSubject, fieldSubject, displayLabel, formattedName } from './lib/contact-mapper';
export type { MapperOptions } from './lib/contact-mapper';
export { NTriplesEmitter } from './lib/NTriplesEmitter';
export type { EmitterOptions } from './lib/NTriplesEmitter';
export { formatTerm, formatTriple, escapeLiteral } from './lib/ntriples';
export { normalizePhoneNumber, localTrunkPrefix } from './lib/phone-number';
export { findAddressBookBackup, ADDRESS_BOOK_BACKUP_FILE } from './lib/backup-locator';
export { NAMESPACES } from './lib/vocabulary';
export {
  ConversionError,
  StoreUnreadableError,
  SchemaMismatchError,
  WriteFailureError,
} from './lib/errors';
export type { ConversionErrorCode } from './lib/errors';
export * from './types';
