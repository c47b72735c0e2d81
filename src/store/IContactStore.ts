import type { ContactRecord } from '../types';

/**
 * Defines the contract for reading contacts out of a contact database.
 * An instance holds an open handle; callers release it with `close()` on every exit path.
 */
export interface IContactStore {
  /** Path of the database file the store was opened from. */
  readonly path: string;

  /**
   * Lazily yields every contact with its multi-valued fields, in the store's row order.
   * @throws SchemaMismatchError when a row does not have the expected shape.
   */
  contacts(): Iterable<ContactRecord>;

  /** Number of contacts in the store. */
  countContacts(): number;

  /** Releases the database handle. Calling it twice is harmless. */
  close(): void;
}
