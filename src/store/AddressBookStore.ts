import Database from 'better-sqlite3';
import type { ErrorObject } from 'ajv';
import { logger, SeverityNumber } from '../lib/logger';
import { describeError, SchemaMismatchError, StoreUnreadableError } from '../lib/errors';
import { PERSON_COLUMN_NAMES, PersonColumn } from '../lib/person-columns';
import {
  PersonRow,
  validateCountRow,
  validateMultiValueEntryRow,
  validateMultiValueRow,
  validatePersonRow,
  validateTableColumnRow,
  validationErrors,
} from '../schemas';
import {
  CellValue,
  ContactRecord,
  FieldCell,
  FieldKind,
  MultiValueEntry,
  MultiValueField,
  MultiValueProperty,
} from '../types';
import type { IContactStore } from './IContactStore';

export const DEFAULT_BATCH_SIZE = 500;

// Tables the reader queries, with the columns it selects from each (ROWID is implicit)
const REQUIRED_COLUMNS: Readonly<Record<string, readonly string[]>> = {
  ABPerson: [],
  ABMultiValue: ['UID', 'record_id', 'property', 'label', 'value'],
  ABMultiValueLabel: ['value'],
  ABMultiValueEntry: ['parent_id', 'key', 'value'],
  ABMultiValueEntryKey: ['value'],
};

// Key columns the reader classifies and joins by; SQLite lets any cell hold any type,
// so their storage class is checked when the store is opened
const INTEGER_COLUMNS: readonly { table: string; column: string; nullable: boolean }[] = [
  { table: 'ABMultiValue', column: 'UID', nullable: false },
  { table: 'ABMultiValue', column: 'property', nullable: true },
  { table: 'ABMultiValueEntry', column: 'key', nullable: true },
];

const MULTI_VALUES_SQL = `
  SELECT mv.UID AS uid, mv.property AS property, mvl.value AS label, mv.value AS value
  FROM ABMultiValue mv
  LEFT JOIN ABMultiValueLabel mvl ON mvl.ROWID = mv.label
  WHERE mv.record_id = ?
  ORDER BY mv.UID`;

const ENTRIES_SQL = `
  SELECT mve.parent_id AS parentId, mve.key AS keyId, mvek.value AS keyName, mve.value AS value
  FROM ABMultiValueEntry mve
  JOIN ABMultiValue mv ON mv.UID = mve.parent_id
  LEFT JOIN ABMultiValueEntryKey mvek ON mvek.ROWID = mve.key
  WHERE mv.record_id = ?
  ORDER BY mve.parent_id, mve.ROWID`;

export interface AddressBookStoreOptions {
  /** Number of ABPerson rows fetched per query. */
  batchSize?: number;
}

export function fieldKind(property: number): FieldKind {
  switch (property) {
    case MultiValueProperty.Phone:
      return 'phone';
    case MultiValueProperty.Email:
      return 'email';
    case MultiValueProperty.Address:
      return 'address';
    case MultiValueProperty.Url:
      return 'url';
    default:
      return 'other';
  }
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Narrows a cell returned by better-sqlite3: `null` for SQL NULL, the value itself for
 * TEXT, INTEGER, REAL and BLOB cells, `undefined` for anything else.
 */
export function toCellValue(value: unknown): CellValue | null | undefined {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || Buffer.isBuffer(value)) {
    return value;
  }
  return undefined;
}

/** Like `toCellValue`, with numbers read as their text. */
export function toFieldCell(value: unknown): FieldCell | null | undefined {
  const cell = toCellValue(value);
  return typeof cell === 'number' ? String(cell) : cell;
}

// Labels and entry key names are names, so BLOB cells are read as UTF-8 text
function cellText(cell: FieldCell | null): string | null {
  return Buffer.isBuffer(cell) ? cell.toString('utf8') : cell;
}

/**
 * Read-only access to an iOS AddressBook SQLite database (`AddressBook.sqlitedb`).
 *
 * The schema is verified when the store is opened. Contacts are read lazily in ROWID order,
 * one batch of ABPerson rows at a time, and each contact's multi-valued fields are fetched
 * just before the contact is yielded.
 */
export class AddressBookStore implements IContactStore {
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    public readonly path: string,
    private readonly personColumns: readonly PersonColumn[],
    private readonly batchSize: number,
  ) {}

  /**
   * Opens the database read-only and checks that the AddressBook tables are present.
   * @throws StoreUnreadableError when the file is missing or is not a readable SQLite database
   * @throws SchemaMismatchError when required tables or columns are absent
   */
  static open(path: string, options: AddressBookStoreOptions = {}): AddressBookStore {
    let db: Database.Database;
    try {
      db = new Database(path, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new StoreUnreadableError({
        message: `Cannot open contact store "${path}": ${describeError(error)}`,
        cause: error,
        metadata: { path },
      });
    }

    try {
      const tables = AddressBookStore.readTableColumns(db, path);
      const personColumns = AddressBookStore.verifySchema(tables, path);
      AddressBookStore.verifyKeyColumns(db, path);
      const store = new AddressBookStore(db, path, personColumns, options.batchSize ?? DEFAULT_BATCH_SIZE);
      logger.emit({
        severityNumber: SeverityNumber.DEBUG,
        body: 'Opened contact store',
        attributes: { path, personColumns: personColumns.join(',') },
      });
      return store;
    } catch (error) {
      db.close();
      throw error;
    }
  }

  // Reads the column names of every required table; a table that does not exist has none
  private static readTableColumns(db: Database.Database, path: string): Map<string, Set<string>> {
    const tables = new Map<string, Set<string>>();
    const statement = (() => {
      try {
        return db.prepare('SELECT name FROM pragma_table_info(?)');
      } catch (error) {
        throw new StoreUnreadableError({
          message: `Contact store "${path}" is not a readable SQLite database: ${describeError(error)}`,
          cause: error,
          metadata: { path },
        });
      }
    })();

    for (const table of Object.keys(REQUIRED_COLUMNS)) {
      let rows: unknown[];
      try {
        rows = statement.all(table);
      } catch (error) {
        throw new StoreUnreadableError({
          message: `Contact store "${path}" is not a readable SQLite database: ${describeError(error)}`,
          cause: error,
          metadata: { path, table },
        });
      }
      const columns = new Set<string>();
      for (const row of rows) {
        if (!validateTableColumnRow(row)) {
          throw AddressBookStore.rowMismatch(`pragma_table_info(${table})`, validateTableColumnRow.errors, { path });
        }
        columns.add(row.name.toLowerCase());
      }
      tables.set(table, columns);
    }
    return tables;
  }

  // Returns the mapped ABPerson columns the table actually has
  private static verifySchema(tables: Map<string, Set<string>>, path: string): PersonColumn[] {
    const missing: string[] = [];
    for (const [table, required] of Object.entries(REQUIRED_COLUMNS)) {
      const columns = tables.get(table);
      if (!columns || columns.size === 0) {
        missing.push(`table ${table}`);
        continue;
      }
      for (const column of required) {
        if (!columns.has(column.toLowerCase())) {
          missing.push(`${table}.${column}`);
        }
      }
    }
    if (missing.length > 0) {
      throw new SchemaMismatchError({
        message: `Contact store "${path}" is not an AddressBook database: missing ${missing.join(', ')}`,
        metadata: { path, missing },
      });
    }

    const personTable = tables.get('ABPerson') ?? new Set<string>();
    return PERSON_COLUMN_NAMES.filter(column => personTable.has(column.toLowerCase()));
  }

  // Fails before any contact is read when a key column holds something other than integers
  private static verifyKeyColumns(db: Database.Database, path: string): void {
    const invalid: string[] = [];
    for (const { table, column, nullable } of INTEGER_COLUMNS) {
      const allowed = nullable ? `'integer', 'null'` : `'integer'`;
      const row: unknown = db
        .prepare(`SELECT COUNT(*) AS count FROM ${table} WHERE typeof(${quoteIdentifier(column)}) NOT IN (${allowed})`)
        .get();
      if (!validateCountRow(row)) {
        throw AddressBookStore.rowMismatch(`${table}.${column} check`, validateCountRow.errors, { path });
      }
      if (row.count > 0) {
        invalid.push(`${table}.${column} (${row.count} rows)`);
      }
    }
    if (invalid.length > 0) {
      throw new SchemaMismatchError({
        message: `Contact store "${path}" has non-integer values in ${invalid.join(', ')}`,
        metadata: { path, invalid },
      });
    }
  }

  private static rowMismatch(
    source: string,
    errors: ErrorObject[] | null | undefined,
    metadata: Record<string, unknown>,
  ): SchemaMismatchError {
    return new SchemaMismatchError({
      message: `Unexpected row shape in ${source}: ${validationErrors(errors)}`,
      metadata: { ...metadata, source },
    });
  }

  countContacts(): number {
    this.assertOpen();
    const row: unknown = this.db.prepare('SELECT COUNT(*) AS count FROM ABPerson').get();
    if (!validateCountRow(row)) {
      throw AddressBookStore.rowMismatch('ABPerson count', validateCountRow.errors, { path: this.path });
    }
    return row.count;
  }

  *contacts(): Generator<ContactRecord> {
    this.assertOpen();
    const selectList = [
      'ROWID AS rowid',
      ...this.personColumns.map(column => `${quoteIdentifier(column)} AS ${quoteIdentifier(column)}`),
    ].join(', ');
    // Keyset pagination: each batch starts after the last ROWID of the previous one
    const selectPeople = this.db.prepare(
      `SELECT ${selectList} FROM ABPerson WHERE ? IS NULL OR ROWID > ? ORDER BY ROWID LIMIT ?`,
    );
    const selectFields = this.db.prepare(MULTI_VALUES_SQL);
    const selectEntries = this.db.prepare(ENTRIES_SQL);

    let lastId: number | null = null;
    for (;;) {
      this.assertOpen();
      const rows: unknown[] = selectPeople.all(lastId, lastId, this.batchSize);
      logger.emit({
        severityNumber: SeverityNumber.DEBUG,
        body: 'Read ABPerson batch',
        attributes: { after: lastId ?? 'start', rows: rows.length },
      });

      for (const row of rows) {
        if (!validatePersonRow(row)) {
          throw AddressBookStore.rowMismatch('ABPerson', validatePersonRow.errors, { path: this.path, after: lastId });
        }
        this.assertOpen();
        const contact: ContactRecord = {
          id: row.rowid,
          columns: this.readColumns(row),
          fields: this.readFields(row.rowid, selectFields.all(row.rowid), selectEntries.all(row.rowid)),
        };
        lastId = row.rowid;
        yield contact;
      }

      if (rows.length < this.batchSize) {
        return;
      }
    }
  }

  close(): void {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnreadableError({ message: `Contact store "${this.path}" is closed`, metadata: { path: this.path } });
    }
  }

  private readColumns(row: PersonRow): Map<PersonColumn, CellValue> {
    const columns = new Map<PersonColumn, CellValue>();
    for (const column of this.personColumns) {
      const value = toCellValue(row[column]);
      if (value === undefined) {
        throw this.unsupportedValue('ABPerson', row.rowid, column);
      }
      if (value !== null) {
        columns.set(column, value);
      }
    }
    return columns;
  }

  private fieldCell(value: unknown, table: string, id: number, column: string): FieldCell | null {
    const cell = toFieldCell(value);
    if (cell === undefined) {
      throw this.unsupportedValue(table, id, column);
    }
    return cell;
  }

  private unsupportedValue(table: string, id: number, column: string): SchemaMismatchError {
    return new SchemaMismatchError({
      message: `${table} row ${id} has an unsupported value in column ${column}`,
      metadata: { path: this.path, table, id, column },
    });
  }

  private readFields(contactId: number, fieldRows: unknown[], entryRows: unknown[]): MultiValueField[] {
    const entriesByParent = new Map<number, MultiValueEntry[]>();
    for (const row of entryRows) {
      if (!validateMultiValueEntryRow(row)) {
        throw AddressBookStore.rowMismatch('ABMultiValueEntry', validateMultiValueEntryRow.errors, { path: this.path, contactId });
      }
      const value = this.fieldCell(row.value, 'ABMultiValueEntry', row.parentId, 'value');
      if (value === null) {
        continue;
      }
      const keyName = cellText(this.fieldCell(row.keyName, 'ABMultiValueEntryKey', row.parentId, 'value'));
      const entries = entriesByParent.get(row.parentId) ?? [];
      entries.push({ keyId: row.keyId, keyName, value });
      entriesByParent.set(row.parentId, entries);
    }

    const ordinals = new Map<string, number>();
    const fields: MultiValueField[] = [];
    for (const row of fieldRows) {
      if (!validateMultiValueRow(row)) {
        throw AddressBookStore.rowMismatch('ABMultiValue', validateMultiValueRow.errors, { path: this.path, contactId });
      }
      if (row.property === null) {
        continue;
      }
      const kind = fieldKind(row.property);
      const ordinalKey = kind === 'other' ? `other:${row.property}` : kind;
      const ordinal = ordinals.get(ordinalKey) ?? 0;
      ordinals.set(ordinalKey, ordinal + 1);

      fields.push({
        uid: row.uid,
        property: row.property,
        kind,
        label: cellText(this.fieldCell(row.label, 'ABMultiValueLabel', row.uid, 'value')),
        value: this.fieldCell(row.value, 'ABMultiValue', row.uid, 'value'),
        ordinal,
        entries: entriesByParent.get(row.uid) ?? [],
      });
    }
    return fields;
  }
}
