import * as fs from 'fs';
import type { Writable } from 'stream';
import { performance } from 'perf_hooks';
import { config } from '../config';
import { AddressBookStore } from '../store/AddressBookStore';
import type { IContactStore } from '../store/IContactStore';
import type { ConversionSummary } from '../types';
import { mapContact, MapperOptions } from './contact-mapper';
import { describeError } from './errors';
import { logger, SeverityNumber } from './logger';
import { NTriplesEmitter } from './NTriplesEmitter';

export interface ConvertOptions {
  /** AddressBook database file. */
  input: string;
  /** N-Triples file to create; when absent the graph goes to `stdout`. */
  output?: string;
  /** Stream used when no output file is given (default process.stdout). */
  stdout?: Writable;
  countryCallingCode?: string;
  asciiOnly?: boolean;
  batchSize?: number;
}

/**
 * Streams every contact of an open store through the mapper into the emitter.
 * Neither the store nor the emitter is closed here.
 */
export async function emitContacts(
  store: IContactStore,
  emitter: NTriplesEmitter,
  options: MapperOptions = {},
): Promise<number> {
  let contacts = 0;
  for (const contact of store.contacts()) {
    await emitter.write(mapContact(contact, options));
    contacts++;
  }
  return contacts;
}

/**
 * Converts an AddressBook database to N-Triples.
 *
 * The store is opened (and its schema checked) before the output file is created, so a
 * missing or foreign database never leaves an output file behind. Both the store and the
 * output are released on every exit path.
 */
export async function convertAddressBook(options: ConvertOptions): Promise<ConversionSummary> {
  const started = performance.now();
  const store = AddressBookStore.open(options.input, { batchSize: options.batchSize ?? config.readBatchSize });

  try {
    logger.emit({
      severityNumber: SeverityNumber.INFO,
      body: 'Converting contact store',
      attributes: { input: options.input, output: options.output ?? 'stdout', contacts: store.countContacts() },
    });

    const sink = options.output !== undefined ? fs.createWriteStream(options.output) : (options.stdout ?? process.stdout);
    const emitter = new NTriplesEmitter(sink, {
      asciiOnly: options.asciiOnly ?? config.asciiOnly,
      endSink: options.output !== undefined,
    });

    let contacts: number;
    try {
      contacts = await emitContacts(store, emitter, {
        countryCallingCode: options.countryCallingCode ?? config.phoneCountryCode,
      });
    } catch (error) {
      await emitter.close().catch((closeError: unknown) => {
        logger.emit({
          severityNumber: SeverityNumber.WARN,
          body: 'Failed to close output after an error',
          attributes: { error: describeError(closeError) },
        });
      });
      throw error;
    }
    await emitter.close();

    const summary: ConversionSummary = {
      contacts,
      triples: emitter.count,
      durationMs: Math.round(performance.now() - started),
    };
    logger.emit({
      severityNumber: SeverityNumber.INFO,
      body: `Converted ${summary.contacts} contacts into ${summary.triples} triples`,
      attributes: config.enableTimingLogs ? { durationMs: summary.durationMs } : {},
    });
    return summary;
  } finally {
    store.close();
  }
}
