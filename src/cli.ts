import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { Writable } from 'stream';
import { config, parseCountryCode, parsePositiveInt } from './config';
import { findAddressBookBackup, BackupLocatorOptions } from './lib/backup-locator';
import { convertAddressBook } from './lib/converter';
import { ConversionError } from './lib/errors';
import { logger, setLogLevel, SeverityNumber } from './lib/logger';

export interface CliOptions {
  input?: string;
  output?: string;
  countryCode?: string;
  ascii?: boolean;
  batchSize?: number;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliIO {
  stdout: Writable;
  stderr: Writable;
  /** Where to look for a device backup when no input is given. */
  backup?: BackupLocatorOptions;
}

const defaultIO: CliIO = { stdout: process.stdout, stderr: process.stderr };

function parseCountryCodeOption(value: string): string {
  const code = parseCountryCode(value);
  if (code === undefined) {
    throw new InvalidArgumentError('Expected a calling code such as 36 or +44.');
  }
  return code;
}

function parseBatchSizeOption(value: string): number {
  const size = parsePositiveInt(value, 0);
  if (size === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return size;
}

export function createProgram(io: CliIO = defaultIO): Command {
  return new Command()
    .name('addressbook-rdf')
    .description('Convert contacts from an iOS AddressBook SQLite database to N-Triples.')
    .version('1.0.0')
    .option('-i, --input <file>', 'input iOS AddressBook SQLite database (default: the newest iTunes/Finder backup found)')
    .option('-o, --output <file>', 'output N-Triples (.nt) file (default: standard output)')
    .option('-c, --country-code <code>', 'calling code prepended to local phone numbers', parseCountryCodeOption)
    .option('--ascii', 'escape every non-ASCII character in the output')
    .option('--batch-size <n>', 'number of contacts read per database query', parseBatchSizeOption)
    .option('-v, --verbose', 'log debug details to stderr')
    .option('-q, --quiet', 'log errors only')
    .configureOutput({
      writeOut: text => io.stdout.write(text),
      writeErr: text => io.stderr.write(text),
    })
    .exitOverride();
}

/**
 * Runs the converter for the given command-line arguments (without the node and script
 * entries) and resolves with the process exit code.
 */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  const program: Command = createProgram(io);
  let options: CliOptions;
  let input: string;
  try {
    program.parse(args, { from: 'user' });
    options = program.opts<CliOptions>();
    if (options.verbose) {
      setLogLevel('debug');
    } else if (options.quiet) {
      setLogLevel('error');
    }
    const located = options.input ?? findAddressBookBackup(io.backup);
    if (located === undefined) {
      program.error('error: missing input file (no --input given and no device backup found)');
    }
    input = located;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    await convertAddressBook({
      input,
      output: options.output,
      stdout: io.stdout,
      countryCallingCode: options.countryCode ?? config.phoneCountryCode,
      asciiOnly: options.ascii ?? config.asciiOnly,
      batchSize: options.batchSize ?? config.readBatchSize,
    });
    return 0;
  } catch (error) {
    if (error instanceof ConversionError) {
      logger.emit({
        severityNumber: SeverityNumber.ERROR,
        body: 'Conversion failed',
        attributes: { code: error.code, error: error.message },
      });
      io.stderr.write(`error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}
