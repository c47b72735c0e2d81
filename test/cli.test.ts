import * as fs from 'fs';
import * as path from 'path';
import { Writable } from 'stream';
import { CliIO, runCli } from '../src/cli';
import { createAddressBook, makeTempDir, removeTempDir } from './test-utils/address-book-fixture';

class StringSink extends Writable {
  text = '';

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString('utf8');
    callback();
  }
}

describe('runCli', () => {
  let dir: string;
  let input: string;
  let output: string;
  let stdout: StringSink;
  let stderr: StringSink;
  let io: CliIO;

  beforeEach(() => {
    dir = makeTempDir();
    input = path.join(dir, 'AddressBook.sqlitedb');
    output = path.join(dir, 'contacts.nt');
    stdout = new StringSink();
    stderr = new StringSink();
    io = { stdout, stderr, backup: { platform: 'linux' } };
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('converts the input file into the output file and exits with 0', async () => {
    createAddressBook(input, [
      { columns: { First: 'Ann' }, fields: [{ property: 3, label: '_$!<Home>!$_', value: '06 30 123 456' }] },
    ]);

    const code = await runCli(['-i', input, '-o', output, '-c', '+36'], io);

    expect(code).toBe(0);
    expect(fs.readFileSync(output, 'utf8').split('\n')).toContain(
      '_:p1tel0 <http://www.w3.org/2006/vcard/ns#hasValue> <tel:+3630123456> .',
    );
    expect(stdout.text).toBe('');
    expect(stderr.text).toBe('');
  });

  it('writes to stdout when no output file is given', async () => {
    createAddressBook(input, [{ columns: { First: 'Ann' } }]);

    const code = await runCli(['--input', input], io);

    expect(code).toBe(0);
    expect(stdout.text).toBe(
      '_:p1 <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://www.w3.org/2006/vcard/ns#Individual> .\n' +
        '_:p1 <http://www.w3.org/2006/vcard/ns#fn> "Ann" .\n' +
        '_:p1 <http://www.w3.org/2006/vcard/ns#given-name> "Ann" .\n',
    );
  });

  it('escapes non-ASCII output with --ascii', async () => {
    createAddressBook(input, [{ columns: { First: 'Zoë' } }]);

    await runCli(['-i', input, '--ascii'], io);

    expect(stdout.text.split('\n')[1]).toBe('_:p1 <http://www.w3.org/2006/vcard/ns#fn> "Zo\\u00EB" .');
  });

  it('exits with 1 and reports a store that is not an AddressBook', async () => {
    fs.writeFileSync(input, '');

    const code = await runCli(['-i', input, '-o', output], io);

    expect(code).toBe(1);
    expect(stderr.text).toBe(
      `error: Contact store "${input}" is not an AddressBook database: missing table ABPerson, table ABMultiValue, ` +
        'table ABMultiValueLabel, table ABMultiValueEntry, table ABMultiValueEntryKey\n',
    );
    expect(fs.existsSync(output)).toBe(false);
  });

  it('exits with 1 when the input file does not exist', async () => {
    const code = await runCli(['-i', input, '-o', output], io);

    expect(code).toBe(1);
    expect(stderr.text.startsWith(`error: Cannot open contact store "${input}": `)).toBe(true);
    expect(fs.existsSync(output)).toBe(false);
  });

  it('exits with 1 when no input is given and no backup is found', async () => {
    const code = await runCli([], io);

    expect(code).toBe(1);
    expect(stderr.text).toBe('error: missing input file (no --input given and no device backup found)\n');
  });

  it('rejects an invalid country code', async () => {
    const code = await runCli(['-i', input, '-c', 'HU'], io);

    expect(code).toBe(1);
    expect(stderr.text).toContain("argument 'HU' is invalid. Expected a calling code such as 36 or +44.");
  });

  it('prints the version and exits with 0', async () => {
    const code = await runCli(['--version'], io);

    expect(code).toBe(0);
    expect(stdout.text).toBe('1.0.0\n');
  });
});
