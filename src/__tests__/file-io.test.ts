/**
 * File reader/writer tests against a scratch directory.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { readDataFile } from '../io/FileReader';
import { writeDataFile } from '../io/FileWriter';
import { detectFileFormat, ensureOutputExtension } from '../io/FileFormat';
import { FormatterErrorKind, isFormatterError } from '../errors/FormatterError';

let testDir: string;

beforeAll(async () => {
  testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pattern-formatter-io-'));
});

afterAll(async () => {
  await fs.rm(testDir, { recursive: true, force: true });
});

async function expectKind(promise: Promise<unknown>, kind: FormatterErrorKind): Promise<void> {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  expect(isFormatterError(caught, kind)).toBe(true);
}

describe('detectFileFormat', () => {
  it('maps extensions case-insensitively', () => {
    expect(detectFileFormat('data.txt')).toBe('txt');
    expect(detectFileFormat('DATA.CSV')).toBe('csv');
    expect(detectFileFormat('data.json')).toBeNull();
    expect(detectFileFormat('data')).toBeNull();
  });
});

describe('ensureOutputExtension', () => {
  it('appends .txt when no supported extension is present', () => {
    expect(ensureOutputExtension('out')).toEqual({ path: 'out.txt', changed: true });
    expect(ensureOutputExtension('report.json')).toEqual({ path: 'report.json.txt', changed: true });
  });

  it('keeps .txt and .csv paths', () => {
    expect(ensureOutputExtension('out.txt')).toEqual({ path: 'out.txt', changed: false });
    expect(ensureOutputExtension('out.CSV')).toEqual({ path: 'out.CSV', changed: false });
  });
});

describe('readDataFile', () => {
  it('trims text lines and drops blank ones', async () => {
    const file = path.join(testDir, 'lines.txt');
    await fs.writeFile(file, '  alpha  \n\n beta\r\n\t\ngamma');

    expect(await readDataFile(file)).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('ignores a byte-order mark', async () => {
    const file = path.join(testDir, 'bom.txt');
    await fs.writeFile(file, '\uFEFFfirst\nsecond\n');

    expect(await readDataFile(file)).toEqual(['first', 'second']);
  });

  it('rejoins CSV rows with commas and drops empty rows', async () => {
    const file = path.join(testDir, 'people.csv');
    await fs.writeFile(file, 'name,email\n"Smith, J",j@example.com\n,\n\nbob,b@example.com\n');

    expect(await readDataFile(file)).toEqual([
      'name,email',
      'Smith, J,j@example.com',
      'bob,b@example.com',
    ]);
  });

  it('keeps stray quotes inside unquoted CSV fields', async () => {
    const file = path.join(testDir, 'screens.csv');
    await fs.writeFile(file, 'model,size\nTV-1,55" screen\nTV-2,65" screen\n');

    expect(await readDataFile(file)).toEqual([
      'model,size',
      'TV-1,55" screen',
      'TV-2,65" screen',
    ]);
  });

  it('accepts upper-case extensions', async () => {
    const file = path.join(testDir, 'UPPER.TXT');
    await fs.writeFile(file, 'one\n');

    expect(await readDataFile(file)).toEqual(['one']);
  });

  it('fails with FileNotFound for a missing file', async () => {
    const file = path.join(testDir, 'missing.txt');
    await expect(readDataFile(file)).rejects.toThrow(`File not found: ${file}`);
    await expectKind(readDataFile(file), 'FileNotFound');
  });

  it('fails with UnsupportedFormat for other extensions', async () => {
    const file = path.join(testDir, 'data.json');
    await fs.writeFile(file, '{}');

    await expectKind(readDataFile(file), 'UnsupportedFormat');
  });

  it('fails with ReadError for other I/O failures', async () => {
    const dir = path.join(testDir, 'folder.txt');
    await fs.mkdir(dir);

    await expectKind(readDataFile(dir), 'ReadError');
  });
});

describe('writeDataFile', () => {
  it('writes one line per entry to .txt', async () => {
    const file = path.join(testDir, 'out.txt');
    await writeDataFile(['a|b', 'c|d'], file);

    expect(await fs.readFile(file, 'utf-8')).toBe('a|b\nc|d\n');
  });

  it('splits entries on pipes into CSV rows', async () => {
    const file = path.join(testDir, 'out.csv');
    await writeDataFile(['a|b', 'Smith, J|x'], file);

    expect(await fs.readFile(file, 'utf-8')).toBe('a,b\r\n"Smith, J",x\r\n');
  });

  it('round-trips formatted lines through .txt', async () => {
    const file = path.join(testDir, 'roundtrip.txt');
    const lines = ['a|b|c', 'd|e|f', 'a|b|c'];
    await writeDataFile(lines, file);

    expect(await readDataFile(file)).toEqual(lines);
  });

  it('fails with UnsupportedFormat for other extensions', async () => {
    const file = path.join(testDir, 'out.json');
    await expectKind(writeDataFile(['a'], file), 'UnsupportedFormat');
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('fails with WriteError when the directory does not exist', async () => {
    const file = path.join(testDir, 'no-such-dir', 'out.txt');
    await expectKind(writeDataFile(['a'], file), 'WriteError');
  });
});
