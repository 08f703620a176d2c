/**
 * tcsv — file-backed documents
 *
 * Every successful mutation on a document from useFile() rewrites the whole
 * file under `<path>.lock`. Failures before the lock (unknown column, bad
 * value) must leave the file byte-identical.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  useFile,
  LockTimeoutError,
  UpdateError,
  EncodeError,
} from '../src/index';

const BASIC = 'a: int\nb: str\n@@\na,b\n1,x\n2,y\n';

let dir:  string;
let file: string;

beforeEach(() => {
  dir  = mkdtempSync(join(tmpdir(), 'tcsv-'));
  file = join(dir, 'data.tcsv');
  writeFileSync(file, BASIC, 'utf8');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ─── Rewrites ─────────────────────────────────────────────────────────────────

describe('rewrite on mutation', () => {
  it('binds the document to its file', () => {
    expect(useFile(file).path).toBe(file);
  });

  it('updateField rewrites only the changed cell', () => {
    const doc = useFile(file);
    doc.updateField(0, 'a', 42);

    expect(readFileSync(file, 'utf8')).toBe('a: int\nb: str\n@@\na,b\n42,x\n2,y\n');
  });

  it('insertRow, updateRow and removeRow are all persisted', () => {
    const doc = useFile(file);
    doc.insertRow({ a: 3, b: 'z' });
    doc.updateRow(1, { b: 'why' });
    doc.removeRow(0);

    const reopened = useFile(file);
    expect([...reopened.readAll()]).toEqual([
      { a: 2, b: 'why' },
      { a: 3, b: 'z' },
    ]);
  });

  it('keeps an unusual header byte-identical', () => {
    writeFileSync(file, ' a : INT \n\nb:s\n@@\na,b\n1,x\n', 'utf8');
    useFile(file).updateField(0, 'b', 'q');

    expect(readFileSync(file, 'utf8')).toBe(' a : INT \n\nb:s\n@@\na,b\n1,q\n');
  });

  it('removes the lock marker after each write', () => {
    useFile(file).insertRow({ a: 3, b: 'z' });

    expect(existsSync(`${file}.lock`)).toBe(false);
  });

  it('save() restores a file edited behind the document', () => {
    const doc = useFile(file);
    writeFileSync(file, 'garbage', 'utf8');
    doc.save();

    expect(readFileSync(file, 'utf8')).toBe(BASIC);
  });
});

// ─── Failures ─────────────────────────────────────────────────────────────────

describe('failed mutations', () => {
  it('leave the file untouched on an unknown column', () => {
    const doc = useFile(file);

    expect(() => doc.updateRow(0, { a: 5, nope: 'x' })).toThrow(UpdateError);
    expect(readFileSync(file, 'utf8')).toBe(BASIC);
  });

  it('leave the file untouched when a value does not encode', () => {
    const doc = useFile(file);

    expect(() => doc.insertRow({ a: 'three', b: 'z' })).toThrow(EncodeError);
    expect(readFileSync(file, 'utf8')).toBe(BASIC);
    expect(existsSync(`${file}.lock`)).toBe(false);
  });

  it('time out on a lock held by someone else and leave their marker', () => {
    const doc = useFile(file, { lockRetryMs: 5, lockTimeoutMs: 40, logLevel: 'silent' });
    writeFileSync(`${file}.lock`, '99999', 'utf8');

    expect(() => doc.updateField(0, 'a', 7)).toThrow(LockTimeoutError);
    expect(readFileSync(file, 'utf8')).toBe(BASIC);
    expect(readFileSync(`${file}.lock`, 'utf8')).toBe('99999');
  });

  it('release the lock when the write itself fails', () => {
    const doc = useFile(file);
    rmSync(file);
    mkdirSync(file);

    expect(() => doc.updateField(0, 'a', 7)).toThrow();
    expect(existsSync(`${file}.lock`)).toBe(false);
  });
});

// ─── Logging ──────────────────────────────────────────────────────────────────

describe('logging', () => {
  it('reports each rewrite at debug level', () => {
    const logger = fakeLogger();
    useFile(file, { logger }).updateField(0, 'a', 42);

    expect(logger.debug).toHaveBeenCalledWith(`rewrote ${file} (2 rows)`);
  });

  it('warns once when the lock wait passes half the timeout', () => {
    const logger = fakeLogger();
    const doc = useFile(file, { logger, lockRetryMs: 5, lockTimeoutMs: 40 });
    writeFileSync(`${file}.lock`, '', 'utf8');

    expect(() => doc.removeRow(0)).toThrow(LockTimeoutError);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
