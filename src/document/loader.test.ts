import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadDocument, parseDocument } from './loader.js';
import { FileOpenError, FileReadError, JsonParseError } from '../errors.js';

describe('loadDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'query-json-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('decodes a JSON file', async () => {
    const file = join(dir, 'doc.json');
    await writeFile(file, '{"test": "data", "n": [1, 2.5, null]}');
    expect(await loadDocument(file)).toEqual({ test: 'data', n: [1, 2.5, null] });
  });

  it('decodes a scalar document', async () => {
    const file = join(dir, 'scalar.json');
    await writeFile(file, '"hello world"');
    expect(await loadDocument(file)).toBe('hello world');
  });

  it('fails to open a missing file', async () => {
    const file = join(dir, 'missing.json');
    await expect(loadDocument(file)).rejects.toThrow(FileOpenError);
    await expect(loadDocument(file)).rejects.toThrow(`ENOENT: no such file or directory, open '${file}'`);
  });

  it('fails to read a directory', async () => {
    await expect(loadDocument(dir)).rejects.toThrow(FileReadError);
    await expect(loadDocument(dir)).rejects.toThrow('EISDIR');
  });

  it('reports malformed JSON as a parse error', async () => {
    const file = join(dir, 'bad.json');
    await writeFile(file, '{"invalid": json}');
    await expect(loadDocument(file)).rejects.toThrow(JsonParseError);
  });
});

describe('parseDocument', () => {
  it('rejects empty input', () => {
    expect(() => parseDocument('')).toThrow(JsonParseError);
  });

  it('labels parse failures as JSON errors', () => {
    try {
      parseDocument('[1, 2');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(JsonParseError);
      if (err instanceof JsonParseError) expect(err.report()).toMatch(/^Error parsing JSON: .+/);
    }
  });
});
