import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { JsonValue } from '../json.js';
import { FileOpenError, FileReadError, JsonParseError, errorMessage } from '../errors.js';

async function readAll(path: string): Promise<string> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    throw new FileOpenError(errorMessage(err));
  }
  try {
    return await handle.readFile({ encoding: 'utf-8' });
  } catch (err) {
    throw new FileReadError(errorMessage(err));
  } finally {
    await handle.close();
  }
}

export function parseDocument(text: string): JsonValue {
  try {
    const doc: JsonValue = JSON.parse(text);
    return doc;
  } catch (err) {
    throw new JsonParseError(errorMessage(err));
  }
}

/** Read the whole file at `path` and decode it as JSON. */
export async function loadDocument(path: string): Promise<JsonValue> {
  const text = await readAll(path);
  return parseDocument(text);
}
