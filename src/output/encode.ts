import type { JsonValue } from '../json.js';
import { FormatError } from '../errors.js';

export type EncodeOptions = { indent?: number };

/**
 * JSON.stringify with object keys emitted in sorted order. Rebuilding the
 * object is not enough: integer-like keys always enumerate first.
 */
export function encodeJson(value: JsonValue, { indent = 0 }: EncodeOptions = {}): string {
  const pad = ' '.repeat(indent);
  return encode(value, pad, '');
}

function encode(value: JsonValue, pad: string, depth: string): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new FormatError(`json: unsupported value: ${value}`);
    // JSON.stringify drops the sign of negative zero
    return Object.is(value, -0) ? '-0' : JSON.stringify(value);
  }

  const inner = depth + pad;
  const open = pad ? `\n${inner}` : '';
  const close = pad ? `\n${depth}` : '';
  const sep = pad ? `,\n${inner}` : ',';

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const items = value.map(v => encode(v, pad, inner));
    return `[${open}${items.join(sep)}${close}]`;
  }

  const keys = Object.keys(value).sort();
  if (keys.length === 0) return '{}';
  const colon = pad ? ': ' : ':';
  const entries = keys.map(k => `${JSON.stringify(k)}${colon}${encode(value[k], pad, inner)}`);
  return `{${open}${entries.join(sep)}${close}}`;
}
