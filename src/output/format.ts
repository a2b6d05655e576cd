import type { JsonValue } from '../json.js';
import { encodeJson } from './encode.js';

export type FormatOptions = {
  pretty: boolean;
  raw: boolean;
};

const PRETTY_INDENT = 2;

const RAW_NUMBER = new Intl.NumberFormat('en-US', { useGrouping: false, maximumSignificantDigits: 10 });

// Ten significant digits in plain decimal notation, never an exponent.
export function formatRawNumber(n: number): string {
  if (Object.is(n, -0)) return '-0';
  return RAW_NUMBER.format(n);
}

function formatRaw(value: JsonValue): string | undefined {
  if (typeof value === 'string') return value + '\n';
  if (typeof value === 'number') return formatRawNumber(value) + '\n';
  if (typeof value === 'boolean') return `${value}\n`;
  if (Array.isArray(value)) {
    return value.map(item => (typeof item === 'string' ? item : encodeJson(item)) + '\n').join('');
  }
  return undefined;
}

/**
 * Render the normalised query result as it should appear on stdout,
 * trailing newline included.
 *
 * Raw mode only changes scalars and arrays; `null` and objects are always
 * written as JSON.
 */
export function formatResult(value: JsonValue, { pretty, raw }: FormatOptions): string {
  if (value === null) return 'null\n';
  if (raw) {
    const text = formatRaw(value);
    if (text !== undefined) return text;
  }
  return encodeJson(value, { indent: pretty ? PRETTY_INDENT : 0 }) + '\n';
}
