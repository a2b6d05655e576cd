import { describe, it, expect } from 'vitest';
import { formatRawNumber, formatResult } from './format.js';
import type { JsonValue } from '../json.js';

type Case = { name: string; value: JsonValue; pretty: boolean; raw: boolean; expected: string };

const cases: Case[] = [
  { name: 'null value', value: null, pretty: true, raw: false, expected: 'null\n' },
  { name: 'null value in raw mode', value: null, pretty: false, raw: true, expected: 'null\n' },
  { name: 'string with raw output', value: 'hello', pretty: false, raw: true, expected: 'hello\n' },
  { name: 'string with JSON output', value: 'hello', pretty: false, raw: false, expected: '"hello"\n' },
  { name: 'number with raw output', value: 42.5, pretty: false, raw: true, expected: '42.5\n' },
  { name: 'number with JSON output', value: 42.5, pretty: true, raw: false, expected: '42.5\n' },
  { name: 'small number with raw output', value: 0.0000001, pretty: false, raw: true, expected: '0.0000001\n' },
  { name: 'negative zero with JSON output', value: -0, pretty: true, raw: false, expected: '-0\n' },
  { name: 'boolean with raw output', value: true, pretty: false, raw: true, expected: 'true\n' },
  { name: 'boolean with JSON output', value: false, pretty: true, raw: false, expected: 'false\n' },
  {
    name: 'array of strings with raw output',
    value: ['alice@example.com', 'bob@example.com'],
    pretty: false,
    raw: true,
    expected: 'alice@example.com\nbob@example.com\n',
  },
  { name: 'object with pretty JSON', value: { name: 'Alice', age: 30 }, pretty: true, raw: false, expected: '{\n  "age": 30,\n  "name": "Alice"\n}\n' },
  { name: 'object with compact JSON', value: { name: 'Alice', age: 30 }, pretty: false, raw: false, expected: '{"age":30,"name":"Alice"}\n' },
  { name: 'array with compact JSON', value: [1, 'a', null], pretty: false, raw: false, expected: '[1,"a",null]\n' },
  { name: 'array with pretty JSON', value: [1, 'a'], pretty: true, raw: false, expected: '[\n  1,\n  "a"\n]\n' },
];

describe('formatResult', () => {
  it.each(cases)('$name', ({ value, pretty, raw, expected }) => {
    expect(formatResult(value, { pretty, raw })).toBe(expected);
  });

  it('prints mixed raw arrays with JSON for non-strings', () => {
    const value: JsonValue = ['a', 1.5, { b: 2, a: 1 }, null, [1, 2], false];
    expect(formatResult(value, { pretty: true, raw: true })).toBe('a\n1.5\n{"a":1,"b":2}\nnull\n[1,2]\nfalse\n');
  });

  it('prints objects as JSON in raw mode', () => {
    expect(formatResult({ b: 1, a: 'x' }, { pretty: true, raw: true })).toBe('{\n  "a": "x",\n  "b": 1\n}\n');
    expect(formatResult({ b: 1, a: 'x' }, { pretty: false, raw: true })).toBe('{"a":"x","b":1}\n');
  });

  it('prints nothing for an empty raw array', () => {
    expect(formatResult([], { pretty: true, raw: true })).toBe('');
  });

  it('keeps strings with newlines intact in raw mode', () => {
    expect(formatResult('two\nlines', { pretty: true, raw: true })).toBe('two\nlines\n');
  });
});

describe('formatRawNumber', () => {
  it.each([
    [30, '30'],
    [42.5, '42.5'],
    [0.1 + 0.2, '0.3'],
    [-7.25, '-7.25'],
    [12345678901, '12345678900'],
    [2 / 3, '0.6666666667'],
    [1e15 + 0.5, '1000000000000000'],
    [1e-7, '0.0000001'],
    [1e22, '10000000000000000000000'],
    [-1.5e-8, '-0.000000015'],
    [-0, '-0'],
  ])('formats %d as %s', (n, expected) => {
    expect(formatRawNumber(n)).toBe(expected);
  });
});
