import { JSONPath } from 'jsonpath-plus';
import type { JsonValue } from '../json.js';
import { QuerySyntaxError, errorMessage } from '../errors.js';

export type QueryAst = {
  source: string;
  /** The expression handed to jsonpath-plus after rewriting. */
  path: string;
  segments: string[];
};

/**
 * Narrow seam around the JSONPath engine. `parse` rejects expressions the
 * engine cannot read; `evaluate` returns every match in document order and
 * may return an empty list.
 */
export interface QueryEvaluator {
  parse(query: string): QueryAst;
  evaluate(ast: QueryAst, document: JsonValue): JsonValue[];
}

type TracedMatch = {
  value: JsonValue;
  parent: JsonValue | null;
  parentProperty: string | number | null;
};

type Opener = { char: '[' | '('; at: number };

const CLOSERS: Record<string, Opener['char']> = { ']': '[', ')': '(' };
const NEGATIVE_INDEX = /^\[\s*-(\d+)\s*\]/;
const EMPTY_BRACKETS = /^\[\s*\]/;
// `@.name =~ /re/flags` becomes `/re/flags.test(@.name)`
const REGEX_MATCH = /([@$](?:\.[\w$]+|\[[^\][()]*\])*)\s*=~\s*(\/(?:\\.|[^/\\])+\/[a-z]*)/g;

/** Index of the unescaped `delimiter` closing the literal opened at `start`, or -1. */
function findClosing(text: string, start: number, delimiter: string): number {
  for (let i = start + 1; i < text.length; i++) {
    if (text[i] === '\\') i++;
    else if (text[i] === delimiter) return i;
  }
  return -1;
}

// jsonpath-plus treats `[-n]` as a property name; a one-element slice selects the item.
function negativeIndexSlice(n: number): string {
  if (n === 0) return '[0]';
  if (n === 1) return '[-1:]';
  return `[-${n}:-${n - 1}]`;
}

/**
 * Check brackets, parentheses, quotes and regex literals, and rewrite the
 * forms jsonpath-plus reads differently: negative indices outside filters and
 * the `=~` operator inside them.
 */
export function rewriteQuery(query: string): string {
  const open: Opener[] = [];
  let out = '';
  let i = 0;
  while (i < query.length) {
    const ch = query[i];
    const inFilter = open.some(o => o.char === '(');

    const isRegex = ch === '/' && inFilter && query.slice(0, i).trimEnd().endsWith('=~');
    if (ch === "'" || ch === '"' || isRegex) {
      const end = findClosing(query, i, ch);
      if (end < 0) throw new QuerySyntaxError(`unterminated ${isRegex ? 'regular expression' : 'string'} at offset ${i}`);
      out += query.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (ch === '[') {
      const rest = query.slice(i);
      if (EMPTY_BRACKETS.test(rest)) throw new QuerySyntaxError(`empty brackets at offset ${i}`);
      const negative = open.length === 0 ? NEGATIVE_INDEX.exec(rest) : null;
      if (negative) {
        out += negativeIndexSlice(Number(negative[1]));
        i += negative[0].length;
        continue;
      }
      open.push({ char: '[', at: i });
    } else if (ch === '(') {
      open.push({ char: '(', at: i });
    } else if (ch === ']' || ch === ')') {
      const top = open.pop();
      if (!top || top.char !== CLOSERS[ch]) throw new QuerySyntaxError(`unexpected '${ch}' at offset ${i}`);
    }
    out += ch;
    i++;
  }

  const unclosed = open.pop();
  if (unclosed) throw new QuerySyntaxError(`unclosed '${unclosed.char}' at offset ${unclosed.at}`);
  if (out.endsWith('.')) throw new QuerySyntaxError(`expected a name after '.' at offset ${query.length - 1}`);

  return out.replace(REGEX_MATCH, (_match, operand: string, regex: string) => `${regex}.test(${operand})`);
}

// jsonpath-plus follows own properties, which includes `length` on arrays and strings.
function isLengthLookup(match: TracedMatch): boolean {
  return match.parentProperty === 'length' && (Array.isArray(match.parent) || typeof match.parent === 'string');
}

export class JsonPathPlusEvaluator implements QueryEvaluator {
  parse(query: string): QueryAst {
    const path = rewriteQuery(query);
    try {
      return { source: query, path, segments: JSONPath.toPathArray(path) };
    } catch (err) {
      throw new QuerySyntaxError(errorMessage(err));
    }
  }

  evaluate(ast: QueryAst, document: JsonValue): JsonValue[] {
    // jsonpath-plus skips falsy roots entirely, so `$` is answered here
    if (ast.segments.length === 1 && ast.segments[0] === '$') return [document];
    try {
      const matches = JSONPath<TracedMatch[] | undefined>({
        path: ast.path,
        json: document,
        wrap: true,
        eval: 'safe',
        resultType: 'all',
      });
      return (matches ?? []).filter(m => !isLengthLookup(m)).map(m => m.value);
    } catch (err) {
      throw new QuerySyntaxError(errorMessage(err));
    }
  }
}

export const defaultEvaluator: QueryEvaluator = new JsonPathPlusEvaluator();
