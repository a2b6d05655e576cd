import { InvalidQueryError } from '../errors.js';

export const ROOT_MARKER = '$';

// Cheap structural guard only; the evaluator owns the grammar.
export function validateQuery(query: string): void {
  if (query === '') throw new InvalidQueryError('empty JSONPath');
  if (!query.startsWith(ROOT_MARKER)) throw new InvalidQueryError(`JSONPath must start with '${ROOT_MARKER}'`);
}
