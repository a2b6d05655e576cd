import type { JsonValue } from '../json.js';
import { loadDocument } from '../document/loader.js';
import { defaultEvaluator } from './evaluator.js';
import type { QueryEvaluator } from './evaluator.js';
import { normalizeResults } from './result.js';
import { validateQuery } from './validate.js';

export type QueryRequest = {
  query: string;
  file: string;
  evaluator?: QueryEvaluator;
};

/**
 * Validate the query, load the document and evaluate. The query is checked
 * before the file is touched.
 */
export async function runQuery({ query, file, evaluator = defaultEvaluator }: QueryRequest): Promise<JsonValue> {
  validateQuery(query);
  const document = await loadDocument(file);
  const ast = evaluator.parse(query);
  return normalizeResults(evaluator.evaluate(ast, document));
}
