/**
 * Fallback for input the grammar cannot structure.
 *
 * Recovery only narrows what is kept as structured: it never re-runs the
 * grammar. The unparsed text survives verbatim in a malformed node.
 */

import { andQuery, malformedQuery } from '../types/index.js';
import type { QueryNode } from '../types/index.js';
import type { SourceText } from './sourceText.js';

export interface Recovery {
  ast: QueryNode;
  /** Byte offset where structured parsing stopped */
  offset: number;
  fragment: string;
  warning: string;
}

/**
 * Keep the parsed prefix and AND it with the unparsed remainder
 */
export function recoverPartial(prefix: QueryNode, source: SourceText, consumed: number): Recovery {
  const fragment = source.sliceFrom(consumed).trim();
  return {
    ast: andQuery(prefix, malformedQuery(fragment)),
    offset: consumed,
    fragment,
    warning: `Could not parse '${fragment}' (byte ${consumed}); kept it as unparsed text`,
  };
}

/**
 * The whole input as one malformed query
 */
export function recoverTotal(source: SourceText, offset = 0, cause?: string): Recovery {
  const fragment = source.text.trim();
  const detail = cause ? ` (${cause})` : '';
  return {
    ast: malformedQuery(fragment),
    offset,
    fragment,
    warning: `Could not parse the query${detail}; kept it as unparsed text`,
  };
}
