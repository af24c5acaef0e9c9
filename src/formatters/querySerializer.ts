/**
 * Query Serializer
 *
 * Renders an AST back to canonical colon-form query text. Parsing the output
 * gives an equivalent tree: the same nodes, possibly with different `nested`
 * markers.
 */

import type { Atom, DateBound, QueryNode, RangeBound } from '../types/index.js';

/**
 * Atom as query text: quotes and slashes restored
 */
export function formatAtom(value: Atom): string {
  switch (value.kind) {
    case 'exact':
      return `"${value.value}"`;
    case 'partial':
      return `'${value.value}'`;
    case 'regex':
      return `/${value.value}/`;
    case 'text':
    case 'wildcard':
    case 'number':
      return value.value;
  }
}

/** Several words need a scope group to stay one value */
function fieldValue(value: Atom): string {
  const text = formatAtom(value);
  return (value.kind === 'text' || value.kind === 'wildcard') && /\s/.test(text) ? `(${text})` : text;
}

function boundValue(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value;
}

function bounded<T>(
  keyword: string,
  lower: T | undefined,
  upper: T | undefined,
  inclusive: (bound: T) => boolean,
  text: (bound: T) => string
): string {
  if (lower && upper) {
    if (inclusive(lower) && inclusive(upper)) {
      return `${keyword}:${text(lower)}->${text(upper)}`;
    }
    return `(${bounded(keyword, lower, undefined, inclusive, text)} and ${bounded(keyword, undefined, upper, inclusive, text)})`;
  }
  if (lower) {
    return `${keyword}:${inclusive(lower) ? '>=' : '>'}${text(lower)}`;
  }
  if (upper) {
    return `${keyword}:${inclusive(upper) ? '<=' : '<'}${text(upper)}`;
  }
  return `${keyword}:*`;
}

function operand(node: QueryNode): string {
  const text = serializeQuery(node);
  return node.type === 'and' || node.type === 'or' ? `(${text})` : text;
}

/**
 * Serialize an AST to query text
 */
export function serializeQuery(ast: QueryNode): string {
  switch (ast.type) {
    case 'freeText':
      return formatAtom(ast.value);
    case 'keyword':
      return `${ast.keyword}:${fieldValue(ast.value)}`;
    case 'range':
      return bounded<RangeBound>(
        ast.keyword,
        ast.lower,
        ast.upper,
        (bound) => bound.inclusive,
        (bound) => boundValue(bound.value)
      );
    case 'date':
      if (ast.spec.kind === 'on') {
        return `${ast.keyword}:${ast.spec.date.value}`;
      }
      return bounded<DateBound>(
        ast.keyword,
        ast.spec.lower,
        ast.spec.upper,
        (bound) => bound.inclusive,
        (bound) => bound.date.value
      );
    case 'nestedKeyword':
      return `${ast.keyword}:${operand(ast.child)}`;
    case 'not':
      return `not ${operand(ast.child)}`;
    case 'and':
    case 'or':
      return `${serializeQuery(ast.left)} ${ast.type} ${operand(ast.right)}`;
    case 'nested':
      return `(${serializeQuery(ast.child)})`;
    case 'malformed':
      return ast.raw;
    default: {
      const unreachable: never = ast;
      throw new Error(`Unknown node: ${JSON.stringify(unreachable)}`);
    }
  }
}
