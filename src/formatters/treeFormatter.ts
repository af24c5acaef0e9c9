/**
 * Tree Formatter
 *
 * Box-drawing rendering of an AST for diagnostics:
 *
 *   and
 *   ├── keyword title = higgs
 *   └── not
 *       └── freeText boson
 */

import { formatAtom } from './querySerializer.js';
import type { DateSpec, QueryNode, RangeBound } from '../types/index.js';

function interval(lower: string | undefined, lowerInclusive: boolean, upper: string | undefined, upperInclusive: boolean): string {
  const open = lower === undefined || !lowerInclusive ? '(' : '[';
  const close = upper === undefined || !upperInclusive ? ')' : ']';
  return `${open}${lower ?? '*'} .. ${upper ?? '*'}${close}`;
}

function rangeLabel(lower?: RangeBound, upper?: RangeBound): string {
  return interval(lower?.value, lower?.inclusive ?? false, upper?.value, upper?.inclusive ?? false);
}

function dateLabel(spec: DateSpec): string {
  if (spec.kind === 'on') {
    return `= ${spec.date.value} (${spec.date.precision})`;
  }
  const { lower, upper } = spec;
  return interval(lower?.date.value, lower?.inclusive ?? false, upper?.date.value, upper?.inclusive ?? false);
}

/**
 * One-line description of a node, without its children
 */
export function describeNode(node: QueryNode): string {
  switch (node.type) {
    case 'freeText':
      return `freeText ${formatAtom(node.value)}`;
    case 'keyword':
      return `keyword ${node.keyword} = ${formatAtom(node.value)}`;
    case 'range':
      return `range ${node.keyword} ${rangeLabel(node.lower, node.upper)}`;
    case 'date':
      return `date ${node.keyword} ${dateLabel(node.spec)}`;
    case 'nestedKeyword':
      return `nestedKeyword ${node.keyword}`;
    case 'malformed':
      return `malformed ${JSON.stringify(node.raw)}`;
    case 'not':
    case 'and':
    case 'or':
    case 'nested':
      return node.type;
    default: {
      const unreachable: never = node;
      throw new Error(`Unknown node: ${JSON.stringify(unreachable)}`);
    }
  }
}

function children(node: QueryNode): QueryNode[] {
  switch (node.type) {
    case 'not':
    case 'nested':
    case 'nestedKeyword':
      return [node.child];
    case 'and':
    case 'or':
      return [node.left, node.right];
    default:
      return [];
  }
}

function render(node: QueryNode, prefix: string, lines: string[]): void {
  const nodes = children(node);
  nodes.forEach((child, index) => {
    const last = index === nodes.length - 1;
    lines.push(`${prefix}${last ? '└── ' : '├── '}${describeNode(child)}`);
    render(child, `${prefix}${last ? '    ' : '│   '}`, lines);
  });
}

/**
 * Render an AST as an indented tree
 */
export function formatTree(ast: QueryNode): string {
  const lines = [describeNode(ast)];
  render(ast, '', lines);
  return lines.join('\n');
}
