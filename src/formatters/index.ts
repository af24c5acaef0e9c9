/**
 * Formatters Module
 *
 * Text renderings of a parsed query: canonical query text and a diagnostic tree.
 */

export {
  // Query Serializer
  serializeQuery,
  formatAtom,
} from './querySerializer.js';

export {
  // Tree Formatter
  formatTree,
  describeNode,
} from './treeFormatter.js';
