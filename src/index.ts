/**
 * bibquery: parse bibliographic search queries in SPIRES or Invenio syntax
 * into a single AST.
 */

export { QueryParser, parseQuery, parseQueryStrict, type QueryParserOptions } from './parsers/queryParser.js';
export { QueryGrammar, type GrammarContext, type ValueKind } from './parsers/grammar.js';
export { AstBuilder, type BuildOutput } from './parsers/astBuilder.js';
export { recoverPartial, recoverTotal, type Recovery } from './parsers/recovery.js';
export { SourceText } from './parsers/sourceText.js';
export {
  parseAbsoluteDate,
  resolveRelativeDate,
  isInvertedDateRange,
  systemClock,
  type Clock,
} from './parsers/dates.js';
export { KeywordRegistry, normalizeAlias } from './registry/keywordRegistry.js';
export {
  createParserConfig,
  loadParserConfig,
  getDefaultConfig,
  parseKeywordTable,
  parseDateSpecifiers,
  type ParserConfig,
  type LoadConfigOptions,
} from './config/parserConfig.js';
export { serializeQuery, formatAtom, formatTree, describeNode } from './formatters/index.js';
export {
  parseBatch,
  loadQueries,
  readQueries,
  summarizeBatch,
  type BatchEntry,
  type BatchSummary,
  type QueryList,
  type QueryFileFormat,
} from './batch/batchParse.js';
export * from './types/index.js';
