/**
 * TypeScript type definitions for the bibquery parser
 */

// ============================================================================
// Keyword Types
// ============================================================================

/**
 * How the values of a field are interpreted. A `query` field takes another
 * query as its value (`refersto:author:ellis`).
 */
export type FieldKind = 'text' | 'number' | 'date' | 'query';

/** A canonical field name resolved from an alias */
export interface Keyword {
  readonly name: string;
  readonly kind: FieldKind;
}

/** One row of the keyword table: a canonical field and the aliases that map to it */
export interface KeywordTableEntry {
  name: string;
  kind: FieldKind;
  aliases: string[];
}

export interface KeywordTable {
  fields: KeywordTableEntry[];
}

// ============================================================================
// Relative Date Vocabulary
// ============================================================================

export type DateUnit = 'day' | 'month' | 'year';

/**
 * A relative date phrase such as "last month".
 *
 * The phrase resolves to the current `unit` (today, this month, this year)
 * moved by `shift` units. A trailing "- N" subtracts N more units.
 */
export interface RelativeDateSpecifier {
  phrase: string;
  unit: DateUnit;
  shift: number;
}

// ============================================================================
// AST Types
// ============================================================================

/**
 * Leaf value kinds:
 * - text: a bare word (or verbatim text demoted from an unparsable clause)
 * - exact: "double quoted" phrase
 * - partial: 'single quoted' phrase
 * - regex: /pattern/
 * - wildcard: word containing `*`
 * - number: integer or decimal literal
 */
export type AtomKind = 'text' | 'exact' | 'partial' | 'regex' | 'wildcard' | 'number';

export interface Atom {
  readonly kind: AtomKind;
  readonly value: string;
}

export type DatePrecision = 'year' | 'month' | 'day';

/** A resolved date; `value` is YYYY, YYYY-MM or YYYY-MM-DD depending on precision */
export interface NormalizedDate {
  readonly value: string;
  readonly year: number;
  readonly month?: number;
  readonly day?: number;
  readonly precision: DatePrecision;
}

export interface RangeBound {
  readonly value: string;
  readonly inclusive: boolean;
}

export interface DateBound {
  readonly date: NormalizedDate;
  readonly inclusive: boolean;
}

export type DateSpec =
  | { readonly kind: 'on'; readonly date: NormalizedDate }
  | { readonly kind: 'range'; readonly lower?: DateBound; readonly upper?: DateBound };

export interface FreeTextNode {
  readonly type: 'freeText';
  readonly value: Atom;
}

export interface KeywordQueryNode {
  readonly type: 'keyword';
  readonly keyword: string;
  readonly value: Atom;
}

export interface RangeQueryNode {
  readonly type: 'range';
  readonly keyword: string;
  readonly lower?: RangeBound;
  readonly upper?: RangeBound;
}

export interface DateQueryNode {
  readonly type: 'date';
  readonly keyword: string;
  readonly spec: DateSpec;
}

export interface NotNode {
  readonly type: 'not';
  readonly child: QueryNode;
}

export interface AndNode {
  readonly type: 'and';
  readonly left: QueryNode;
  readonly right: QueryNode;
}

export interface OrNode {
  readonly type: 'or';
  readonly left: QueryNode;
  readonly right: QueryNode;
}

/** Records related to the ones `child` matches, e.g. citing or cited by them */
export interface NestedKeywordNode {
  readonly type: 'nestedKeyword';
  readonly keyword: string;
  readonly child: QueryNode;
}

/** Parentheses the user wrote, kept only where re-serialization needs them */
export interface NestedNode {
  readonly type: 'nested';
  readonly child: QueryNode;
}

/** Text the grammar could not structure */
export interface MalformedQueryNode {
  readonly type: 'malformed';
  readonly raw: string;
}

export type QueryNode =
  | FreeTextNode
  | KeywordQueryNode
  | RangeQueryNode
  | DateQueryNode
  | NestedKeywordNode
  | NotNode
  | AndNode
  | OrNode
  | NestedNode
  | MalformedQueryNode;

export type BinaryNode = AndNode | OrNode;

// ============================================================================
// Parse Result Types
// ============================================================================

/** A field alias as written, and the canonical keyword it resolved to */
export interface FieldMapping {
  alias: string;
  keyword: string;
}

export interface ParseResult {
  ast: QueryNode;
  /** True when any part of the input had to be wrapped as a malformed query */
  fallbackUsed: boolean;
  fields: FieldMapping[];
  warnings: string[];
}

// ============================================================================
// Concrete Syntax Tree Types
// ============================================================================

/** UTF-8 byte offsets into the raw query, end exclusive */
export interface Span {
  start: number;
  end: number;
}

export type Dialect = 'invenio' | 'spires';

export type BooleanOperator = 'and' | 'or' | 'implicit';

export type ComparisonOperator = '>' | '>=' | '<' | '<=';

export type CstTokenKind = 'word' | 'number' | 'wildcard' | 'date' | 'regex';

/** A single matched token; `text` is exactly the matched source */
export interface CstToken {
  kind: CstTokenKind;
  span: Span;
  text: string;
}

export type CstValue =
  | CstToken
  | { kind: 'relativeDate'; span: Span; text: string; phrase: string; offset: number }
  | { kind: 'phrase'; span: Span; text: string; exact: boolean }
  | { kind: 'range'; span: Span; lower: CstValue; upper: CstValue }
  | { kind: 'comparison'; span: Span; operator: ComparisonOperator; operand: CstValue };

export interface CstRunItem {
  operator: BooleanOperator;
  negated: boolean;
  value: CstValue;
}

export type CstFieldValue =
  | { kind: 'scope'; span: Span; expression: CstExpression }
  | { kind: 'run'; span: Span; first: CstValue; rest: CstRunItem[] };

export type CstTerm =
  | { rule: 'not'; span: Span; operand: CstTerm }
  | { rule: 'group'; span: Span; expression: CstExpression }
  | { rule: 'keyworded'; span: Span; dialect: Dialect; alias: string; value: CstFieldValue }
  | { rule: 'nestedKeyword'; span: Span; alias: string; operand: CstTerm }
  | { rule: 'bare'; span: Span; value: CstValue };

export interface CstExpression {
  rule: 'expression';
  span: Span;
  first: CstTerm;
  rest: Array<{ operator: BooleanOperator; term: CstTerm }>;
}

export interface CstQuery {
  rule: 'query';
  span: Span;
  findPrefix: boolean;
  expression: CstExpression;
}

export type GrammarResult =
  | { status: 'matched'; cst: CstQuery }
  | { status: 'partial'; cst: CstQuery; consumed: number }
  | { status: 'failed'; offset: number; reason: string };

// ============================================================================
// AST Helper Functions
// ============================================================================

function deepFreeze(value: object): void {
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
}

/** Freeze a node with its bounds, dates and atoms; child nodes are frozen already */
function node<T extends QueryNode>(value: T): T {
  deepFreeze(value);
  return value;
}

export function atom(kind: AtomKind, value: string): Atom {
  const result: Atom = { kind, value };
  Object.freeze(result);
  return result;
}

/** Free text node; a plain string becomes a `text` atom */
export function freeText(value: string | Atom): FreeTextNode {
  return node({ type: 'freeText', value: typeof value === 'string' ? atom('text', value) : value });
}

export function keywordQuery(keyword: string, value: string | Atom): KeywordQueryNode {
  return node({ type: 'keyword', keyword, value: typeof value === 'string' ? atom('text', value) : value });
}

export function rangeQuery(keyword: string, lower?: RangeBound, upper?: RangeBound): RangeQueryNode {
  return node({ type: 'range', keyword, lower, upper });
}

export function dateQuery(keyword: string, spec: DateSpec): DateQueryNode {
  return node({ type: 'date', keyword, spec });
}

export function nestedKeywordQuery(keyword: string, child: QueryNode): NestedKeywordNode {
  return node({ type: 'nestedKeyword', keyword, child });
}

export function notQuery(child: QueryNode): NotNode {
  return node({ type: 'not', child });
}

export function andQuery(left: QueryNode, right: QueryNode): AndNode {
  return node({ type: 'and', left, right });
}

export function orQuery(left: QueryNode, right: QueryNode): OrNode {
  return node({ type: 'or', left, right });
}

export function nestedQuery(child: QueryNode): NestedNode {
  return node({ type: 'nested', child });
}

export function malformedQuery(raw: string): MalformedQueryNode {
  return node({ type: 'malformed', raw });
}

export function isBinary(ast: QueryNode): ast is BinaryNode {
  return ast.type === 'and' || ast.type === 'or';
}

/** Remove `nested` markers; two queries that differ only in grouping compare equal afterwards */
export function stripGrouping(ast: QueryNode): QueryNode {
  switch (ast.type) {
    case 'nested':
      return stripGrouping(ast.child);
    case 'not':
      return notQuery(stripGrouping(ast.child));
    case 'nestedKeyword':
      return nestedKeywordQuery(ast.keyword, stripGrouping(ast.child));
    case 'and':
      return andQuery(stripGrouping(ast.left), stripGrouping(ast.right));
    case 'or':
      return orQuery(stripGrouping(ast.left), stripGrouping(ast.right));
    default:
      return ast;
  }
}

/** True if any node of the tree is a malformed query */
export function containsMalformed(ast: QueryNode): boolean {
  switch (ast.type) {
    case 'malformed':
      return true;
    case 'nested':
    case 'nestedKeyword':
    case 'not':
      return containsMalformed(ast.child);
    case 'and':
    case 'or':
      return containsMalformed(ast.left) || containsMalformed(ast.right);
    default:
      return false;
  }
}

// ============================================================================
// Error Types
// ============================================================================

/** Keyword table or date vocabulary data is invalid */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public source?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Raised only by the strict parsing API when a query needed fallback */
export class QuerySyntaxError extends Error {
  constructor(
    message: string,
    public position?: number,
    public fragment?: string
  ) {
    super(message);
    this.name = 'QuerySyntaxError';
  }
}
