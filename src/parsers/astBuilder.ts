/**
 * AST Builder
 *
 * Walks a concrete syntax tree depth-first and emits immutable AST nodes:
 * aliases resolve through the keyword registry, keyword scope applies to the
 * bare terms of `alias:( ... )`, dates are normalized and boolean chains are
 * folded by precedence.
 *
 * Precedence: explicit `and`/`or` share one level and fold left to right.
 * Adjacency (implicit AND) binds more loosely, so `a b or c` is
 * `a and (b or c)`.
 */

import {
  andQuery,
  atom,
  dateQuery,
  freeText,
  isBinary,
  keywordQuery,
  nestedKeywordQuery,
  nestedQuery,
  notQuery,
  orQuery,
  rangeQuery,
} from '../types/index.js';
import { isInvertedDateRange, parseAbsoluteDate, resolveRelativeDate } from './dates.js';
import type { ParserConfig } from '../config/parserConfig.js';
import type {
  Atom,
  BooleanOperator,
  ComparisonOperator,
  CstExpression,
  CstFieldValue,
  CstQuery,
  CstTerm,
  CstValue,
  FieldMapping,
  Keyword,
  NormalizedDate,
  QueryNode,
  RangeBound,
  Span,
} from '../types/index.js';
import type { SourceText } from './sourceText.js';

// ============================================================================
// Types
// ============================================================================

export interface BuildOutput {
  ast: QueryNode;
  fields: FieldMapping[];
  warnings: string[];
}

/** A built node, and whether the user wrote it in parentheses */
interface Built {
  node: QueryNode;
  grouped: boolean;
}

interface Link<T> {
  operator: BooleanOperator;
  item: T;
}

/** An operand chain as written: `first op item op item ...` */
interface Chain<T> {
  first: T;
  rest: Array<Link<T>>;
}

/** Consecutive words of a text field joined into one value (`author takumi doi`) */
type Merged<T> = { merged: false; item: T } | { merged: true; text: string };

interface RunEntry {
  negated: boolean;
  value: CstValue;
}

// ============================================================================
// Chain helpers
// ============================================================================

/** Text of a value that may join its neighbours, or undefined */
function mergeableText(value: CstValue): string | undefined {
  switch (value.kind) {
    case 'word':
    case 'number':
    case 'wildcard':
      return value.text;
    default:
      return undefined;
  }
}

/**
 * Join runs of implicitly adjacent words into single entries
 */
function mergeWords<T>(chain: Chain<T>, wordOf: (item: T) => string | undefined): Chain<Merged<T>> {
  const result: Chain<Merged<T>> = { first: { merged: false, item: chain.first }, rest: [] };
  let previousText = wordOf(chain.first);

  for (const link of chain.rest) {
    const text = wordOf(link.item);
    if (link.operator === 'implicit' && text !== undefined && previousText !== undefined) {
      previousText = `${previousText} ${text}`;
      const merged: Merged<T> = { merged: true, text: previousText };
      const last = result.rest[result.rest.length - 1];
      if (last) {
        last.item = merged;
      } else {
        result.first = merged;
      }
      continue;
    }
    previousText = text;
    result.rest.push({ operator: link.operator, item: { merged: false, item: link.item } });
  }

  return result;
}

function nestIfGrouped(built: Built): QueryNode {
  return built.grouped && isBinary(built.node) ? nestedQuery(built.node) : built.node;
}

/**
 * Fold an operand chain: explicit operators left to right within each
 * adjacency segment, then the segments left to right with AND.
 */
function foldChain(chain: Chain<Built>): Built {
  if (chain.rest.length === 0) {
    return chain.first;
  }

  const segments: Built[] = [];
  let segment = chain.first;
  for (const { operator, item } of chain.rest) {
    if (operator === 'implicit') {
      segments.push(segment);
      segment = item;
      continue;
    }
    const right = nestIfGrouped(item);
    const node = operator === 'and' ? andQuery(segment.node, right) : orQuery(segment.node, right);
    segment = { node, grouped: false };
  }
  segments.push(segment);

  let node = segments[0].node;
  for (const next of segments.slice(1)) {
    node = andQuery(node, nestIfGrouped(next));
  }
  return { node, grouped: false };
}

function mapChain<T, U>(chain: Chain<T>, map: (item: T) => U): Chain<U> {
  return {
    first: map(chain.first),
    rest: chain.rest.map((link) => ({ operator: link.operator, item: map(link.item) })),
  };
}

/** Fields whose words join into one value; a query field read as plain words counts */
function isTextual(keyword: Keyword): boolean {
  return keyword.kind === 'text' || keyword.kind === 'query';
}

function unquote(text: string): string {
  return text.slice(1, -1);
}

function isNumeric(text: string): boolean {
  return /^\d+(?:\.\d+)?$/.test(text);
}

// ============================================================================
// Builder
// ============================================================================

export class AstBuilder {
  private readonly fields: FieldMapping[] = [];
  private readonly warnings: string[] = [];

  constructor(
    private readonly source: SourceText,
    private readonly config: ParserConfig,
    private readonly now: Date
  ) {}

  /**
   * Build the AST of a matched (or partially matched) query
   */
  build(query: CstQuery): BuildOutput {
    const { node } = this.expression(query.expression);
    return { ast: node, fields: [...this.fields], warnings: [...this.warnings] };
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  private expression(expression: CstExpression, scope?: Keyword): Built {
    const chain: Chain<CstTerm> = {
      first: expression.first,
      rest: expression.rest.map(({ operator, term }) => ({ operator, item: term })),
    };

    const textField = scope && isTextual(scope) ? scope : undefined;
    if (textField) {
      const merged = mergeWords(chain, (term) => (term.rule === 'bare' ? mergeableText(term.value) : undefined));
      return foldChain(
        mapChain(merged, (entry) =>
          entry.merged ? this.plain(this.mergedLeaf(textField, entry.text)) : this.term(entry.item, textField)
        )
      );
    }
    return foldChain(mapChain(chain, (term) => this.term(term, scope)));
  }

  private term(term: CstTerm, scope?: Keyword): Built {
    switch (term.rule) {
      case 'not': {
        const operand = this.term(term.operand, scope);
        return this.plain(notQuery(nestIfGrouped(operand)));
      }
      case 'group':
        return { node: this.expression(term.expression, scope).node, grouped: true };
      case 'keyworded':
        return this.keyworded(term.alias, term.span, term.value);
      case 'nestedKeyword':
        return this.nestedKeyword(term.alias, term.span, term.operand);
      case 'bare':
        return this.plain(scope ? this.leaf(scope, term.value) : this.freeLeaf(term.value));
    }
  }

  private keyworded(alias: string, span: Span, value: CstFieldValue): Built {
    const keyword = this.config.registry.resolve(alias);
    if (!keyword) {
      return this.unknownField(alias, span);
    }
    this.recordField(alias, keyword.name);

    if (value.kind === 'scope') {
      return { node: this.expression(value.expression, keyword).node, grouped: true };
    }

    const chain: Chain<RunEntry> = {
      first: { negated: false, value: value.first },
      rest: value.rest.map((item) => ({ operator: item.operator, item: { negated: item.negated, value: item.value } })),
    };
    const build = (entry: RunEntry): Built => {
      const leaf = this.leaf(keyword, entry.value);
      return this.plain(entry.negated ? notQuery(leaf) : leaf);
    };

    if (isTextual(keyword)) {
      const merged = mergeWords(chain, (entry) => (entry.negated ? undefined : mergeableText(entry.value)));
      return foldChain(
        mapChain(merged, (entry) => (entry.merged ? this.plain(this.mergedLeaf(keyword, entry.text)) : build(entry.item)))
      );
    }
    return foldChain(mapChain(chain, build));
  }

  /** `refersto:author:ellis`: the operand is a whole term of its own */
  private nestedKeyword(alias: string, span: Span, operand: CstTerm): Built {
    const keyword = this.config.registry.resolve(alias);
    if (!keyword) {
      return this.unknownField(alias, span);
    }
    this.recordField(alias, keyword.name);
    return this.plain(nestedKeywordQuery(keyword.name, this.term(operand).node));
  }

  private unknownField(alias: string, span: Span): Built {
    const text = this.source.slice(span);
    this.warnings.push(`Unknown field '${alias}': searching '${text}' as free text`);
    return this.plain(freeText(text));
  }

  private plain(node: QueryNode): Built {
    return { node, grouped: false };
  }

  private recordField(alias: string, keyword: string): void {
    if (!this.fields.some((field) => field.alias === alias && field.keyword === keyword)) {
      this.fields.push({ alias, keyword });
    }
  }

  // ==========================================================================
  // Leaves
  // ==========================================================================

  private freeLeaf(value: CstValue): QueryNode {
    switch (value.kind) {
      case 'word':
      case 'date':
      case 'relativeDate':
        return freeText(value.text);
      case 'number':
        return freeText(atom('number', value.text));
      case 'wildcard':
        return freeText(atom('wildcard', value.text));
      case 'phrase':
      case 'regex':
        return freeText(this.quotedAtom(value));
      case 'range':
      case 'comparison':
        return freeText(this.source.slice(value.span));
    }
  }

  private mergedLeaf(keyword: Keyword, text: string): QueryNode {
    return keywordQuery(keyword.name, atom(text.includes('*') ? 'wildcard' : 'text', text));
  }

  private leaf(keyword: Keyword, value: CstValue): QueryNode {
    switch (keyword.kind) {
      case 'date':
        return this.dateLeaf(keyword, value);
      case 'number':
        if (value.kind === 'range') {
          return this.numberRange(keyword, value.lower, value.upper, value.span);
        }
        return this.textLeaf(keyword, value);
      case 'text':
      case 'query':
        return this.textLeaf(keyword, value);
    }
  }

  private textLeaf(keyword: Keyword, value: CstValue): QueryNode {
    switch (value.kind) {
      case 'word':
      case 'date':
      case 'relativeDate':
        return keywordQuery(keyword.name, value.text);
      case 'number':
        return keywordQuery(keyword.name, atom('number', value.text));
      case 'wildcard':
        return keywordQuery(keyword.name, atom('wildcard', value.text));
      case 'phrase':
      case 'regex':
        return keywordQuery(keyword.name, this.quotedAtom(value));
      case 'range':
        return rangeQuery(
          keyword.name,
          { value: this.boundText(value.lower), inclusive: true },
          { value: this.boundText(value.upper), inclusive: true }
        );
      case 'comparison':
        return this.comparisonRange(keyword.name, value.operator, this.boundText(value.operand));
    }
  }

  private numberRange(keyword: Keyword, lower: CstValue, upper: CstValue, span: Span): QueryNode {
    const low = this.boundText(lower);
    const high = this.boundText(upper);
    if (isNumeric(low) && isNumeric(high) && Number(low) > Number(high)) {
      return this.demote(keyword, span, 'has its bounds reversed');
    }
    return rangeQuery(keyword.name, { value: low, inclusive: true }, { value: high, inclusive: true });
  }

  private dateLeaf(keyword: Keyword, value: CstValue): QueryNode {
    switch (value.kind) {
      case 'phrase':
      case 'regex':
        return keywordQuery(keyword.name, this.quotedAtom(value));
      case 'wildcard':
        return keywordQuery(keyword.name, atom('wildcard', value.text));
      case 'range': {
        const lower = this.resolveDate(value.lower);
        const upper = this.resolveDate(value.upper);
        if (!lower || !upper) {
          return this.demote(keyword, value.span, 'is not a valid date range');
        }
        if (isInvertedDateRange(lower, upper)) {
          return this.demote(keyword, value.span, 'has its bounds reversed');
        }
        return dateQuery(keyword.name, {
          kind: 'range',
          lower: { date: lower, inclusive: true },
          upper: { date: upper, inclusive: true },
        });
      }
      case 'comparison': {
        const date = this.resolveDate(value.operand);
        if (!date) {
          return this.demote(keyword, value.span, 'is not a valid date');
        }
        const bound = { date, inclusive: value.operator === '>=' || value.operator === '<=' };
        const lowerBound = value.operator === '>' || value.operator === '>=';
        return dateQuery(keyword.name, lowerBound ? { kind: 'range', lower: bound } : { kind: 'range', upper: bound });
      }
      default: {
        const date = this.resolveDate(value);
        if (!date) {
          return this.demote(keyword, value.span, 'is not a valid date');
        }
        return dateQuery(keyword.name, { kind: 'on', date });
      }
    }
  }

  private resolveDate(value: CstValue): NormalizedDate | undefined {
    switch (value.kind) {
      case 'relativeDate':
        return resolveRelativeDate(value.phrase, value.offset, this.config.dateSpecifiers, this.now);
      case 'phrase':
        return parseAbsoluteDate(unquote(value.text));
      case 'word':
      case 'number':
      case 'date':
        return parseAbsoluteDate(value.text);
      default:
        return undefined;
    }
  }

  private comparisonRange(keyword: string, operator: ComparisonOperator, value: string): QueryNode {
    const bound: RangeBound = { value, inclusive: operator === '>=' || operator === '<=' };
    return operator === '>' || operator === '>=' ? rangeQuery(keyword, bound) : rangeQuery(keyword, undefined, bound);
  }

  /** Keep a value the field cannot interpret as a literal term */
  private demote(keyword: Keyword, span: Span, problem: string): QueryNode {
    const text = this.source.slice(span);
    this.warnings.push(`'${text}' ${problem} for '${keyword.name}'; searching it as text`);
    return keywordQuery(keyword.name, text);
  }

  private boundText(value: CstValue): string {
    if (value.kind === 'phrase') {
      return unquote(value.text);
    }
    return this.source.slice(value.span);
  }

  private quotedAtom(value: CstValue): Atom {
    if (value.kind === 'phrase') {
      return atom(value.exact ? 'exact' : 'partial', unquote(value.text));
    }
    return atom('regex', unquote(this.source.slice(value.span)));
  }
}
