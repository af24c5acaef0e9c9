/**
 * Lexical primitives shared by both query dialects.
 *
 * Every parser here is an arcsecond combinator over the raw query; there is no
 * separate tokenization pass. Positions are UTF-8 byte offsets, matching the
 * index arcsecond keeps in its parser state.
 */

import { Parser, choice, coroutine, fail, optionalWhitespace, regex } from 'arcsecond';
import type { BooleanOperator, ComparisonOperator, CstToken, CstTokenKind, CstValue } from '../types/index.js';

// ============================================================================
// Helpers
// ============================================================================

/** Current byte offset; consumes nothing */
export const position: Parser<number> = new Parser<number>((state) =>
  state.isError ? state : { ...state, result: state.index }
);

/** Fail the enclosing parser with a message */
export function reject(message: string): Parser<never> {
  return fail(message);
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
}

/** Lower-case a phrase and collapse its inner whitespace */
export function normalizePhrase(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** A regex token with its span */
export function token(pattern: RegExp, kind: CstTokenKind): Parser<CstToken> {
  const matcher = regex(pattern);
  return coroutine((run): CstToken => {
    const start = run(position);
    const text = run(matcher);
    const end = run(position);
    return { kind, span: { start, end }, text };
  });
}

// ============================================================================
// Operators
// ============================================================================

/** Words that connect or negate terms and are never values themselves */
export const OPERATOR_WORD = /^(?:and|or|not|\+|&|\||-)$/i;

export const findPrefix = regex(/^(?:find|fin|fi|f)\s+/i);

const explicitOperator = regex(/^\s*(?:and|or|\+|&|\|)(?=[\s(])/i);

/**
 * Boolean connector between two terms. Bare whitespace is an implicit AND.
 */
export const connector: Parser<BooleanOperator> = choice([
  coroutine((run) => {
    const text = run(explicitOperator).trim().toLowerCase();
    run(optionalWhitespace);
    const operator: BooleanOperator = text === 'or' || text === '|' ? 'or' : 'and';
    return operator;
  }),
  regex(/^\s+/).map((): BooleanOperator => 'implicit'),
]);

/** `not` before whitespace or a group, or `-` before a term (`-x`, `- x`) */
export const notOperator = regex(/^(?:not(?=[\s(])\s*|-(?=[^\s)-])|-\s+(?=[^\s)]))/i);

const comparisonOperator = regex(/^(?:>=|<=|>|<|(?:after|before)(?=\s))/i).map(
  (text): ComparisonOperator => {
    switch (text.toLowerCase()) {
      case 'after':
        return '>';
      case 'before':
        return '<';
      case '>=':
        return '>=';
      case '<=':
        return '<=';
      case '<':
        return '<';
      default:
        return '>';
    }
  }
);

// ============================================================================
// Atoms
// ============================================================================

const END = '(?=[\\s()]|$)';
const NOT_OPERATOR = '(?!(?:and|or|not|[+&|-])(?:[\\s()]|$))';

/** Unqualified word; a trailing `:` would make it a field alias instead */
export const bareWord = token(new RegExp(`^${NOT_OPERATOR}[^\\s:()]+${END}`, 'i'), 'word');

export const bareWildcard = token(new RegExp(`^(?=[^\\s:()]*\\*)[^\\s:()]+${END}`), 'wildcard');

/** Value of a field; may contain colons (`refersto:recid:42`) */
export const fieldWord = token(new RegExp(`^${NOT_OPERATOR}[^\\s():][^\\s()]*`, 'i'), 'word');

export const fieldWildcard = token(/^(?=[^\s()]*\*)[^\s():][^\s()]*/, 'wildcard');

export const numberLiteral = token(new RegExp(`^\\d+(?:\\.\\d+)?${END}`), 'number');

/** Shape of a date literal; calendar validity is checked when the AST is built */
export const dateLiteral = token(
  new RegExp(`^(?:\\d{4}(?:[-/]\\d{1,2}){0,2}|\\d{1,2}-\\d{4})${END}`),
  'date'
);

export const regexLiteral = token(/^\/(?:[^/\\]|\\.)+\//, 'regex');

const exactPhrase = regex(/^"[^"]*"/);
const partialPhrase = regex(/^'[^']*'/);

/** `"exact phrase"` or `'partial phrase'` */
export const phrase: Parser<CstValue> = coroutine((run): CstValue => {
  const start = run(position);
  const text = run(choice([exactPhrase, partialPhrase]));
  const end = run(position);
  return { kind: 'phrase', span: { start, end }, text, exact: text.startsWith('"') };
});

/** Unquoted bound of an `a->b` range: stops at `->` */
export const rangeWord = token(/^(?:[^\s()-]|-+[^\s()>-])+/, 'word');

const arrow = regex(/^\s*->\s*/);

/**
 * `lower->upper`, both bounds inclusive
 */
export function arrowRange(bound: Parser<CstValue>): Parser<CstValue> {
  return coroutine((run): CstValue => {
    const start = run(position);
    const lower = run(bound);
    run(arrow);
    const upper = run(bound);
    const end = run(position);
    return { kind: 'range', span: { start, end }, lower, upper };
  });
}

/**
 * `>= x`, `< x`, `after x`, `before x`
 */
export function comparison(operand: Parser<CstValue>): Parser<CstValue> {
  return coroutine((run): CstValue => {
    const start = run(position);
    const operator = run(comparisonOperator);
    run(optionalWhitespace);
    const value = run(operand);
    const end = run(position);
    return { kind: 'comparison', span: { start, end }, operator, operand: value };
  });
}

const dashRangePattern = new RegExp(`^(\\d+)-(\\d+)${END}`);

/**
 * `N-M` written without spaces. `accept` can veto a match, so that a date
 * field keeps `2015-06` as a month rather than a range.
 */
export function dashRange(accept: (text: string) => boolean = () => true): Parser<CstValue> {
  const matcher = regex(dashRangePattern);
  return coroutine((run): CstValue => {
    const start = run(position);
    const text = run(matcher);
    if (!accept(text)) {
      return run(reject(`'${text}' is not a range`));
    }
    const separator = text.indexOf('-');
    const lower: CstToken = { kind: 'number', span: { start, end: start + separator }, text: text.slice(0, separator) };
    const upper: CstToken = {
      kind: 'number',
      span: { start: start + separator + 1, end: start + text.length },
      text: text.slice(separator + 1),
    };
    return { kind: 'range', span: { start, end: start + text.length }, lower, upper };
  });
}

const suffixBoundPattern = new RegExp(`^\\d+(?:[-/.]\\d+)*[+-]${END}`);

/**
 * `N+` (at least N) and `N-` (at most N)
 */
export function suffixBound(operandKind: CstTokenKind): Parser<CstValue> {
  const matcher = regex(suffixBoundPattern);
  return coroutine((run): CstValue => {
    const start = run(position);
    const text = run(matcher);
    const end = start + text.length;
    const operand: CstToken = { kind: operandKind, span: { start, end: end - 1 }, text: text.slice(0, -1) };
    const operator: ComparisonOperator = text.endsWith('+') ? '>=' : '<=';
    return { kind: 'comparison', span: { start, end }, operator, operand };
  });
}

/**
 * Relative date phrases from the configured vocabulary, with an optional
 * `- N` offset ("last month - 2"). Phrases are matched longest first.
 */
export function relativeDate(phrases: readonly string[]): Parser<CstValue> {
  if (phrases.length === 0) {
    return reject('No relative date phrases configured');
  }
  const alternatives = [...phrases]
    .sort((a, b) => b.length - a.length)
    .map((text) => escapeRegExp(text).replace(/ /g, '\\s+'))
    .join('|');
  const shape = `(${alternatives})(?:\\s*-\\s*(\\d+))?`;
  const matcher = regex(new RegExp(`^${shape}(?=[\\s)]|->|$)`, 'i'));
  const parts = new RegExp(`^${shape}$`, 'i');

  return coroutine((run): CstValue => {
    const start = run(position);
    const text = run(matcher);
    const end = run(position);
    const groups = parts.exec(text);
    if (!groups) {
      return run(reject(`'${text}' is not a relative date`));
    }
    return {
      kind: 'relativeDate',
      span: { start, end },
      text,
      phrase: normalizePhrase(groups[1] ?? text),
      offset: groups[2] ? Number(groups[2]) : 0,
    };
  });
}
