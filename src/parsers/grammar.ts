/**
 * Query Grammar
 *
 * Ordered-choice grammar recognizing both dialects in one pass:
 *
 *   query      := find-prefix? expression
 *   expression := term (connector term)*
 *   term       := not term | '(' expression ')' | nested | keyworded | bare
 *   nested     := query-alias ':'? term                 (refersto:author:ellis)
 *   keyworded  := alias ':' '='? field-value          (colon form, tried first)
 *               | known-alias (ws | '=') field-value   (prefix form)
 *   field-value:= '(' expression ')' | value (connector not? value)*
 *
 * Values depend on the kind of the governing field: only number and date
 * fields take `N-M` and `N+` bounds, only date fields take relative phrases.
 * After its first value, a number or date field keeps only the values it can
 * read, so `topcite 2+ and skands` ends the field before `skands`.
 * Inside a field's parenthesized scope, keyworded terms are not recognized and
 * bare terms take the field's values.
 */

import {
  Parser,
  char,
  choice,
  coroutine,
  lookAhead,
  many,
  optionalWhitespace,
  possibly,
  recursiveParser,
  regex,
} from 'arcsecond';
import {
  arrowRange,
  bareWildcard,
  bareWord,
  comparison,
  connector,
  dashRange,
  dateLiteral,
  escapeRegExp,
  fieldWildcard,
  fieldWord,
  findPrefix,
  notOperator,
  numberLiteral,
  phrase,
  position,
  rangeWord,
  regexLiteral,
  reject,
  relativeDate,
  suffixBound,
} from './lexical.js';
import { parseAbsoluteDate } from './dates.js';
import type { ParserConfig } from '../config/parserConfig.js';
import type { KeywordRegistry } from '../registry/keywordRegistry.js';
import type {
  BooleanOperator,
  CstExpression,
  CstFieldValue,
  CstQuery,
  CstRunItem,
  CstTerm,
  CstValue,
  Dialect,
  FieldKind,
  GrammarResult,
} from '../types/index.js';
import type { SourceText } from './sourceText.js';

/** Field kinds with values of their own; a `query` field's value is a term */
export type ValueKind = Exclude<FieldKind, 'query'>;

/** Which values a position accepts: unqualified text, or the values of a field kind */
export type GrammarContext = 'free' | ValueKind;

const invenioAlias = regex(/^[^\s:()"'/]+(?=:)/);
const keywordSeparator = regex(/^\s*=?\s*/);
const nestedSeparator = regex(/^\s*[:=]?\s*/);

function aliasAlternation(aliases: readonly string[]): string {
  return aliases.map(escapeRegExp).join('|');
}

function valueKind(kind: FieldKind): ValueKind {
  return kind === 'query' ? 'text' : kind;
}

export class QueryGrammar {
  private readonly registry: KeywordRegistry;
  private readonly spiresAlias: Parser<string>;
  private readonly nestedAlias: Parser<string>;
  /** Stops a field's value run before a clause that starts a new keyworded term */
  private readonly explicitStop: Parser<string>;
  private readonly implicitStop: Parser<string>;
  private readonly relativeDates: Parser<CstValue>;
  private readonly connector: Parser<BooleanOperator>;
  private readonly notOperator: Parser<string>;
  private readonly openParen: Parser<string>;
  private readonly closeParen: Parser<string>;
  /** Furthest byte offset any parser consumed up to during the current match */
  private furthest = 0;

  private readonly expressions = new Map<GrammarContext, Parser<CstExpression>>();
  private readonly terms = new Map<GrammarContext, Parser<CstTerm>>();
  private readonly values = new Map<GrammarContext, Parser<CstValue>>();
  private readonly fieldValues = new Map<ValueKind, Parser<CstFieldValue>>();
  private readonly query: Parser<CstQuery>;

  constructor(config: ParserConfig) {
    this.registry = config.registry;

    const aliases = aliasAlternation(this.registry.aliases());
    const canonical = aliasAlternation(
      [...this.registry.canonicalNames()].sort((a, b) => b.length - a.length)
    );
    const beforeValue = '(?=\\s*=|\\s+[^\\s])';

    const queryAliases = this.registry.aliases().filter((alias) => this.registry.resolve(alias)?.kind === 'query');

    this.spiresAlias = regex(new RegExp(`^(?:${aliases})(?=\\s|=)`, 'i'));
    this.nestedAlias =
      queryAliases.length > 0
        ? regex(new RegExp(`^(?:${aliasAlternation(queryAliases)})(?=[\\s:=(])`, 'i'))
        : reject('No nested keywords are configured');
    // any alias directly before a quoted value starts a term: `a foo t 'bar'`
    const beforeQuote = `(?:${aliases})\\s+["']`;
    this.explicitStop = regex(new RegExp(`^(?:[^\\s:()"'/]+:|(?:${aliases})${beforeValue})`, 'i'));
    this.implicitStop = regex(
      new RegExp(`^(?:[^\\s:()"'/]+:|(?:${canonical})${beforeValue}|${beforeQuote})`, 'i')
    );
    this.relativeDates = this.reached(relativeDate(config.dateSpecifiers.map((specifier) => specifier.phrase)));
    this.connector = this.reached(connector);
    this.notOperator = this.reached(notOperator);
    this.openParen = this.reached(char('('));
    this.closeParen = this.reached(char(')'));

    const expression = this.expression('free');
    const withFind = coroutine((run): CstQuery => {
      const start = run(position);
      run(this.reached(findPrefix));
      const body = run(expression);
      return { rule: 'query', span: { start, end: body.span.end }, findPrefix: true, expression: body };
    });
    const withoutFind = expression.map(
      (body): CstQuery => ({ rule: 'query', span: body.span, findPrefix: false, expression: body })
    );
    this.query = coroutine((run): CstQuery => {
      run(optionalWhitespace);
      return run(choice([withFind, withoutFind]));
    });
  }

  /**
   * Match as much of the source as forms a query.
   *
   * A match that stops before the end (ignoring trailing whitespace) is
   * reported as partial, with the byte offset where it stopped. A failure
   * reports the furthest offset any alternative got to.
   */
  match(source: SourceText): GrammarResult {
    this.furthest = 0;
    const result = this.query.run(source.text);
    if (result.isError) {
      return { status: 'failed', offset: Math.max(this.furthest, result.index), reason: String(result.error) };
    }
    const cst = result.result;
    if (source.sliceFrom(cst.span.end).trim() === '') {
      return { status: 'matched', cst };
    }
    return { status: 'partial', cst, consumed: cst.span.end };
  }

  /** Record how far `parser` got whenever it succeeds */
  private reached<T>(parser: Parser<T>): Parser<T> {
    return new Parser<T>((state) => {
      const next = parser.p(state);
      if (!next.isError && next.index > this.furthest) {
        this.furthest = next.index;
      }
      return next;
    });
  }

  // ==========================================================================
  // Expressions and terms
  // ==========================================================================

  private expression(context: GrammarContext): Parser<CstExpression> {
    const cached = this.expressions.get(context);
    if (cached) {
      return cached;
    }
    // recursiveParser calls its thunk on every run; build the body once
    let body: Parser<CstExpression> | undefined;
    const parser = recursiveParser(() => (body ??= this.buildExpression(context)));
    this.expressions.set(context, parser);
    return parser;
  }

  private buildExpression(context: GrammarContext): Parser<CstExpression> {
    const term = this.term(context);
    const link = coroutine((run) => {
      const operator = run(this.connector);
      return { operator, term: run(term) };
    });
    return coroutine((run): CstExpression => {
      const first = run(term);
      const rest = run(many(link));
      const last = rest.length > 0 ? rest[rest.length - 1].term : first;
      return { rule: 'expression', span: { start: first.span.start, end: last.span.end }, first, rest };
    });
  }

  private term(context: GrammarContext): Parser<CstTerm> {
    const cached = this.terms.get(context);
    if (cached) {
      return cached;
    }
    let body: Parser<CstTerm> | undefined;
    const parser: Parser<CstTerm> = recursiveParser(() => (body ??= this.buildTerm(context, parser)));
    this.terms.set(context, parser);
    return parser;
  }

  private buildTerm(context: GrammarContext, self: Parser<CstTerm>): Parser<CstTerm> {
    const negated = coroutine((run): CstTerm => {
      const start = run(position);
      run(this.notOperator);
      const operand = run(self);
      return { rule: 'not', span: { start, end: operand.span.end }, operand };
    });
    const group = coroutine((run): CstTerm => {
      const start = run(position);
      const expression = run(this.parenthesized(context));
      return { rule: 'group', span: { start, end: run(position) }, expression };
    });
    const bare = this.value(context).map((value): CstTerm => ({ rule: 'bare', span: value.span, value }));

    if (context === 'free') {
      return choice([negated, group, this.nestedTerm(self), this.invenioTerm(), this.spiresTerm(), bare]);
    }
    return choice([negated, group, bare]);
  }

  private parenthesized(context: GrammarContext): Parser<CstExpression> {
    return coroutine((run) => {
      run(this.openParen);
      run(optionalWhitespace);
      const expression = run(this.expression(context));
      run(optionalWhitespace);
      run(this.closeParen);
      return expression;
    });
  }

  // ==========================================================================
  // Keyworded terms
  // ==========================================================================

  /** `citedby:author:ellis`, `refersto a witten`, `citedby:(...)` */
  private nestedTerm(self: Parser<CstTerm>): Parser<CstTerm> {
    return coroutine((run): CstTerm => {
      const start = run(position);
      const alias = run(this.reached(this.nestedAlias));
      run(nestedSeparator);
      const operand = run(self);
      return { rule: 'nestedKeyword', span: { start, end: operand.span.end }, alias, operand };
    });
  }

  /** `alias:value`; unknown aliases still parse and are demoted later */
  private invenioTerm(): Parser<CstTerm> {
    return coroutine((run): CstTerm => {
      const start = run(position);
      const alias = run(invenioAlias);
      run(this.reached(char(':')));
      run(keywordSeparator);
      const kind = this.registry.resolve(alias)?.kind ?? 'text';
      return this.keyworded(run, start, 'invenio', alias, kind);
    });
  }

  /** `alias value` for registered aliases only */
  private spiresTerm(): Parser<CstTerm> {
    return coroutine((run): CstTerm => {
      const start = run(position);
      const alias = run(this.reached(this.spiresAlias));
      run(keywordSeparator);
      const keyword = this.registry.resolve(alias);
      if (!keyword) {
        return run(reject(`Unknown keyword '${alias}'`));
      }
      return this.keyworded(run, start, 'spires', alias, keyword.kind);
    });
  }

  private keyworded(
    run: <T>(parser: Parser<T>) => T,
    start: number,
    dialect: Dialect,
    alias: string,
    kind: FieldKind
  ): CstTerm {
    const value = run(this.fieldValue(valueKind(kind)));
    return { rule: 'keyworded', span: { start, end: value.span.end }, dialect, alias, value };
  }

  // ==========================================================================
  // Field values
  // ==========================================================================

  private fieldValue(kind: ValueKind): Parser<CstFieldValue> {
    const cached = this.fieldValues.get(kind);
    if (cached) {
      return cached;
    }

    const scope = coroutine((run): CstFieldValue => {
      const start = run(position);
      const expression = run(this.parenthesized(kind));
      return { kind: 'scope', span: { start, end: run(position) }, expression };
    });

    const value = this.value(kind);
    const next: Parser<CstValue> = kind === 'text' ? value : this.reached<CstValue>(choice(this.typedValues(kind)));
    const item = coroutine((run): CstRunItem => {
      const operator: BooleanOperator = run(this.connector);
      this.guard(run, operator === 'implicit' ? this.implicitStop : this.explicitStop);
      const negated = run(possibly(this.notOperator)) !== null;
      if (negated) {
        this.guard(run, this.explicitStop);
      }
      return { operator, negated, value: run(next) };
    });

    const valueRun = coroutine((run): CstFieldValue => {
      const first = run(value);
      const rest = run(many(item));
      const last = rest.length > 0 ? rest[rest.length - 1].value : first;
      return { kind: 'run', span: { start: first.span.start, end: last.span.end }, first, rest };
    });

    const parser = choice([scope, valueRun]);
    this.fieldValues.set(kind, parser);
    return parser;
  }

  /** Fail when `stop` matches at the current position; consumes nothing */
  private guard(run: <T>(parser: Parser<T>) => T, stop: Parser<string>): void {
    const next = run(possibly(lookAhead(stop)));
    if (next !== null) {
      run(reject(`'${next}' starts a new keyworded term`));
    }
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  private value(context: GrammarContext): Parser<CstValue> {
    const cached = this.values.get(context);
    if (cached) {
      return cached;
    }
    const parser = this.reached(this.buildValue(context));
    this.values.set(context, parser);
    return parser;
  }

  private buildValue(context: GrammarContext): Parser<CstValue> {
    switch (context) {
      case 'free':
        return choice([phrase, regexLiteral, numberLiteral, bareWildcard, bareWord]);
      case 'text':
        return choice([
          arrowRange(choice([phrase, rangeWord])),
          phrase,
          regexLiteral,
          numberLiteral,
          fieldWildcard,
          fieldWord,
        ]);
      case 'number':
      case 'date':
        return choice([...this.typedValues(context), phrase, regexLiteral, fieldWildcard, fieldWord]);
    }
  }

  /** Values a number or date field reads as bounds, numbers or dates */
  private typedValues(kind: 'number' | 'date'): Array<Parser<CstValue>> {
    if (kind === 'number') {
      return [
        comparison(choice([phrase, numberLiteral, fieldWildcard, fieldWord])),
        arrowRange(choice([phrase, rangeWord])),
        dashRange(),
        suffixBound('number'),
        numberLiteral,
      ];
    }
    return [
      comparison(choice([phrase, this.relativeDates, dateLiteral, numberLiteral, fieldWildcard, fieldWord])),
      arrowRange(choice([phrase, this.relativeDates, rangeWord])),
      // a valid date such as 2015-06 is a month, not a range
      dashRange((text) => parseAbsoluteDate(text) === undefined),
      suffixBound('date'),
      this.relativeDates,
      dateLiteral,
      numberLiteral,
    ];
  }
}
