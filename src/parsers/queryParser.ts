/**
 * Query Parser
 *
 * Entry point: grammar, then AST builder, then recovery for whatever the
 * grammar could not structure. `parse` never throws; every input maps to an
 * AST, with `fallbackUsed` set when part of it had to be kept as unparsed text.
 */

import { getDefaultConfig } from '../config/parserConfig.js';
import { freeText, QuerySyntaxError } from '../types/index.js';
import { AstBuilder } from './astBuilder.js';
import { systemClock } from './dates.js';
import { QueryGrammar } from './grammar.js';
import { recoverPartial, recoverTotal } from './recovery.js';
import { SourceText } from './sourceText.js';
import type { ParserConfig } from '../config/parserConfig.js';
import type { Clock } from './dates.js';
import type { Recovery } from './recovery.js';
import type { ParseResult } from '../types/index.js';

export interface QueryParserOptions {
  /** Keyword table and date vocabulary; defaults to the bundled data */
  config?: ParserConfig;
  /** Reference date for relative phrases such as "last month" */
  clock?: Clock;
}

interface Analysis {
  result: ParseResult;
  recovery?: Recovery;
}

// Grammars are built once per configuration
const grammars = new WeakMap<ParserConfig, QueryGrammar>();

function grammarFor(config: ParserConfig): QueryGrammar {
  let grammar = grammars.get(config);
  if (!grammar) {
    grammar = new QueryGrammar(config);
    grammars.set(config, grammar);
  }
  return grammar;
}

export class QueryParser {
  private readonly config: ParserConfig;
  private readonly clock: Clock;

  constructor(options: QueryParserOptions = {}) {
    this.config = options.config ?? getDefaultConfig();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Parse a query in either dialect
   */
  parse(raw: string): ParseResult {
    return this.analyze(raw).result;
  }

  /**
   * Parse a query, throwing QuerySyntaxError if any of it could not be parsed
   */
  parseStrict(raw: string): ParseResult {
    const { result, recovery } = this.analyze(raw);
    if (recovery) {
      throw new QuerySyntaxError(recovery.warning, recovery.offset, recovery.fragment);
    }
    return result;
  }

  private analyze(raw: string): Analysis {
    if (raw.trim() === '') {
      return { result: { ast: freeText(''), fallbackUsed: false, fields: [], warnings: [] } };
    }

    const source = new SourceText(raw);
    try {
      const outcome = grammarFor(this.config).match(source);
      switch (outcome.status) {
        case 'matched': {
          const built = new AstBuilder(source, this.config, this.clock()).build(outcome.cst);
          return { result: { ...built, fallbackUsed: false } };
        }
        case 'partial': {
          const built = new AstBuilder(source, this.config, this.clock()).build(outcome.cst);
          const recovery = recoverPartial(built.ast, source, outcome.consumed);
          return {
            result: {
              ast: recovery.ast,
              fallbackUsed: true,
              fields: built.fields,
              warnings: [...built.warnings, recovery.warning],
            },
            recovery,
          };
        }
        case 'failed': {
          const recovery = recoverTotal(source, outcome.offset);
          return { result: this.fallback(recovery), recovery };
        }
      }
    } catch (error) {
      // Deep nesting can exhaust the stack inside the combinators
      const recovery = recoverTotal(source, 0, error instanceof Error ? error.message : String(error));
      return { result: this.fallback(recovery), recovery };
    }
  }

  private fallback(recovery: Recovery): ParseResult {
    return { ast: recovery.ast, fallbackUsed: true, fields: [], warnings: [recovery.warning] };
  }
}

let defaultParser: QueryParser | undefined;

function parserFor(options?: QueryParserOptions): QueryParser {
  if (options && (options.config || options.clock)) {
    return new QueryParser(options);
  }
  if (!defaultParser) {
    defaultParser = new QueryParser();
  }
  return defaultParser;
}

/**
 * Parse a query with the bundled keyword table
 */
export function parseQuery(raw: string, options?: QueryParserOptions): ParseResult {
  return parserFor(options).parse(raw);
}

/**
 * Parse a query, throwing QuerySyntaxError when fallback was needed
 */
export function parseQueryStrict(raw: string, options?: QueryParserOptions): ParseResult {
  return parserFor(options).parseStrict(raw);
}
