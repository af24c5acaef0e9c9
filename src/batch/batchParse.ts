/**
 * Batch Parsing
 *
 * Runs a list of queries through the parser and reports how many needed
 * fallback. Queries come from a CSV file (a `query`, `q` or `search` column,
 * matched case-insensitively) or from a text file with one query per line.
 */

import Papa from 'papaparse';
import { readFileSync } from 'fs';
import { extname } from 'path';
import { QueryParser } from '../parsers/queryParser.js';
import type { ParseResult } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type QueryFileFormat = 'csv' | 'lines';

export interface QueryList {
  queries: string[];
  warnings: string[];
  errors: string[];
}

export interface BatchEntry {
  query: string;
  result: ParseResult;
}

export interface BatchSummary {
  total: number;
  fallbackCount: number;
  warningCount: number;
  results: BatchEntry[];
}

/** Column names accepted for the query text, in order of preference */
const QUERY_COLUMN_ALIASES = ['query', 'q', 'search'];

// ============================================================================
// Reading queries
// ============================================================================

function readCsvQueries(content: string): QueryList {
  const warnings: string[] = [];
  const errors: string[] = [];

  const parseResult = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
    delimiter: '',
  });

  for (const error of parseResult.errors) {
    // Single-column files cannot have their delimiter detected; the rows are still read
    if (error.message.includes('Unable to auto-detect delimiting character')) {
      continue;
    }
    errors.push(`CSV parse error at row ${error.row ?? 'unknown'}: ${error.message}`);
  }

  const headers = parseResult.meta.fields ?? [];
  const column = QUERY_COLUMN_ALIASES.map((alias) =>
    headers.find((header) => header.toLowerCase() === alias)
  ).find((header): header is string => header !== undefined);

  if (!column) {
    errors.push(`CSV needs a column named one of: ${QUERY_COLUMN_ALIASES.join(', ')}`);
    return { queries: [], warnings, errors };
  }

  const ignored = headers.filter((header) => header !== column);
  if (ignored.length > 0) {
    warnings.push(`Ignoring columns: ${ignored.join(', ')}`);
  }

  const queries = parseResult.data.map((row) => row[column] ?? '');
  return { queries, warnings, errors };
}

function readLineQueries(content: string): QueryList {
  const queries = content
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '' && !line.trimStart().startsWith('#'));
  return { queries, warnings: [], errors: [] };
}

/**
 * Split file content into queries
 */
export function readQueries(content: string, format: QueryFileFormat): QueryList {
  if (content.trim() === '') {
    return { queries: [], warnings: [], errors: ['Query file is empty'] };
  }
  return format === 'csv' ? readCsvQueries(content) : readLineQueries(content);
}

/**
 * Load queries from a file; `.csv` files are read as CSV, anything else as lines
 */
export function loadQueries(path: string): QueryList {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    return {
      queries: [],
      warnings: [],
      errors: [`Failed to read query file: ${err instanceof Error ? err.message : String(err)}`],
    };
  }
  return readQueries(content, extname(path).toLowerCase() === '.csv' ? 'csv' : 'lines');
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse every query and count the ones that needed fallback
 */
export function parseBatch(queries: readonly string[], parser: QueryParser = new QueryParser()): BatchSummary {
  const results = queries.map((query) => ({ query, result: parser.parse(query) }));
  return {
    total: results.length,
    fallbackCount: results.filter(({ result }) => result.fallbackUsed).length,
    warningCount: results.reduce((count, { result }) => count + result.warnings.length, 0),
    results,
  };
}

/**
 * One-line summary such as `3 queries, 1 with fallback (33.3%), 2 warnings`
 */
export function summarizeBatch(summary: BatchSummary): string {
  const share = summary.total === 0 ? 0 : (summary.fallbackCount / summary.total) * 100;
  const noun = summary.total === 1 ? 'query' : 'queries';
  return `${summary.total} ${noun}, ${summary.fallbackCount} with fallback (${share.toFixed(1)}%), ${summary.warningCount} warnings`;
}
