#!/usr/bin/env node

import { readFileSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { loadParserConfig } from './config/parserConfig.js';
import { QueryParser } from './parsers/queryParser.js';
import { serializeQuery } from './formatters/querySerializer.js';
import { formatTree } from './formatters/treeFormatter.js';
import { loadQueries, parseBatch, summarizeBatch } from './batch/batchParse.js';
import { ConfigurationError } from './types/index.js';
import type { ParseResult } from './types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');

export type OutputFormat = 'json' | 'tree' | 'query';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'tree', 'query'];

export interface CliOutput {
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface CliOptions {
  format: OutputFormat;
  batchFile?: string;
  keywordsFile?: string;
  strict: boolean;
  query: string;
}

const HELP = `
bibquery - parse bibliographic search queries into an AST

Usage:
  bibquery [options] <query...>
  bibquery [options] --batch <file>

Options:
  --format, -f <fmt>   Output format: json (default), tree or query
  --batch, -b <file>   Parse every query in a file (.csv with a "query" column,
                       or one query per line) and print a summary
  --keywords <file>    Alternate keyword table (JSON)
  --strict             Exit with status 1 if any query needed fallback
  --version, -v        Show version number
  --help, -h           Show this help message

Environment Variables:
  BIBQUERY_KEYWORDS    Alternate keyword table, used when --keywords is not given

Examples:
  bibquery 'find a ellis and t higgs'
  bibquery -f tree 'title:"dark matter" or date > 2015'
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Parse command line arguments (without the node and script paths)
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = {}): CliOptions {
  const options: CliOptions = { format: 'json', strict: false, query: '', keywordsFile: env.BIBQUERY_KEYWORDS };
  const words: string[] = [];

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined) {
      throw new UsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--format':
      case '-f': {
        const format = valueOf(arg, ++i);
        if (!isOutputFormat(format)) {
          throw new UsageError(`Unknown format '${format}'. Use one of: ${OUTPUT_FORMATS.join(', ')}`);
        }
        options.format = format;
        break;
      }
      case '--batch':
      case '-b':
        options.batchFile = valueOf(arg, ++i);
        break;
      case '--keywords':
        options.keywordsFile = valueOf(arg, ++i);
        break;
      case '--strict':
        options.strict = true;
        break;
      case '--':
        words.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option '${arg}'`);
        }
        words.push(arg);
    }
  }

  options.query = words.join(' ');
  if (!options.batchFile && options.query.trim() === '') {
    throw new UsageError('Missing query');
  }
  return options;
}

function formatResult(result: ParseResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result, null, 2);
    case 'tree':
      return formatTree(result.ast);
    case 'query':
      return serializeQuery(result.ast);
  }
}

function runBatch(parser: QueryParser, options: CliOptions, file: string, output: CliOutput): number {
  const list = loadQueries(file);
  for (const warning of list.warnings) {
    output.error(`Warning: ${warning}`);
  }
  if (list.errors.length > 0) {
    for (const error of list.errors) {
      output.error(`Error: ${error}`);
    }
    return 2;
  }

  const summary = parseBatch(list.queries, parser);
  if (options.format === 'json') {
    output.log(JSON.stringify(summary, null, 2));
  } else {
    for (const { query, result } of summary.results) {
      output.log(options.format === 'tree' ? `${query}\n${formatTree(result.ast)}\n` : serializeQuery(result.ast));
    }
    output.log(summarizeBatch(summary));
  }
  for (const { query, result } of summary.results) {
    if (result.fallbackUsed) {
      output.error(`Fallback: ${query}`);
    }
  }
  return options.strict && summary.fallbackCount > 0 ? 1 : 0;
}

/**
 * Run the command line interface; returns the process exit code
 */
export function runCli(args: string[], env: NodeJS.ProcessEnv = process.env, output: CliOutput = console): number {
  if (args.includes('--version') || args.includes('-v')) {
    const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    output.log(String(packageJson.version));
    return 0;
  }
  if (args.includes('--help') || args.includes('-h')) {
    output.log(HELP);
    return 0;
  }

  let options: CliOptions;
  let parser: QueryParser;
  try {
    options = parseArgs(args, env);
    parser = new QueryParser(
      options.keywordsFile ? { config: loadParserConfig({ keywordsPath: options.keywordsFile }) } : {}
    );
  } catch (error) {
    if (error instanceof UsageError || error instanceof ConfigurationError) {
      output.error(`Error: ${error.message}`);
      if (error instanceof UsageError) {
        output.error('Run bibquery --help for usage');
      }
      return 2;
    }
    throw error;
  }

  if (options.batchFile) {
    return runBatch(parser, options, options.batchFile, output);
  }

  const result = parser.parse(options.query);
  output.log(formatResult(result, options.format));
  for (const warning of result.warnings) {
    output.error(`Warning: ${warning}`);
  }
  return options.strict && result.fallbackUsed ? 1 : 0;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(__filename);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  process.exitCode = runCli(process.argv.slice(2));
}
