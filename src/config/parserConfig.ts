/**
 * Parser configuration: the keyword table and the relative date vocabulary.
 *
 * Both are JSON data files under data/, read once and validated before use.
 * Alternate tables can be loaded from other paths or built in memory, which is
 * the only externally adjustable behavior of the grammar.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { KeywordRegistry } from '../registry/keywordRegistry.js';
import { ConfigurationError } from '../types/index.js';
import type {
  DateUnit,
  FieldKind,
  KeywordTable,
  KeywordTableEntry,
  RelativeDateSpecifier,
} from '../types/index.js';

// data/ sits at the package root, two levels above both src/config and dist/config
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const DATA_DIR = join(__dirname, '..', '..', 'data');

export const DEFAULT_KEYWORDS_PATH = join(DATA_DIR, 'keywords.json');
export const DEFAULT_DATE_SPECIFIERS_PATH = join(DATA_DIR, 'date-specifiers.json');

// ============================================================================
// Types
// ============================================================================

export interface ParserConfig {
  readonly registry: KeywordRegistry;
  readonly dateSpecifiers: readonly RelativeDateSpecifier[];
}

export interface LoadConfigOptions {
  keywordsPath?: string;
  dateSpecifiersPath?: string;
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFieldKind(value: unknown): value is FieldKind {
  return value === 'text' || value === 'number' || value === 'date' || value === 'query';
}

function isDateUnit(value: unknown): value is DateUnit {
  return value === 'day' || value === 'month' || value === 'year';
}

/**
 * Validate parsed JSON as a keyword table
 */
export function parseKeywordTable(data: unknown, source?: string): KeywordTable {
  if (!isRecord(data) || !Array.isArray(data.fields)) {
    throw new ConfigurationError('Keyword table must be an object with a "fields" array', source);
  }

  const fields: KeywordTableEntry[] = data.fields.map((entry: unknown, index: number) => {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      throw new ConfigurationError(`Keyword table entry ${index} needs a string "name"`, source);
    }
    const kind = entry.kind ?? 'text';
    if (!isFieldKind(kind)) {
      throw new ConfigurationError(`Field '${entry.name}' has unknown kind '${String(kind)}'`, source);
    }
    const aliases = entry.aliases ?? [];
    if (!Array.isArray(aliases) || !aliases.every((alias): alias is string => typeof alias === 'string')) {
      throw new ConfigurationError(`Field '${entry.name}' needs "aliases" to be an array of strings`, source);
    }
    return { name: entry.name, kind, aliases };
  });

  return { fields };
}

/**
 * Validate parsed JSON as a relative date vocabulary
 */
export function parseDateSpecifiers(data: unknown, source?: string): RelativeDateSpecifier[] {
  if (!isRecord(data) || !Array.isArray(data.specifiers)) {
    throw new ConfigurationError('Date vocabulary must be an object with a "specifiers" array', source);
  }

  const seen = new Set<string>();
  return data.specifiers.map((entry: unknown, index: number) => {
    if (!isRecord(entry) || typeof entry.phrase !== 'string' || !entry.phrase.trim()) {
      throw new ConfigurationError(`Date specifier ${index} needs a non-empty "phrase"`, source);
    }
    const phrase = entry.phrase.trim().toLowerCase().replace(/\s+/g, ' ');
    if (!/^[a-z][a-z ]*$/.test(phrase)) {
      throw new ConfigurationError(`Date specifier '${phrase}' may only contain letters and spaces`, source);
    }
    if (seen.has(phrase)) {
      throw new ConfigurationError(`Date specifier '${phrase}' is defined more than once`, source);
    }
    seen.add(phrase);
    if (!isDateUnit(entry.unit)) {
      throw new ConfigurationError(`Date specifier '${phrase}' has unknown unit '${String(entry.unit)}'`, source);
    }
    const shift = entry.shift ?? 0;
    if (typeof shift !== 'number' || !Number.isInteger(shift)) {
      throw new ConfigurationError(`Date specifier '${phrase}' needs an integer "shift"`, source);
    }
    return { phrase, unit: entry.unit, shift };
  });
}

function readJson(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
}

// ============================================================================
// Construction
// ============================================================================

export function createParserConfig(
  table: KeywordTable,
  dateSpecifiers: readonly RelativeDateSpecifier[],
  source?: string
): ParserConfig {
  return Object.freeze({
    registry: KeywordRegistry.fromTable(table, source),
    dateSpecifiers: Object.freeze(dateSpecifiers.map((specifier) => Object.freeze({ ...specifier }))),
  });
}

/**
 * Load and validate configuration from JSON files (defaults to the bundled data)
 */
export function loadParserConfig(options: LoadConfigOptions = {}): ParserConfig {
  const keywordsPath = options.keywordsPath ?? DEFAULT_KEYWORDS_PATH;
  const specifiersPath = options.dateSpecifiersPath ?? DEFAULT_DATE_SPECIFIERS_PATH;

  const table = parseKeywordTable(readJson(keywordsPath), keywordsPath);
  const specifiers = parseDateSpecifiers(readJson(specifiersPath), specifiersPath);

  return createParserConfig(table, specifiers, keywordsPath);
}

let defaultConfig: ParserConfig | undefined;

/**
 * The bundled configuration, loaded on first use and shared by every parser
 */
export function getDefaultConfig(): ParserConfig {
  if (!defaultConfig) {
    defaultConfig = loadParserConfig();
  }
  return defaultConfig;
}
