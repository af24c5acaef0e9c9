/**
 * Parser Configuration Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  createParserConfig,
  getDefaultConfig,
  loadParserConfig,
  parseDateSpecifiers,
  parseKeywordTable,
} from './parserConfig.js';
import { ConfigurationError } from '../types/index.js';

describe('parseKeywordTable', () => {
  it('should accept a well-formed table and default missing kinds to text', () => {
    const table = parseKeywordTable({
      fields: [
        { name: 'author', aliases: ['a'] },
        { name: 'date', kind: 'date', aliases: [] },
      ],
    });
    expect(table.fields).toEqual([
      { name: 'author', kind: 'text', aliases: ['a'] },
      { name: 'date', kind: 'date', aliases: [] },
    ]);
  });

  it('should reject a table without a fields array', () => {
    expect(() => parseKeywordTable({ keywords: [] })).toThrow(
      'Keyword table must be an object with a "fields" array'
    );
    expect(() => parseKeywordTable([])).toThrow(ConfigurationError);
  });

  it('should reject unknown field kinds', () => {
    expect(() => parseKeywordTable({ fields: [{ name: 'x', kind: 'boolean', aliases: [] }] })).toThrow(
      "Field 'x' has unknown kind 'boolean'"
    );
  });

  it('should reject non-string aliases', () => {
    expect(() => parseKeywordTable({ fields: [{ name: 'x', aliases: [1] }] })).toThrow(
      `Field 'x' needs "aliases" to be an array of strings`
    );
  });
});

describe('parseDateSpecifiers', () => {
  it('should normalize phrases', () => {
    expect(parseDateSpecifiers({ specifiers: [{ phrase: '  Last   Week ', unit: 'day', shift: -7 }] })).toEqual([
      { phrase: 'last week', unit: 'day', shift: -7 },
    ]);
  });

  it('should default shift to zero', () => {
    expect(parseDateSpecifiers({ specifiers: [{ phrase: 'now', unit: 'day' }] })).toEqual([
      { phrase: 'now', unit: 'day', shift: 0 },
    ]);
  });

  it('should reject duplicates, bad units and non-integer shifts', () => {
    expect(() =>
      parseDateSpecifiers({
        specifiers: [
          { phrase: 'today', unit: 'day' },
          { phrase: 'Today', unit: 'day' },
        ],
      })
    ).toThrow("Date specifier 'today' is defined more than once");
    expect(() => parseDateSpecifiers({ specifiers: [{ phrase: 'today', unit: 'week' }] })).toThrow(
      "Date specifier 'today' has unknown unit 'week'"
    );
    expect(() => parseDateSpecifiers({ specifiers: [{ phrase: 'today', unit: 'day', shift: 0.5 }] })).toThrow(
      `Date specifier 'today' needs an integer "shift"`
    );
  });

  it('should reject phrases with digits or punctuation', () => {
    expect(() => parseDateSpecifiers({ specifiers: [{ phrase: 'day-1', unit: 'day' }] })).toThrow(
      ConfigurationError
    );
  });
});

describe('createParserConfig', () => {
  it('should build a frozen configuration', () => {
    const config = createParserConfig(
      { fields: [{ name: 'title', kind: 'text', aliases: ['t'] }] },
      [{ phrase: 'today', unit: 'day', shift: 0 }]
    );
    expect(config.registry.resolve('t')?.name).toBe('title');
    expect(config.dateSpecifiers).toEqual([{ phrase: 'today', unit: 'day', shift: 0 }]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.dateSpecifiers[0])).toBe(true);
  });
});

describe('loadParserConfig', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'bibquery-config-'));
    writeFileSync(
      join(dir, 'keywords.json'),
      JSON.stringify({ fields: [{ name: 'experiment', kind: 'text', aliases: ['exp'] }] })
    );
    writeFileSync(join(dir, 'broken.json'), '{ "fields": [');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the bundled data by default', () => {
    const config = loadParserConfig();
    expect(config.registry.resolve('a')?.name).toBe('author');
    expect(config.registry.resolve('year')).toEqual({ name: 'date', kind: 'date' });
    expect(config.registry.resolve('topcite')).toEqual({ name: 'cited', kind: 'number' });
    expect(config.registry.resolve('refs')).toEqual({ name: 'refersto', kind: 'query' });
    expect(config.dateSpecifiers.map((specifier) => specifier.phrase)).toContain('last month');
  });

  it('should load an alternate keyword table', () => {
    const config = loadParserConfig({ keywordsPath: join(dir, 'keywords.json') });
    expect(config.registry.resolve('exp')?.name).toBe('experiment');
    expect(config.registry.resolve('author')).toBeUndefined();
  });

  it('should report unreadable and invalid files as configuration errors', () => {
    expect(() => loadParserConfig({ keywordsPath: join(dir, 'missing.json') })).toThrow(ConfigurationError);
    expect(() => loadParserConfig({ keywordsPath: join(dir, 'broken.json') })).toThrow(/^Invalid JSON in /);
  });

  it('should share the default configuration', () => {
    expect(getDefaultConfig()).toBe(getDefaultConfig());
  });
});
