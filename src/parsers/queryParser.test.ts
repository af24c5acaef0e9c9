/**
 * Query Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { createParserConfig } from '../config/parserConfig.js';
import { serializeQuery } from '../formatters/querySerializer.js';
import {
  andQuery,
  atom,
  containsMalformed,
  dateQuery,
  freeText,
  keywordQuery,
  malformedQuery,
  nestedKeywordQuery,
  notQuery,
  orQuery,
  QuerySyntaxError,
  rangeQuery,
  stripGrouping,
} from '../types/index.js';
import { QueryParser, parseQuery, parseQueryStrict } from './queryParser.js';

const parser = new QueryParser({ clock: () => new Date(Date.UTC(2024, 0, 15)) });

const AWKWARD_INPUTS = [
  '',
  '   ',
  '(((',
  ')))',
  ':::',
  '"',
  "'",
  '/',
  '-',
  'not',
  'and or',
  'a:',
  'title:(',
  'date:2015->',
  '((a)',
  'ellis)',
  '->',
  '*',
  'élève',
  '🙂 emoji',
  'find',
  'f a',
  'date > ',
  'cited 10-',
];

describe('QueryParser', () => {
  describe('totality', () => {
    it.each(AWKWARD_INPUTS)('should return a result for %j', (query) => {
      const result = parser.parse(query);
      expect(result.fallbackUsed).toBe(containsMalformed(result.ast));
      expect(result.fallbackUsed).toBe(result.warnings.some((warning) => warning.startsWith('Could not parse')));
    });

    it('should survive very deep nesting', () => {
      const query = `${'('.repeat(5000)}x${')'.repeat(5000)}`;
      const result = parser.parse(query);
      expect(result.fallbackUsed).toBe(containsMalformed(result.ast));
    });

    it('should give the same result for the same input', () => {
      for (const query of [...AWKWARD_INPUTS, 'a ellis and t higgs', 'date last year']) {
        expect(parser.parse(query)).toEqual(parser.parse(query));
      }
    });
  });

  describe('dialects', () => {
    it.each([
      ['title:Higgs and author:Ellis', 't Higgs and a Ellis'],
      ['find t Higgs and a Ellis', 'title:Higgs and author:Ellis'],
      ['author:(ellis or smith)', 'a ellis or smith'],
      ['date:2015->2017', 'd 2015->2017'],
      ['find a ellis', 'author:ellis'],
    ])('should read %j and %j the same way', (first, second) => {
      expect(stripGrouping(parser.parse(first).ast)).toEqual(stripGrouping(parser.parse(second).ast));
    });

    it('should resolve every alias of a field to the same keyword', () => {
      for (const query of ['a ellis', 'au ellis', 'author ellis', 'author:ellis', 'AU:ellis']) {
        expect(parser.parse(query).ast).toEqual(keywordQuery('author', 'ellis'));
      }
    });

    it('should report aliases as written', () => {
      expect(parser.parse('AU:ellis').fields).toEqual([{ alias: 'AU', keyword: 'author' }]);
    });

    it('should prefer the find prefix over the f alias', () => {
      expect(parser.parse('f author ellis').ast).toEqual(keywordQuery('author', 'ellis'));
    });

    it('should treat adjacency as AND', () => {
      expect(parser.parse('ellis higgs').ast).toEqual(parser.parse('ellis and higgs').ast);
    });
  });

  describe('negation', () => {
    it('should read a dash followed by a space as NOT', () => {
      expect(parser.parse('x - y').ast).toEqual(andQuery(freeText('x'), notQuery(freeText('y'))));
    });

    it('should end a field before a negated term', () => {
      expect(parser.parse("author ellis - title 'boson'")).toEqual({
        ast: andQuery(keywordQuery('author', 'ellis'), notQuery(keywordQuery('title', atom('partial', 'boson')))),
        fallbackUsed: false,
        fields: [
          { alias: 'author', keyword: 'author' },
          { alias: 'title', keyword: 'title' },
        ],
        warnings: [],
      });
    });
  });

  describe('field boundaries', () => {
    it('should end a number field at a word it cannot read', () => {
      expect(parser.parse('topcite 2+ and skands')).toEqual({
        ast: andQuery(rangeQuery('cited', { value: '2', inclusive: true }), freeText('skands')),
        fallbackUsed: false,
        fields: [{ alias: 'topcite', keyword: 'cited' }],
        warnings: [],
      });
    });

    it('should end a date field before a short alias', () => {
      expect(parser.parse('d 2015 t higgs')).toEqual({
        ast: andQuery(
          dateQuery('date', { kind: 'on', date: { value: '2015', year: 2015, precision: 'year' } }),
          keywordQuery('title', 'higgs')
        ),
        fallbackUsed: false,
        fields: [
          { alias: 'd', keyword: 'date' },
          { alias: 't', keyword: 'title' },
        ],
        warnings: [],
      });
    });

    it('should keep further dates in a date field', () => {
      expect(parser.parse('d 2015 or 2017').ast).toEqual(
        orQuery(
          dateQuery('date', { kind: 'on', date: { value: '2015', year: 2015, precision: 'year' } }),
          dateQuery('date', { kind: 'on', date: { value: '2017', year: 2017, precision: 'year' } })
        )
      );
    });

    it('should start a new field at an alias before a quoted value', () => {
      expect(parser.parse("a foo t 'bar'").ast).toEqual(
        andQuery(keywordQuery('author', 'foo'), keywordQuery('title', atom('partial', 'bar')))
      );
    });
  });

  describe('nested keywords', () => {
    it.each([
      ['referstox:author:s.p.martin.1', nestedKeywordQuery('referstox', keywordQuery('author', 's.p.martin.1'))],
      ['citedbyx:author:s.p.martin.1', nestedKeywordQuery('citedbyx', keywordQuery('author', 's.p.martin.1'))],
      [
        'find a parke, s j and refersto author witten',
        andQuery(
          keywordQuery('author', 'parke, s j'),
          nestedKeywordQuery('refersto', keywordQuery('author', 'witten'))
        ),
      ],
      [
        'fin a henneaux and citedby a nicolai',
        andQuery(keywordQuery('author', 'henneaux'), nestedKeywordQuery('citedby', keywordQuery('author', 'nicolai'))),
      ],
      [
        '-refersto:recid:1374998 and citedby:(A.A.Aguilar.Arevalo.1)',
        andQuery(
          notQuery(nestedKeywordQuery('refersto', keywordQuery('recid', atom('number', '1374998')))),
          nestedKeywordQuery('citedby', freeText('A.A.Aguilar.Arevalo.1'))
        ),
      ],
      [
        'citedby:(author A.A.Aguilar.Arevalo.1 and not a ellis)',
        nestedKeywordQuery(
          'citedby',
          andQuery(keywordQuery('author', 'A.A.Aguilar.Arevalo.1'), notQuery(keywordQuery('author', 'ellis')))
        ),
      ],
      [
        'citedby:refersto:recid:1432705',
        nestedKeywordQuery('citedby', nestedKeywordQuery('refersto', keywordQuery('recid', atom('number', '1432705')))),
      ],
    ])('should read %j', (query, expected) => {
      const result = parser.parse(query);
      expect(result.ast).toEqual(expected);
      expect(result.fallbackUsed).toBe(false);
      expect(result.warnings).toEqual([]);
    });

    it('should report the nested field and the fields inside it', () => {
      expect(parser.parse('refs:a ellis').fields).toEqual([
        { alias: 'refs', keyword: 'refersto' },
        { alias: 'a', keyword: 'author' },
      ]);
    });
  });

  describe('ranges', () => {
    it('should read the same range back from its serialized form', () => {
      const ast = parser.parse('date 2015->2017').ast;
      const text = serializeQuery(ast);
      expect(text).toBe('date:2015->2017');
      expect(parser.parse(text).ast).toEqual(ast);
    });
  });

  describe('relative dates', () => {
    it('should resolve against the injected clock', () => {
      expect(parser.parse('date last month').ast).toEqual(
        dateQuery('date', { kind: 'on', date: { value: '2023-12', year: 2023, month: 12, precision: 'month' } })
      );
    });
  });

  describe('fallback', () => {
    it('should map empty input to empty free text', () => {
      const empty = { ast: freeText(''), fallbackUsed: false, fields: [], warnings: [] };
      expect(parser.parse('')).toEqual(empty);
      expect(parser.parse('  \t ')).toEqual(empty);
    });

    it('should keep the whole query when nothing parses', () => {
      expect(parser.parse('title: AND AND')).toEqual({
        ast: malformedQuery('title: AND AND'),
        fallbackUsed: true,
        fields: [],
        warnings: ['Could not parse the query; kept it as unparsed text'],
      });
    });

    it('should keep the parsed prefix and the unparsed rest', () => {
      expect(parser.parse('title γ-radiation and and')).toEqual({
        ast: andQuery(keywordQuery('title', 'γ-radiation'), malformedQuery('and and')),
        fallbackUsed: true,
        fields: [{ alias: 'title', keyword: 'title' }],
        warnings: ["Could not parse 'and and' (byte 18); kept it as unparsed text"],
      });
    });

    it('should not use fallback for demoted values', () => {
      const result = parser.parse('date 2015-02-30');
      expect(result.fallbackUsed).toBe(false);
      expect(result.ast).toEqual(keywordQuery('date', '2015-02-30'));
    });
  });

  describe('strict parsing', () => {
    it('should return the result when no fallback was needed', () => {
      expect(parser.parseStrict('a ellis').ast).toEqual(keywordQuery('author', 'ellis'));
    });

    it('should throw with the position and fragment', () => {
      let caught: unknown;
      try {
        parser.parseStrict('ellis)');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(QuerySyntaxError);
      expect(caught).toMatchObject({
        name: 'QuerySyntaxError',
        message: "Could not parse ')' (byte 5); kept it as unparsed text",
        position: 5,
        fragment: ')',
      });
    });

    it('should throw for input that does not parse at all', () => {
      expect(() => parseQueryStrict('title: AND AND')).toThrow(QuerySyntaxError);
    });

    it('should point at the furthest position parsing reached', () => {
      let caught: unknown;
      try {
        parser.parseStrict('(x and (');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(QuerySyntaxError);
      expect(caught).toMatchObject({ position: 8, fragment: '(x and (' });
    });
  });

  describe('parseQuery', () => {
    it('should use the bundled keyword table by default', () => {
      expect(parseQuery('t higgs or boson').ast).toEqual(
        orQuery(keywordQuery('title', 'higgs'), keywordQuery('title', 'boson'))
      );
    });

    it('should accept another configuration', () => {
      const config = createParserConfig({ fields: [{ name: 'author', kind: 'text', aliases: ['x'] }] }, []);
      expect(parseQuery('x ellis', { config }).ast).toEqual(keywordQuery('author', 'ellis'));
      expect(parseQuery('t higgs', { config }).ast).toEqual(andQuery(freeText('t'), freeText('higgs')));
    });
  });
});
