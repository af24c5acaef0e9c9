/**
 * Tree Formatter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  andQuery,
  dateQuery,
  freeText,
  keywordQuery,
  malformedQuery,
  nestedKeywordQuery,
  notQuery,
  orQuery,
  rangeQuery,
} from '../types/index.js';
import { describeNode, formatTree } from './treeFormatter.js';

const YEAR_2015 = { value: '2015', year: 2015, precision: 'year' as const };
const YEAR_2017 = { value: '2017', year: 2017, precision: 'year' as const };

describe('describeNode', () => {
  it('should label leaves', () => {
    expect(describeNode(freeText('higgs'))).toBe('freeText higgs');
    expect(describeNode(keywordQuery('title', 'higgs'))).toBe('keyword title = higgs');
    expect(describeNode(malformedQuery('and or'))).toBe('malformed "and or"');
  });

  it('should label ranges as intervals', () => {
    expect(describeNode(rangeQuery('cited', { value: '50', inclusive: true }))).toBe('range cited [50 .. *)');
    expect(describeNode(rangeQuery('cited', undefined, { value: '10', inclusive: false }))).toBe(
      'range cited (* .. 10)'
    );
  });

  it('should label dates with their precision', () => {
    expect(describeNode(dateQuery('date', { kind: 'on', date: YEAR_2015 }))).toBe('date date = 2015 (year)');
    expect(
      describeNode(
        dateQuery('date', {
          kind: 'range',
          lower: { date: YEAR_2015, inclusive: true },
          upper: { date: YEAR_2017, inclusive: true },
        })
      )
    ).toBe('date date [2015 .. 2017]');
  });

  it('should label inner nodes by type', () => {
    expect(describeNode(notQuery(freeText('x')))).toBe('not');
  });
});

describe('formatTree', () => {
  it('should draw children below their parent', () => {
    expect(formatTree(andQuery(keywordQuery('title', 'higgs'), notQuery(freeText('boson'))))).toBe(
      ['and', '├── keyword title = higgs', '└── not', '    └── freeText boson'].join('\n')
    );
  });

  it('should continue the rail past earlier siblings', () => {
    expect(formatTree(orQuery(andQuery(freeText('a'), freeText('b')), freeText('c')))).toBe(
      ['or', '├── and', '│   ├── freeText a', '│   └── freeText b', '└── freeText c'].join('\n')
    );
  });

  it('should draw the operand of a nested keyword', () => {
    expect(formatTree(nestedKeywordQuery('citedby', keywordQuery('author', 'ellis')))).toBe(
      ['nestedKeyword citedby', '└── keyword author = ellis'].join('\n')
    );
  });

  it('should print a single leaf on one line', () => {
    expect(formatTree(freeText('higgs'))).toBe('freeText higgs');
  });
});
