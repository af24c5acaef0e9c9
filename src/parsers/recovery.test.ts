/**
 * Recovery Tests
 */

import { describe, it, expect } from 'vitest';
import { andQuery, freeText, malformedQuery } from '../types/index.js';
import { recoverPartial, recoverTotal } from './recovery.js';
import { SourceText } from './sourceText.js';

describe('recoverPartial', () => {
  it('should AND the parsed prefix with the trimmed remainder', () => {
    expect(recoverPartial(freeText('ellis'), new SourceText('ellis ) x '), 5)).toEqual({
      ast: andQuery(freeText('ellis'), malformedQuery(') x')),
      offset: 5,
      fragment: ') x',
      warning: "Could not parse ') x' (byte 5); kept it as unparsed text",
    });
  });
});

describe('recoverTotal', () => {
  it('should keep the whole trimmed input', () => {
    expect(recoverTotal(new SourceText(' ((( '))).toEqual({
      ast: malformedQuery('((('),
      offset: 0,
      fragment: '(((',
      warning: 'Could not parse the query; kept it as unparsed text',
    });
  });

  it('should name the cause when there is one', () => {
    expect(recoverTotal(new SourceText('x'), 0, 'too deep').warning).toBe(
      'Could not parse the query (too deep); kept it as unparsed text'
    );
  });
});
