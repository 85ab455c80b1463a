import { describe, expect, it } from 'vitest';

import { Lexer, tokenize } from '../src/frontend/lexer.js';
import { lookupIdentifier } from '../src/frontend/tokens.js';

const kinds = (text: string) => tokenize(text).map((t) => t.kind);
const literals = (text: string) => tokenize(text).map((t) => t.literal);

describe('lexer', () => {
  it('splits numbers and operators', () => {
    expect(kinds('3 4 + 2 * 8 / 5 % 2 ^ -')).toEqual([
      'NUMBER',
      'NUMBER',
      'PLUS',
      'NUMBER',
      'ASTERISK',
      'NUMBER',
      'SLASH',
      'NUMBER',
      'MOD',
      'NUMBER',
      'POWER',
      'MINUS',
    ]);
    expect(literals('12 0.25 +')).toEqual(['12', '0.25', '+']);
  });

  it('reads a minus directly before a digit as the sign of a number', () => {
    expect(tokenize('-3 - 2.5 -')).toMatchObject([
      { kind: 'NUMBER', literal: '-3' },
      { kind: 'MINUS', literal: '-' },
      { kind: 'NUMBER', literal: '2.5' },
      { kind: 'MINUS', literal: '-' },
    ]);
    expect(tokenize('-0.5')).toMatchObject([{ kind: 'NUMBER', literal: '-0.5' }]);
  });

  it('needs a digit after the decimal point', () => {
    expect(tokenize('3.')).toMatchObject([
      { kind: 'NUMBER', literal: '3' },
      { kind: 'ERROR', literal: 'Unknown token .' },
    ]);
  });

  it('classifies keywords and both spellings of factorial', () => {
    expect(kinds('abs cos dup e fact pi sin sqrt swap tan !')).toEqual([
      'ABS',
      'COS',
      'DUP',
      'E',
      'FACTORIAL',
      'PI',
      'SIN',
      'SQRT',
      'SWAP',
      'TAN',
      'FACTORIAL',
    ]);
  });

  it('ends an identifier at a digit', () => {
    expect(tokenize('abs3')).toMatchObject([
      { kind: 'ABS', literal: 'abs' },
      { kind: 'NUMBER', literal: '3' },
    ]);
  });

  it('stops after the first unknown identifier', () => {
    expect(tokenize('3 foo 4 bar')).toMatchObject([
      { kind: 'NUMBER', literal: '3' },
      { kind: 'ERROR', literal: 'Unknown token foo' },
    ]);
    expect(tokenize('-x')).toMatchObject([
      { kind: 'MINUS' },
      { kind: 'ERROR', literal: 'Unknown token x' },
    ]);
  });

  it('is case-sensitive', () => {
    expect(lookupIdentifier('sqrt')).toBe('SQRT');
    expect(lookupIdentifier('SQRT')).toBe('ERROR');
  });

  it('records line and column spans', () => {
    const toks = tokenize('3\n  4 +', 'calc');
    expect(toks[2]?.span).toEqual({
      file: 'calc',
      start: { line: 2, column: 5, offset: 6 },
      end: { line: 2, column: 6, offset: 7 },
    });
  });

  it('keeps returning EOF once the input is exhausted', () => {
    const lexer = new Lexer(' \t ');
    expect(lexer.nextToken()).toMatchObject({ kind: 'EOF', literal: '' });
    expect(lexer.nextToken()).toMatchObject({ kind: 'EOF', literal: '' });
  });
});
