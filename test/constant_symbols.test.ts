import { describe, expect, it } from 'vitest';

import { constantSymbol } from '../src/lowering/constants.js';

describe('constant symbols', () => {
  it('derives data-section names from literal text', () => {
    expect(constantSymbol('3')).toBe('const_3');
    expect(constantSymbol('0.03')).toBe('const_0_03');
    expect(constantSymbol('-3')).toBe('const_neg_3');
    expect(constantSymbol('-3.3')).toBe('const_neg_3_3');
  });

  it('keeps signed zero distinct', () => {
    expect(constantSymbol('0')).toBe('const_0');
    expect(constantSymbol('-0')).toBe('const_neg_0');
  });

  it('names the substituted constants', () => {
    expect(constantSymbol('2.718282')).toBe('const_2_718282');
    expect(constantSymbol('3.141593')).toBe('const_3_141593');
  });
});
