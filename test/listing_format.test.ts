import { describe, expect, it } from 'vitest';

import { compile } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { ListingArtifact } from '../src/formats/types.js';

function listingFor(expression: string, sourceName?: string): string {
  const res = compile(
    expression,
    { emitAsm: false, emitListing: true, ...(sourceName ? { sourceName } : {}) },
    { formats: defaultFormatWriters },
  );
  expect(res.diagnostics).toEqual([]);
  expect(res.artifacts.map((a) => a.kind)).toEqual(['lst']);
  const lst = res.artifacts.find((a): a is ListingArtifact => a.kind === 'lst');
  return lst?.text ?? '';
}

describe('instruction listing', () => {
  it('tracks depth through the program and lists the pool', () => {
    expect(listingFor('3 4 + dup').split('\n')).toEqual([
      '; rpnasm listing: <expr>',
      '; 4 instructions, 2 constants',
      '',
      '0000  Push       needs=0  delta=+1  depth=1  3',
      '0001  Push       needs=0  delta=+1  depth=2  4',
      '0002  Plus       needs=2  delta=-1  depth=1',
      '0003  Dup        needs=1  delta=+1  depth=2',
      '',
      '; final depth: 2 (stack_too_full)',
      '',
      '; constants:',
      '; const_3 = 3',
      '; const_4 = 4',
      '',
    ]);
  });

  it('marks the first instruction that runs out of values', () => {
    const lines = listingFor('3 + abs', 'calc').split('\n');
    expect(lines[0]).toBe('; rpnasm listing: calc');
    expect(lines.slice(3, 9)).toEqual([
      '0000  Push       needs=0  delta=+1  depth=1  3',
      '0001  Plus       needs=2  delta=-1  depth=?  ; stack_error',
      '0002  Abs        needs=1  delta=0  depth=?',
      '',
      '; final depth: ?',
      '',
    ]);
  });

  it('reports a balanced program as ok', () => {
    expect(listingFor('2 3 ^ 5 !')).toContain('; final depth: 2 (stack_too_full)');
    expect(listingFor('-2 3 ^ fact')).toContain(
      '0003  Factorial  needs=1  delta=0  depth=1\n\n; final depth: 1 (ok)\n',
    );
  });

  it('warns when no listing writer is configured', () => {
    const res = compile(
      '3 abs',
      { emitListing: true },
      { formats: { writeAsm: defaultFormatWriters.writeAsm } },
    );
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm']);
    expect(res.diagnostics).toEqual([
      {
        id: 'RPN000',
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: '<expr>',
      },
    ]);
  });
});
