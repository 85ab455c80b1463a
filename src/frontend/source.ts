import type { SourcePosition, SourceSpan } from './tokens.js';

/**
 * Expression text plus precomputed line-start offsets, used to convert offsets into line/column
 * spans. Expressions are normally a single line, but CR/LF count as whitespace so multi-line
 * input is accepted and reported accurately.
 */
export interface SourceText {
  name: string;
  text: string;
  /** 0-based offsets for the start of each line. The first entry is always 0. */
  lineStarts: number[];
}

export function makeSourceText(name: string, text: string): SourceText {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') lineStarts.push(i + 1);
  }
  return { name, text, lineStarts };
}

/**
 * Convert a 0-based offset into a 1-based line/column position.
 */
export function posAtOffset(source: SourceText, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, source.text.length));
  let lo = 0;
  let hi = source.lineStarts.length - 1;
  while (lo < hi) {
    const mid = Math.floor((lo + hi + 1) / 2);
    if ((source.lineStarts[mid] ?? 0) <= clamped) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  const lineStart = source.lineStarts[lo] ?? 0;
  return { line: lo + 1, column: clamped - lineStart + 1, offset: clamped };
}

export function span(source: SourceText, startOffset: number, endOffset: number): SourceSpan {
  return {
    file: source.name,
    start: posAtOffset(source, startOffset),
    end: posAtOffset(source, endOffset),
  };
}
