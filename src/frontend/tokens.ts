/**
 * Token contracts for RPN expressions.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the source text. */
  offset: number;
}

/**
 * Source span from `start` (inclusive) to `end` (exclusive offset).
 */
export interface SourceSpan {
  /** User-facing source name (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

export type OperatorKind =
  | 'PLUS'
  | 'MINUS'
  | 'ASTERISK'
  | 'SLASH'
  | 'MOD'
  | 'POWER'
  | 'FACTORIAL';

export type KeywordKind = 'ABS' | 'COS' | 'DUP' | 'E' | 'PI' | 'SIN' | 'SQRT' | 'SWAP' | 'TAN';

export type TokenKind = 'NUMBER' | OperatorKind | KeywordKind | 'EOF' | 'ERROR';

/**
 * A lexed token. `literal` is the exact matched text, except for `ERROR` tokens where it
 * describes what was found, and `EOF` where it is empty.
 */
export interface Token {
  kind: TokenKind;
  literal: string;
  span: SourceSpan;
}

/**
 * Single-character operators.
 */
export const OPERATOR_CHARS: ReadonlyMap<string, OperatorKind> = new Map<string, OperatorKind>([
  ['+', 'PLUS'],
  ['%', 'MOD'],
  ['^', 'POWER'],
  ['/', 'SLASH'],
  ['*', 'ASTERISK'],
  ['!', 'FACTORIAL'],
]);

/**
 * Reserved identifiers. `fact` is the spelled-out form of `!`.
 */
const KEYWORDS = new Map<string, KeywordKind | 'FACTORIAL'>([
  ['abs', 'ABS'],
  ['cos', 'COS'],
  ['dup', 'DUP'],
  ['e', 'E'],
  ['fact', 'FACTORIAL'],
  ['pi', 'PI'],
  ['sin', 'SIN'],
  ['sqrt', 'SQRT'],
  ['swap', 'SWAP'],
  ['tan', 'TAN'],
]);

/**
 * Classify identifier text. Anything outside the keyword table is `ERROR`.
 */
export function lookupIdentifier(identifier: string): TokenKind {
  return KEYWORDS.get(identifier) ?? 'ERROR';
}

/**
 * Literal text substituted for the named constants `e` and `pi`.
 *
 * Six fractional digits, matching `%f` formatting.
 */
export const NAMED_CONSTANTS: ReadonlyMap<TokenKind, string> = new Map<TokenKind, string>([
  ['E', Math.E.toFixed(6)],
  ['PI', Math.PI.toFixed(6)],
]);
