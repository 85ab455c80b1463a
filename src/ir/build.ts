import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { Lexer } from '../frontend/lexer.js';
import type { SourceSpan, Token, TokenKind } from '../frontend/tokens.js';
import { NAMED_CONSTANTS } from '../frontend/tokens.js';
import type { Instruction, IrProgram, OperationKind } from './instructions.js';

const OPERATIONS: ReadonlyMap<TokenKind, OperationKind> = new Map<TokenKind, OperationKind>([
  ['PLUS', 'Plus'],
  ['MINUS', 'Minus'],
  ['ASTERISK', 'Multiply'],
  ['SLASH', 'Divide'],
  ['MOD', 'Modulus'],
  ['POWER', 'Power'],
  ['FACTORIAL', 'Factorial'],
  ['ABS', 'Abs'],
  ['SIN', 'Sin'],
  ['COS', 'Cos'],
  ['TAN', 'Tan'],
  ['SQRT', 'Sqrt'],
  ['DUP', 'Dup'],
  ['SWAP', 'Swap'],
]);

function diagAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  file: string,
  message: string,
  where?: SourceSpan,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file,
    ...(where ? { line: where.start.line, column: where.start.column } : {}),
  });
}

/**
 * Drain the lexer and check the program shape.
 *
 * `e` and `pi` are rewritten to NUMBER tokens before any check runs, so they behave exactly
 * like the literal was typed. Returns `undefined` after recording a diagnostic when:
 * - the lexer produced an `ERROR` token;
 * - no tokens were found;
 * - the first token is not a number;
 * - more than one token is present and the last one is a number (nothing consumes it).
 */
export function lexProgram(
  text: string,
  sourceName: string,
  diagnostics: Diagnostic[],
): Token[] | undefined {
  const lexer = new Lexer(text, sourceName);
  const tokens: Token[] = [];

  for (;;) {
    const tok = lexer.nextToken();
    if (tok.kind === 'EOF') break;
    if (tok.kind === 'ERROR') {
      diagAt(
        diagnostics,
        DiagnosticIds.UnknownToken,
        sourceName,
        `Error parsing input: ${tok.literal}`,
        tok.span,
      );
      return undefined;
    }
    const named = NAMED_CONSTANTS.get(tok.kind);
    tokens.push(named === undefined ? tok : { ...tok, kind: 'NUMBER', literal: named });
  }

  const first = tokens[0];
  if (!first) {
    diagAt(
      diagnostics,
      DiagnosticIds.EmptyExpression,
      sourceName,
      'The input expression was empty',
    );
    return undefined;
  }
  if (first.kind !== 'NUMBER') {
    diagAt(
      diagnostics,
      DiagnosticIds.ExpectedLeadingNumber,
      sourceName,
      `Expected the program to begin with a number, found "${first.literal}"`,
      first.span,
    );
    return undefined;
  }

  const last = tokens[tokens.length - 1];
  if (tokens.length > 1 && last && last.kind === 'NUMBER') {
    diagAt(
      diagnostics,
      DiagnosticIds.TrailingNumber,
      sourceName,
      `Program ends with the number "${last.literal}", which no operation consumes`,
      last.span,
    );
    return undefined;
  }

  return tokens;
}

/**
 * Convert validated tokens into instructions, collecting pushed literals into the constant pool.
 */
export function buildInstructions(
  tokens: Token[],
  sourceName: string,
  diagnostics: Diagnostic[],
): IrProgram | undefined {
  const instructions: Instruction[] = [];
  const constants = new Set<string>();

  for (const tok of tokens) {
    if (tok.kind === 'NUMBER') {
      constants.add(tok.literal);
      instructions.push({ kind: 'Push', value: tok.literal, span: tok.span });
      continue;
    }
    const kind = OPERATIONS.get(tok.kind);
    if (!kind) {
      diagAt(
        diagnostics,
        DiagnosticIds.InternalError,
        sourceName,
        `Unexpected ${tok.kind} token "${tok.literal}" while building instructions`,
        tok.span,
      );
      return undefined;
    }
    instructions.push({ kind, span: tok.span });
  }

  return { instructions, constants: [...constants] };
}

/**
 * Lex, validate and build the intermediate form for an expression.
 */
export function buildIr(
  text: string,
  diagnostics: Diagnostic[],
  sourceName = '<expr>',
): IrProgram | undefined {
  const tokens = lexProgram(text, sourceName, diagnostics);
  if (!tokens) return undefined;
  return buildInstructions(tokens, sourceName, diagnostics);
}
