import { makeSourceText, span, type SourceText } from './source.js';
import { lookupIdentifier, OPERATOR_CHARS, type Token, type TokenKind } from './tokens.js';

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && !isDigit(ch) && !isWhitespace(ch);
}

/**
 * Single left-to-right scanner over an RPN expression.
 *
 * - `-` directly followed by a digit is the sign of a number (`-3`), otherwise the MINUS operator.
 * - Numbers are `digits` with an optional `.digits` fraction; the literal is the matched text.
 * - Any other run of characters up to whitespace, a digit or the end is an identifier, looked up
 *   in the keyword table. Unknown identifiers produce an `ERROR` token.
 * - Once the input is exhausted every call returns `EOF`.
 */
export class Lexer {
  private pos = 0;
  private readonly source: SourceText;

  constructor(text: string, sourceName = '<expr>') {
    this.source = makeSourceText(sourceName, text);
  }

  nextToken(): Token {
    const text = this.source.text;
    while (isWhitespace(text[this.pos])) this.pos++;

    const start = this.pos;
    const ch = text[this.pos];
    if (ch === undefined) return this.token('EOF', '', start);

    const op = OPERATOR_CHARS.get(ch);
    if (op) {
      this.pos++;
      return this.token(op, ch, start);
    }

    if (ch === '-') {
      if (isDigit(text[this.pos + 1])) {
        this.pos++;
        this.readDecimal();
        return this.token('NUMBER', text.slice(start, this.pos), start);
      }
      this.pos++;
      return this.token('MINUS', ch, start);
    }

    if (isDigit(ch)) {
      this.readDecimal();
      return this.token('NUMBER', text.slice(start, this.pos), start);
    }

    while (isIdentifierChar(text[this.pos])) this.pos++;
    const ident = text.slice(start, this.pos);
    const kind = lookupIdentifier(ident);
    return this.token(kind, kind === 'ERROR' ? `Unknown token ${ident}` : ident, start);
  }

  private readDecimal(): void {
    const text = this.source.text;
    while (isDigit(text[this.pos])) this.pos++;
    if (text[this.pos] === '.' && isDigit(text[this.pos + 1])) {
      this.pos++;
      while (isDigit(text[this.pos])) this.pos++;
    }
  }

  private token(kind: TokenKind, literal: string, start: number): Token {
    return { kind, literal, span: span(this.source, start, this.pos) };
  }
}

/**
 * Drain a lexer into an array. The terminating `EOF` is not included; lexing stops after the
 * first `ERROR` token, which is included.
 */
export function tokenize(text: string, sourceName?: string): Token[] {
  const lexer = new Lexer(text, sourceName);
  const out: Token[] = [];
  for (;;) {
    const tok = lexer.nextToken();
    if (tok.kind === 'EOF') return out;
    out.push(tok);
    if (tok.kind === 'ERROR') return out;
  }
}
