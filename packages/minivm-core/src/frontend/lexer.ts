import { I64_MAX } from '../model/bytecode.js';
import { isKeyword, type Span, type Token } from '../model/token.js';

export type LexErrorCode = 'E_LEX_UNEXPECTED_CHAR' | 'E_LEX_INT_OVERFLOW';

export class LexError extends Error {
  constructor(
    readonly code: LexErrorCode,
    readonly explain: string,
    readonly span: Span,
  ) {
    super(`${code}: ${explain}`);
    this.name = 'LexError';
  }
}

const isDigit = (ch: string) => ch >= '0' && ch <= '9';
const isIdentStart = (ch: string) => (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
const isIdentPart = (ch: string) => isIdentStart(ch) || isDigit(ch);
const isSpace = (ch: string) => /\s/.test(ch);

/**
 * Pull-based tokenizer. `next()` yields `null` once the input is exhausted
 * and throws a {@link LexError} for text it cannot tokenize, so the two
 * outcomes never look alike to the caller.
 *
 * A lexer is single-pass; re-tokenizing means constructing a new one.
 */
export class Lexer implements Iterable<Token> {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly src: string) {}

  // whole code points, so astral characters count as one column
  private peek(): string | undefined {
    const cp = this.src.codePointAt(this.pos);
    return cp === undefined ? undefined : String.fromCodePoint(cp);
  }

  private advance(): string {
    const ch = this.peek() ?? '';
    this.pos += ch.length;
    if (ch === '\n') {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return ch;
  }

  private span(): Span {
    return { offset: this.pos, line: this.line, column: this.column };
  }

  private skipWhitespace(): void {
    for (let ch = this.peek(); ch !== undefined && isSpace(ch); ch = this.peek()) {
      this.advance();
    }
  }

  private takeWhile(pred: (ch: string) => boolean): string {
    const start = this.pos;
    for (let ch = this.peek(); ch !== undefined && pred(ch); ch = this.peek()) {
      this.advance();
    }
    return this.src.slice(start, this.pos);
  }

  private readNumber(span: Span): Token {
    const digits = this.takeWhile(isDigit);
    const value = BigInt(digits);
    if (value > I64_MAX) {
      throw new LexError('E_LEX_INT_OVERFLOW', `integer literal ${digits} does not fit in 64 bits`, span);
    }
    return { kind: 'number', value, span };
  }

  private readWord(span: Span): Token {
    const word = this.takeWhile(isIdentPart);
    if (isKeyword(word)) return { kind: 'keyword', keyword: word, span };
    return { kind: 'ident', name: word, span };
  }

  next(): Token | null {
    this.skipWhitespace();
    const ch = this.peek();
    if (ch === undefined) return null;
    const span = this.span();

    if (isDigit(ch)) return this.readNumber(span);
    if (isIdentStart(ch)) return this.readWord(span);

    switch (ch) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '<':
      case '>':
        this.advance();
        return { kind: 'op', op: ch, span };
      case '(':
      case ')':
      case ';':
        this.advance();
        return { kind: 'punct', punct: ch, span };
      case '=':
        this.advance();
        if (this.peek() === '=') {
          this.advance();
          return { kind: 'op', op: '==', span };
        }
        return { kind: 'op', op: '=', span };
      default: {
        const cp = ch.codePointAt(0) ?? 0;
        throw new LexError(
          'E_LEX_UNEXPECTED_CHAR',
          `unexpected character '${ch}' (U+${cp.toString(16).toUpperCase().padStart(4, '0')})`,
          span,
        );
      }
    }
  }

  *[Symbol.iterator](): Iterator<Token> {
    for (let tok = this.next(); tok !== null; tok = this.next()) {
      yield tok;
    }
  }
}

export function tokenize(src: string): Token[] {
  return [...new Lexer(src)];
}
