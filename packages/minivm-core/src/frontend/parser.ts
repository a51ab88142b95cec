import type { BinaryOp, Expr, Program, Stmt } from '../model/ast.js';
import { describeToken, type Keyword, type Operator, type Punct, type Token } from '../model/token.js';
import { failure, ok, type Diagnostic, type Result } from '../model/result.js';
import { LexError, Lexer } from './lexer.js';

class ParseError extends Error {
  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.explain);
    this.name = 'ParseError';
  }
}

const COMPARISON: Partial<Record<Operator, BinaryOp>> = { '==': 'eq', '<': 'lt', '>': 'gt' };
const ADDITIVE: Partial<Record<Operator, BinaryOp>> = { '+': 'add', '-': 'sub' };
const MULTIPLICATIVE: Partial<Record<Operator, BinaryOp>> = { '*': 'mul', '/': 'div' };

type Expected = { keyword: Keyword } | { op: Operator } | { punct: Punct };

function matches(tok: Token | null, want: Expected): boolean {
  if (tok === null) return false;
  if ('keyword' in want) return tok.kind === 'keyword' && tok.keyword === want.keyword;
  if ('op' in want) return tok.kind === 'op' && tok.op === want.op;
  return tok.kind === 'punct' && tok.punct === want.punct;
}

function describeExpected(want: Expected): string {
  if ('keyword' in want) return `'${want.keyword}'`;
  if ('op' in want) return `'${want.op}'`;
  return `'${want.punct}'`;
}

/**
 * Recursive-descent parser with a single token of lookahead. The first
 * mismatch (or lexical error) rejects the whole program.
 */
export class Parser {
  private readonly lexer: Lexer;
  private current: Token | null;

  constructor(src: string) {
    this.lexer = new Lexer(src);
    this.current = this.lexer.next();
  }

  private advance(): Token | null {
    const prev = this.current;
    this.current = this.lexer.next();
    return prev;
  }

  private fail(expected: string): never {
    const tok = this.current;
    const explain = `expected ${expected}, found ${describeToken(tok)}`;
    if (tok === null) {
      throw new ParseError({ code: 'E_PARSE_UNEXPECTED_EOF', explain });
    }
    throw new ParseError({ code: 'E_PARSE_UNEXPECTED_TOKEN', explain, span: tok.span });
  }

  private expect(want: Expected): void {
    if (!matches(this.current, want)) this.fail(describeExpected(want));
    this.advance();
  }

  private expectIdent(): string {
    const tok = this.current;
    if (tok === null || tok.kind !== 'ident') this.fail('identifier');
    this.advance();
    return tok.name;
  }

  parseProgram(): Program {
    const stmts: Stmt[] = [];
    while (this.current !== null) {
      stmts.push(this.parseStatement());
    }
    return stmts;
  }

  private parseStatement(): Stmt {
    const tok = this.current;
    if (tok?.kind === 'ident') {
      this.advance();
      this.expect({ op: '=' });
      const value = this.parseExpression();
      this.expect({ punct: ';' });
      return { kind: 'assign', name: tok.name, value };
    }
    if (tok?.kind !== 'keyword') this.fail('statement');

    switch (tok.keyword) {
      case 'let': {
        this.advance();
        const name = this.expectIdent();
        this.expect({ op: '=' });
        const init = this.parseExpression();
        this.expect({ punct: ';' });
        return { kind: 'let', name, init };
      }
      case 'if': {
        this.advance();
        const cond = this.parseExpression();
        const then = this.parseBlock();
        let otherwise: Stmt[] = [];
        if (matches(this.current, { keyword: 'else' })) {
          this.advance();
          otherwise = this.parseBlock();
        }
        return { kind: 'if', cond, then, else: otherwise };
      }
      case 'while': {
        this.advance();
        const cond = this.parseExpression();
        const body = this.parseBlock();
        return { kind: 'while', cond, body };
      }
      case 'print': {
        this.advance();
        const value = this.parseExpression();
        this.expect({ punct: ';' });
        return { kind: 'print', value };
      }
      case 'else':
        return this.fail('statement');
      default: {
        const _: never = tok.keyword;
        return this.fail('statement');
      }
    }
  }

  private parseBlock(): Stmt[] {
    if (!matches(this.current, { punct: '(' })) {
      return [this.parseStatement()];
    }
    this.advance();
    const stmts: Stmt[] = [];
    while (this.current !== null && !matches(this.current, { punct: ')' })) {
      stmts.push(this.parseStatement());
    }
    this.expect({ punct: ')' });
    return stmts;
  }

  parseExpression(): Expr {
    return this.parseBinary(COMPARISON, () => this.parseBinary(ADDITIVE, () => this.parseBinary(MULTIPLICATIVE, () => this.parsePrimary())));
  }

  // One left-associative precedence tier.
  private parseBinary(table: Partial<Record<Operator, BinaryOp>>, operand: () => Expr): Expr {
    let left = operand();
    for (;;) {
      const tok = this.current;
      const op = tok?.kind === 'op' ? table[tok.op] : undefined;
      if (op === undefined) return left;
      this.advance();
      left = { kind: 'binary', op, left, right: operand() };
    }
  }

  private parsePrimary(): Expr {
    const tok = this.current;
    if (tok?.kind === 'number') {
      this.advance();
      return { kind: 'number', value: tok.value };
    }
    if (tok?.kind === 'ident') {
      this.advance();
      return { kind: 'var', name: tok.name };
    }
    if (matches(tok, { punct: '(' })) {
      this.advance();
      const inner = this.parseExpression();
      this.expect({ punct: ')' });
      return inner;
    }
    return this.fail('expression');
  }
}

export function parse(src: string): Result<Program> {
  try {
    return ok(new Parser(src).parseProgram());
  } catch (error) {
    if (error instanceof ParseError) return { ok: false, error: error.diagnostic };
    if (error instanceof LexError) return failure(error.code, error.explain, error.span);
    throw error;
  }
}
