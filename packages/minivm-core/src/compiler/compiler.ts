import type { BinaryOp, Expr, Program, Stmt } from '../model/ast.js';
import type { Op } from '../model/bytecode.js';
import { Emitter } from './emitter.js';

export interface CompiledProgram {
  bytecode: Uint8Array;
  /** Variable name to memory address, in allocation order. */
  variables: ReadonlyMap<string, number>;
}

const DIRECT_OPS: Record<Exclude<BinaryOp, 'gt'>, Op> = {
  add: 'add',
  sub: 'sub',
  mul: 'mul',
  div: 'div',
  eq: 'equal',
  lt: 'less',
};

class Compiler {
  private readonly out = new Emitter();
  private readonly variables = new Map<string, number>();

  private address(name: string): number {
    let addr = this.variables.get(name);
    if (addr === undefined) {
      addr = this.variables.size;
      this.variables.set(name, addr);
    }
    return addr;
  }

  private expr(e: Expr): void {
    switch (e.kind) {
      case 'number':
        this.out.push(e.value);
        break;
      case 'var':
        this.out.push(BigInt(this.address(e.name)));
        this.out.op('load');
        break;
      case 'binary':
        if (e.op === 'gt') {
          // a > b  ==  b < a
          this.expr(e.right);
          this.expr(e.left);
          this.out.op('less');
        } else {
          this.expr(e.left);
          this.expr(e.right);
          this.out.op(DIRECT_OPS[e.op]);
        }
        break;
      default: {
        const _: never = e;
        throw new Error('unknown expression');
      }
    }
  }

  // jump_if branches on non-zero; callers want to branch when cond is zero.
  private branchIfFalse(cond: Expr): number {
    this.expr(cond);
    this.out.push(0n);
    this.out.op('equal');
    const target = this.out.pushPlaceholder();
    this.out.op('jump_if');
    return target;
  }

  private store(name: string, value: Expr): void {
    const addr = this.address(name);
    this.expr(value);
    this.out.push(BigInt(addr));
    this.out.op('store');
  }

  private stmt(s: Stmt): void {
    switch (s.kind) {
      case 'let':
        this.store(s.name, s.init);
        break;
      case 'assign':
        this.store(s.name, s.value);
        break;
      case 'if': {
        const toElse = this.branchIfFalse(s.cond);
        this.block(s.then);
        const toEnd = this.out.pushPlaceholder();
        this.out.op('jump');
        this.out.patch(toElse, BigInt(this.out.offset));
        this.block(s.else);
        this.out.patch(toEnd, BigInt(this.out.offset));
        break;
      }
      case 'while': {
        const start = this.out.offset;
        const toExit = this.branchIfFalse(s.cond);
        this.block(s.body);
        this.out.push(BigInt(start));
        this.out.op('jump');
        this.out.patch(toExit, BigInt(this.out.offset));
        break;
      }
      case 'print':
        this.expr(s.value);
        this.out.op('print');
        break;
      default: {
        const _: never = s;
        throw new Error('unknown statement');
      }
    }
  }

  private block(stmts: readonly Stmt[]): void {
    for (const s of stmts) this.stmt(s);
  }

  program(stmts: Program): CompiledProgram {
    this.block(stmts);
    this.out.op('halt');
    return { bytecode: this.out.finish(), variables: new Map(this.variables) };
  }
}

export function compile(stmts: Program): CompiledProgram {
  return new Compiler().program(stmts);
}
