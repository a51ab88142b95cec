export type BinaryOp = 'add' | 'sub' | 'mul' | 'div' | 'eq' | 'lt' | 'gt';

export type Expr =
  | { kind: 'number', value: bigint }
  | { kind: 'var', name: string }
  | { kind: 'binary', op: BinaryOp, left: Expr, right: Expr };

export type Stmt =
  | { kind: 'let', name: string, init: Expr }
  | { kind: 'assign', name: string, value: Expr }
  | { kind: 'if', cond: Expr, then: Stmt[], else: Stmt[] }
  | { kind: 'while', cond: Expr, body: Stmt[] }
  | { kind: 'print', value: Expr };

export type Program = Stmt[];

export const num = (value: bigint | number): Expr => ({ kind: 'number', value: BigInt(value) });
export const ref = (name: string): Expr => ({ kind: 'var', name });
export const bin = (op: BinaryOp, left: Expr, right: Expr): Expr => ({ kind: 'binary', op, left, right });
