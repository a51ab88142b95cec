export const OPCODES = {
  push: 0x01,
  pop: 0x02,
  add: 0x03,
  sub: 0x04,
  mul: 0x05,
  div: 0x06,
  load: 0x07,
  store: 0x08,
  jump: 0x09,
  jump_if: 0x0a,
  equal: 0x0b,
  less: 0x0c,
  print: 0x0d,
  less_equal: 0x0e,
  greater_equal: 0x0f,
  halt: 0xff,
} as const;

export type Op = keyof typeof OPCODES;
export type OpcodeByte = (typeof OPCODES)[Op];

/** Width of the little-endian i64 immediate that follows `push`. */
export const OPERAND_BYTES = 8;

export const ALL_OPS: readonly Op[] = [
  'push', 'pop', 'add', 'sub', 'mul', 'div', 'load', 'store',
  'jump', 'jump_if', 'equal', 'less', 'print', 'less_equal', 'greater_equal', 'halt',
];

const BY_BYTE = new Map<number, Op>(ALL_OPS.map(op => [OPCODES[op], op]));

export function opFromByte(byte: number): Op | undefined {
  return BY_BYTE.get(byte);
}

export function hasOperand(op: Op): boolean {
  return op === 'push';
}

export function instructionSize(op: Op): number {
  return hasOperand(op) ? 1 + OPERAND_BYTES : 1;
}

export interface Instruction {
  offset: number;
  op: Op;
  operand?: bigint;
}

export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;

export function wrapI64(v: bigint): bigint {
  return BigInt.asIntN(64, v);
}
