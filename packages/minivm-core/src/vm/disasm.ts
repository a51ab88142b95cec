import { OPERAND_BYTES, opFromByte, type Instruction } from '../model/bytecode.js';

export class DecodeError extends Error {
  constructor(readonly offset: number, message: string) {
    super(`${message} at offset ${offset}`);
    this.name = 'DecodeError';
  }
}

/** Decodes a bytecode buffer opcode by opcode. */
export function disassemble(bytecode: Uint8Array): Instruction[] {
  const view = new DataView(bytecode.buffer, bytecode.byteOffset, bytecode.byteLength);
  const out: Instruction[] = [];
  let pc = 0;
  while (pc < bytecode.length) {
    const byte = bytecode[pc];
    const op = opFromByte(byte);
    if (op === undefined) {
      throw new DecodeError(pc, `invalid opcode 0x${byte.toString(16).padStart(2, '0')}`);
    }
    if (op === 'push') {
      if (pc + 1 + OPERAND_BYTES > bytecode.length) {
        throw new DecodeError(pc, 'truncated push operand');
      }
      out.push({ offset: pc, op, operand: view.getBigInt64(pc + 1, true) });
      pc += 1 + OPERAND_BYTES;
    } else {
      out.push({ offset: pc, op });
      pc += 1;
    }
  }
  return out;
}

export function formatInstruction(ins: Instruction): string {
  const head = `${String(ins.offset).padStart(4, '0')}  ${ins.op}`;
  return ins.operand === undefined ? head : `${head} ${ins.operand}`;
}

export function formatListing(instrs: readonly Instruction[]): string {
  return instrs.map(formatInstruction).join('\n');
}

export interface VerifyReport {
  ok: boolean;
  instructions: Instruction[];
  messages: string[];
}

/**
 * Structural check of a compiled program: it must decode cleanly, end in
 * `halt`, and every `push` feeding a branch must name an instruction
 * boundary inside the program.
 */
export function verifyBytecode(bytecode: Uint8Array): VerifyReport {
  let instructions: Instruction[];
  try {
    instructions = disassemble(bytecode);
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, instructions: [], messages: [error.message] };
    }
    throw error;
  }

  const messages: string[] = [];
  const boundaries = new Set(instructions.map(ins => ins.offset));
  const last = instructions.at(-1);
  if (last?.op !== 'halt') {
    messages.push('program does not end with halt');
  }
  instructions.forEach((ins, i) => {
    if (ins.op !== 'jump' && ins.op !== 'jump_if') return;
    const prev = instructions[i - 1];
    if (prev?.op !== 'push' || prev.operand === undefined) {
      messages.push(`${ins.op} at ${ins.offset} has no literal target`);
      return;
    }
    const target = prev.operand;
    if (target < 0n || target > BigInt(Number.MAX_SAFE_INTEGER) || !boundaries.has(Number(target))) {
      messages.push(`${ins.op} at ${ins.offset} targets ${target}, not an instruction boundary`);
    }
  });
  return { ok: messages.length === 0, instructions, messages };
}
