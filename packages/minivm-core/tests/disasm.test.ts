import { describe, it, expect } from 'vitest';
import { DecodeError, disassemble, formatInstruction, verifyBytecode } from '../src/vm/disasm.js';
import { Emitter } from '../src/compiler/emitter.js';
import { OPCODES } from '../src/model/bytecode.js';

describe('disassembler', () => {
  it('decodes operands and offsets', () => {
    const e = new Emitter();
    e.push(-5n);
    e.op('print');
    e.op('halt');
    expect(disassemble(e.finish())).toEqual([
      { offset: 0, op: 'push', operand: -5n },
      { offset: 9, op: 'print' },
      { offset: 10, op: 'halt' },
    ]);
  });

  it('formats one instruction per line', () => {
    expect(formatInstruction({ offset: 9, op: 'push', operand: 42n })).toBe('0009  push 42');
    expect(formatInstruction({ offset: 1234, op: 'jump_if' })).toBe('1234  jump_if');
  });

  it('rejects unknown opcodes', () => {
    expect(() => disassemble(Uint8Array.of(OPCODES.halt, 0x42))).toThrowError(
      new DecodeError(1, 'invalid opcode 0x42'),
    );
  });

  it('rejects a truncated operand', () => {
    expect(() => disassemble(Uint8Array.of(OPCODES.push, 0, 0))).toThrowError('truncated push operand at offset 0');
  });

  it('respects the view of a subarray', () => {
    const e = new Emitter();
    e.op('halt');
    e.push(3n);
    const tail = e.finish().subarray(1);
    expect(disassemble(tail)).toEqual([{ offset: 0, op: 'push', operand: 3n }]);
  });
});

describe('verifyBytecode', () => {
  it('accepts a branch onto an instruction boundary', () => {
    const e = new Emitter();
    e.push(10n);
    e.op('jump');
    e.op('halt');
    expect(verifyBytecode(e.finish())).toMatchObject({ ok: true, messages: [] });
  });

  it('flags a branch into the middle of an operand', () => {
    const e = new Emitter();
    e.push(3n);
    e.op('jump');
    e.op('halt');
    expect(verifyBytecode(e.finish()).messages).toEqual(['jump at 9 targets 3, not an instruction boundary']);
  });

  it('flags a branch whose target is computed', () => {
    const e = new Emitter();
    e.op('jump');
    e.op('halt');
    expect(verifyBytecode(e.finish()).messages).toEqual(['jump at 0 has no literal target']);
  });

  it('flags a missing halt', () => {
    const e = new Emitter();
    e.push(1n);
    expect(verifyBytecode(e.finish()).messages).toEqual(['program does not end with halt']);
  });

  it('reports decode errors instead of throwing', () => {
    expect(verifyBytecode(Uint8Array.of(0x00))).toEqual({
      ok: false,
      instructions: [],
      messages: ['invalid opcode 0x00 at offset 0'],
    });
  });
});
