import { describe, it, expect } from 'vitest';
import { VM, VmError } from '../src/vm/index.js';
import { Emitter } from '../src/compiler/emitter.js';
import { I64_MAX, I64_MIN, OPCODES, type Op } from '../src/model/bytecode.js';

type Asm = Op | ['push', bigint | number];

function assemble(...code: Asm[]): Uint8Array {
  const e = new Emitter();
  for (const ins of code) {
    if (typeof ins === 'string') e.op(ins);
    else e.push(BigInt(ins[1]));
  }
  return e.finish();
}

const push = (v: bigint | number): Asm => ['push', v];

function quietVm(program: Uint8Array, stackLimit = 100, maxSteps?: number): { vm: VM; lines: string[] } {
  const lines: string[] = [];
  const vm = new VM(program, stackLimit, { maxSteps, output: line => lines.push(line) });
  return { vm, lines };
}

function faultOf(fn: () => unknown): VmError {
  try {
    fn();
  } catch (error) {
    if (error instanceof VmError) return error;
    throw error;
  }
  throw new Error('expected a VmError');
}

describe('VM', () => {
  it('runs a halt-only program', () => {
    const { vm } = quietVm(assemble('halt'));
    vm.run();
    expect(vm.state).toBe('halted');
    expect(vm.stack).toEqual([]);
  });

  it('push and pop', () => {
    const { vm } = quietVm(assemble(push(42), push(123), 'pop', 'halt'));
    expect(vm.run().stack).toEqual([42n]);
  });

  it('arithmetic', () => {
    const { vm } = quietVm(assemble(push(10), push(5), 'add', push(2), 'mul', 'halt'));
    expect(vm.run().stack).toEqual([30n]);
  });

  it('sub and div keep operand order; div truncates toward zero', () => {
    const { vm } = quietVm(assemble(push(10), push(3), 'sub', push(-7), push(2), 'div', 'halt'));
    expect(vm.run().stack).toEqual([7n, -3n]);
  });

  it('wraps on 64-bit overflow', () => {
    const { vm } = quietVm(assemble(push(I64_MAX), push(1), 'add', push(I64_MIN), push(-1), 'div', 'halt'));
    expect(vm.run().stack).toEqual([I64_MIN, I64_MIN]);
  });

  it('comparisons push 1 or 0', () => {
    const { vm } = quietVm(assemble(
      push(2), push(2), 'equal',
      push(1), push(2), 'less',
      push(2), push(1), 'less',
      push(2), push(2), 'less_equal',
      push(1), push(2), 'greater_equal',
      'halt',
    ));
    expect(vm.run().stack).toEqual([1n, 1n, 0n, 1n, 0n]);
  });

  it('store takes the address from the top and the value beneath it', () => {
    const { vm } = quietVm(assemble(push(42), push(3), 'store', push(3), 'load', push(9), 'load', 'halt'));
    vm.run();
    expect([...vm.memory]).toEqual([[3n, 42n]]);
    expect(vm.stack).toEqual([42n, 0n]);
  });

  it('prints in execution order', () => {
    const { vm, lines } = quietVm(assemble(push(5), 'print', push(-1), 'print', 'halt'));
    vm.run();
    expect(lines).toEqual(['Output: 5', 'Output: -1']);
    expect(vm.outputs).toEqual([5n, -1n]);
  });

  it('jump pops its target', () => {
    // 0 push 19, 9 jump, 10 push 1, 19 halt
    const { vm } = quietVm(assemble(push(19), 'jump', push(1), 'halt'));
    expect(vm.run().stack).toEqual([]);
  });

  it('jump_if branches only on non-zero', () => {
    const taken = quietVm(assemble(push(1), push(28), 'jump_if', push(7), 'halt'));
    expect(taken.vm.run().stack).toEqual([]);
    const skipped = quietVm(assemble(push(0), push(28), 'jump_if', push(7), 'halt'));
    expect(skipped.vm.run().stack).toEqual([7n]);
  });

  it('does not bounds-check an untaken branch', () => {
    const { vm } = quietVm(assemble(push(0), push(1000), 'jump_if', 'halt'));
    expect(vm.run().state).toBe('halted');
  });

  it('single-steps', () => {
    const { vm } = quietVm(assemble(push(1), 'halt'));
    expect(vm.state).toBe('ready');
    expect(vm.step()).toBe(true);
    expect(vm.state).toBe('running');
    expect(vm.pc).toBe(9);
    expect(vm.step()).toBe(false);
    expect(vm.state).toBe('halted');
    expect(vm.step()).toBe(false);
    expect(vm.steps).toBe(2);
  });

  it('validates its stack limit', () => {
    expect(() => new VM(assemble('halt'), 0)).toThrowError('E_CONFIG');
    expect(() => new VM(assemble('halt'), 1.5)).toThrowError('E_CONFIG');
  });

  it('copies the program it is given', () => {
    const program = assemble(push(1), 'halt');
    const { vm } = quietVm(program);
    program[1] = 9;
    expect(vm.run().stack).toEqual([1n]);
  });
});

describe('VM faults', () => {
  it('stack underflow', () => {
    const { vm } = quietVm(assemble(push(1), 'add', 'halt'));
    const err = faultOf(() => vm.run());
    expect(err.code).toBe('E_VM_STACK_UNDERFLOW');
    expect(err.details.pc).toBe(9);
  });

  it('stack overflow leaves the stack at its pre-push contents', () => {
    const { vm } = quietVm(assemble(push(1), push(2), push(3), 'halt'), 2);
    const err = faultOf(() => vm.run());
    expect(err.code).toBe('E_VM_STACK_OVERFLOW');
    expect(vm.stack).toEqual([1n, 2n]);
    expect(vm.state).toBe('faulted');
  });

  it('division by zero pops only its two operands', () => {
    const { vm } = quietVm(assemble(push(9), push(7), push(0), 'div', 'halt'));
    const err = faultOf(() => vm.run());
    expect(err.code).toBe('E_VM_DIVISION_BY_ZERO');
    expect(err.message).toBe('E_VM_DIVISION_BY_ZERO: division by zero (pc=27)');
    expect(vm.stack).toEqual([9n]);
  });

  it('invalid opcode carries the byte', () => {
    const { vm } = quietVm(Uint8Array.of(OPCODES.pop + 0x20));
    const err = faultOf(() => vm.run());
    expect(err.code).toBe('E_VM_INVALID_OPCODE');
    expect(err.details.opcode).toBe(0x22);
    expect(err.message).toBe('E_VM_INVALID_OPCODE: invalid opcode: 0x22 (pc=0)');
  });

  it('jump outside the program carries the address', () => {
    const { vm } = quietVm(assemble(push(100), 'jump', 'halt'));
    const err = faultOf(() => vm.run());
    expect(err.code).toBe('E_VM_OUT_OF_MEMORY');
    expect(err.details.address).toBe(100n);
  });

  it('jump to a negative target is out of memory', () => {
    const { vm } = quietVm(assemble(push(1), push(-1), 'jump_if', 'halt'));
    expect(faultOf(() => vm.run()).details.address).toBe(-1n);
  });

  it('negative memory addresses are rejected', () => {
    const { vm } = quietVm(assemble(push(-4), 'load', 'halt'));
    const err = faultOf(() => vm.run());
    expect(err.code).toBe('E_VM_OUT_OF_MEMORY');
    expect(err.details.address).toBe(-4n);
  });

  it('running off the end without halt', () => {
    const { vm } = quietVm(assemble(push(1)));
    expect(faultOf(() => vm.run()).code).toBe('E_VM_TRUNCATED');
    expect(vm.stack).toEqual([1n]);
  });

  it('truncated push operand', () => {
    const { vm } = quietVm(Uint8Array.of(OPCODES.push, 1, 2));
    expect(faultOf(() => vm.run()).code).toBe('E_VM_TRUNCATED');
  });

  it('step budget', () => {
    // 0 push 0, 9 jump: spins forever
    const { vm } = quietVm(assemble(push(0), 'jump'), 100, 10);
    expect(faultOf(() => vm.run()).code).toBe('E_VM_STEP_LIMIT');
    expect(vm.steps).toBe(10);
  });

  it('a faulted VM rethrows the same error', () => {
    const { vm } = quietVm(assemble('pop', 'halt'));
    const first = faultOf(() => vm.run());
    expect(faultOf(() => vm.step())).toBe(first);
  });
});
