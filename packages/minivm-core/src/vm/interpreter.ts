import { OPERAND_BYTES, opFromByte, wrapI64 } from '../model/bytecode.js';
import { DEFAULT_STACK_LIMIT } from '../config.js';
import { emit } from '../trace/log.js';
import { VmError, type VmErrorCode, type VmErrorDetails } from './errors.js';

export type VmState = 'ready' | 'running' | 'halted' | 'faulted';

export type OutputSink = (line: string) => void;

export interface VmOptions {
  /** Abort with E_VM_STEP_LIMIT after this many instructions. Unlimited when absent. */
  maxSteps?: number;
  /** Receives each printed line without its trailing newline. Defaults to stdout. */
  output?: OutputSink;
}

const stdoutSink: OutputSink = line => {
  process.stdout.write(`${line}\n`);
};

const bool = (b: boolean): bigint => (b ? 1n : 0n);

export class VM {
  private readonly program: Uint8Array;
  private readonly view: DataView;
  private readonly stackLimit: number;
  private readonly maxSteps: number | undefined;
  private readonly sink: OutputSink;

  private _pc = 0;
  private _state: VmState = 'ready';
  private _steps = 0;
  private readonly _stack: bigint[] = [];
  private readonly _memory = new Map<bigint, bigint>();
  private readonly _outputs: bigint[] = [];
  private fault: VmError | undefined;
  // offset of the instruction currently executing
  private at = 0;

  constructor(program: Uint8Array, stackLimit: number = DEFAULT_STACK_LIMIT, options: VmOptions = {}) {
    if (!Number.isInteger(stackLimit) || stackLimit < 1) {
      throw new Error(`E_CONFIG stack limit must be a positive integer, got ${stackLimit}`);
    }
    if (options.maxSteps !== undefined && (!Number.isInteger(options.maxSteps) || options.maxSteps < 1)) {
      throw new Error(`E_CONFIG max steps must be a positive integer, got ${options.maxSteps}`);
    }
    this.program = program.slice();
    this.view = new DataView(this.program.buffer);
    this.stackLimit = stackLimit;
    this.maxSteps = options.maxSteps;
    this.sink = options.output ?? stdoutSink;
  }

  get pc(): number { return this._pc; }
  get state(): VmState { return this._state; }
  get steps(): number { return this._steps; }
  get stack(): readonly bigint[] { return this._stack.slice(); }
  get memory(): ReadonlyMap<bigint, bigint> { return new Map(this._memory); }
  get outputs(): readonly bigint[] { return this._outputs.slice(); }

  private raise(code: VmErrorCode, extra: Omit<VmErrorDetails, 'pc'> = {}): never {
    const error = new VmError(code, { pc: this.at, ...extra });
    this.fault = error;
    this._state = 'faulted';
    emit({ kind: 'Fault', code, pc: this.at });
    throw error;
  }

  private push(value: bigint): void {
    if (this._stack.length >= this.stackLimit) this.raise('E_VM_STACK_OVERFLOW');
    this._stack.push(value);
  }

  private pop(): bigint {
    const value = this._stack.pop();
    if (value === undefined) return this.raise('E_VM_STACK_UNDERFLOW');
    return value;
  }

  private binary(fn: (a: bigint, b: bigint) => bigint): void {
    const b = this.pop();
    const a = this.pop();
    this.push(fn(a, b));
  }

  private readOperand(opcode: number): bigint {
    if (this._pc + OPERAND_BYTES > this.program.length) {
      return this.raise('E_VM_TRUNCATED', { opcode });
    }
    const value = this.view.getBigInt64(this._pc, true);
    this._pc += OPERAND_BYTES;
    return value;
  }

  private jumpTo(target: bigint): void {
    if (target < 0n || target >= BigInt(this.program.length)) {
      this.raise('E_VM_OUT_OF_MEMORY', { address: target });
    }
    this._pc = Number(target);
  }

  private address(): bigint {
    const addr = this.pop();
    if (addr < 0n) this.raise('E_VM_OUT_OF_MEMORY', { address: addr });
    return addr;
  }

  /**
   * Executes one instruction. Returns false once the program has halted.
   * A VM that has faulted rethrows its error.
   */
  step(): boolean {
    if (this._state === 'halted') return false;
    if (this.fault) throw this.fault;

    this._state = 'running';
    this.at = this._pc;
    if (this.maxSteps !== undefined && this._steps >= this.maxSteps) {
      this.raise('E_VM_STEP_LIMIT');
    }
    if (this._pc >= this.program.length) this.raise('E_VM_TRUNCATED');

    const opcode = this.program[this._pc];
    const op = opFromByte(opcode);
    if (op === undefined) this.raise('E_VM_INVALID_OPCODE', { opcode });
    this._pc += 1;
    this._steps += 1;
    emit({ kind: 'Step', pc: this.at, op, depth: this._stack.length });

    switch (op) {
      case 'push': this.push(this.readOperand(opcode)); break;
      case 'pop': this.pop(); break;
      case 'add': this.binary((a, b) => wrapI64(a + b)); break;
      case 'sub': this.binary((a, b) => wrapI64(a - b)); break;
      case 'mul': this.binary((a, b) => wrapI64(a * b)); break;
      case 'div': {
        const b = this.pop();
        const a = this.pop();
        if (b === 0n) this.raise('E_VM_DIVISION_BY_ZERO');
        this.push(wrapI64(a / b));
        break;
      }
      case 'load': {
        const addr = this.address();
        this.push(this._memory.get(addr) ?? 0n);
        break;
      }
      case 'store': {
        // stack: ..., value, address
        const addr = this.address();
        const value = this.pop();
        this._memory.set(addr, value);
        break;
      }
      case 'jump': this.jumpTo(this.pop()); break;
      case 'jump_if': {
        const target = this.pop();
        const cond = this.pop();
        if (cond !== 0n) this.jumpTo(target);
        break;
      }
      case 'equal': this.binary((a, b) => bool(a === b)); break;
      case 'less': this.binary((a, b) => bool(a < b)); break;
      case 'less_equal': this.binary((a, b) => bool(a <= b)); break;
      case 'greater_equal': this.binary((a, b) => bool(a >= b)); break;
      case 'print': {
        const value = this.pop();
        this._outputs.push(value);
        this.sink(`Output: ${value}`);
        emit({ kind: 'Output', value: value.toString() });
        break;
      }
      case 'halt':
        this._state = 'halted';
        emit({ kind: 'Halt', pc: this.at, steps: this._steps });
        return false;
      default: {
        const _: never = op;
        this.raise('E_VM_INVALID_OPCODE', { opcode });
      }
    }
    return true;
  }

  run(): this {
    while (this.step()) {
      // keep stepping
    }
    return this;
  }
}
