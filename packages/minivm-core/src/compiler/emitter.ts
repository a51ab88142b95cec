import { OPCODES, OPERAND_BYTES, type Op } from '../model/bytecode.js';

/**
 * Growable byte arena. Forward jump targets are emitted as placeholder
 * `push` operands and overwritten through {@link patch} once known.
 */
export class Emitter {
  private buf = new Uint8Array(256);
  private view = new DataView(this.buf.buffer);
  private len = 0;

  get offset(): number {
    return this.len;
  }

  private reserve(n: number): void {
    if (this.len + n <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < this.len + n) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }

  op(op: Op): void {
    this.reserve(1);
    this.buf[this.len] = OPCODES[op];
    this.len += 1;
  }

  push(value: bigint): void {
    this.op('push');
    this.reserve(OPERAND_BYTES);
    this.view.setBigInt64(this.len, value, true);
    this.len += OPERAND_BYTES;
  }

  /** Emits `push 0` and returns the offset of its operand for {@link patch}. */
  pushPlaceholder(): number {
    this.push(0n);
    return this.len - OPERAND_BYTES;
  }

  patch(operandOffset: number, value: bigint): void {
    if (operandOffset < 0 || operandOffset + OPERAND_BYTES > this.len) {
      throw new Error(`patch offset out of range: ${operandOffset}`);
    }
    this.view.setBigInt64(operandOffset, value, true);
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}
