import type { Op } from '../model/bytecode.js';
import type { VmErrorCode } from '../vm/errors.js';

export interface Step {
  kind: 'Step';
  pc: number;
  op: Op;
  depth: number;
}

export interface Output {
  kind: 'Output';
  // decimal, so tags stay JSON-serializable
  value: string;
}

export interface Halt {
  kind: 'Halt';
  pc: number;
  steps: number;
}

export interface Fault {
  kind: 'Fault';
  code: VmErrorCode;
  pc: number;
}

export type TraceTag = Step | Output | Halt | Fault;
