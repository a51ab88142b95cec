export type VmErrorCode =
  | 'E_VM_STACK_UNDERFLOW'
  | 'E_VM_STACK_OVERFLOW'
  | 'E_VM_INVALID_OPCODE'
  | 'E_VM_OUT_OF_MEMORY'
  | 'E_VM_DIVISION_BY_ZERO'
  | 'E_VM_TRUNCATED'
  | 'E_VM_STEP_LIMIT';

export interface VmErrorDetails {
  /** Offset of the instruction that faulted. */
  pc: number;
  opcode?: number;
  address?: bigint;
}

const MESSAGES: Record<VmErrorCode, (d: VmErrorDetails) => string> = {
  E_VM_STACK_UNDERFLOW: () => 'stack underflow',
  E_VM_STACK_OVERFLOW: () => 'stack overflow',
  E_VM_INVALID_OPCODE: d => `invalid opcode: 0x${(d.opcode ?? 0).toString(16).padStart(2, '0')}`,
  E_VM_OUT_OF_MEMORY: d => `out of memory at address: ${d.address ?? '?'}`,
  E_VM_DIVISION_BY_ZERO: () => 'division by zero',
  E_VM_TRUNCATED: () => 'program ended without halt',
  E_VM_STEP_LIMIT: () => 'step limit exceeded',
};

export class VmError extends Error {
  readonly code: VmErrorCode;
  readonly details: VmErrorDetails;

  constructor(code: VmErrorCode, details: VmErrorDetails) {
    super(`${code}: ${MESSAGES[code](details)} (pc=${details.pc})`);
    this.name = 'VmError';
    this.code = code;
    this.details = details;
  }
}
