export { VM } from './interpreter.js';
export type { VmOptions, VmState, OutputSink } from './interpreter.js';
export { VmError } from './errors.js';
export type { VmErrorCode, VmErrorDetails } from './errors.js';
export { DecodeError, disassemble, formatInstruction, formatListing, verifyBytecode } from './disasm.js';
export type { VerifyReport } from './disasm.js';
