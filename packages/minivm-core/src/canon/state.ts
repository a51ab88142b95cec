import type { VM, VmState } from '../vm/interpreter.js';
import { canonicalJsonBytes } from './json.js';
import { blake3 } from '@noble/hashes/blake3.js';
import { bytesToHex } from '@noble/hashes/utils.js';

export interface StateSnapshot {
  state: VmState;
  pc: number;
  stack: string[];
  /** [address, value] pairs ordered by address. */
  memory: [string, string][];
  outputs: string[];
}

export function snapshotState(vm: VM): StateSnapshot {
  const memory = [...vm.memory.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([addr, value]): [string, string] => [addr.toString(), value.toString()]);
  return {
    state: vm.state,
    pc: vm.pc,
    stack: vm.stack.map(v => v.toString()),
    memory,
    outputs: vm.outputs.map(v => v.toString()),
  };
}

/** blake3 over the canonical JSON of a snapshot, as lowercase hex. */
export function digestSnapshot(snapshot: StateSnapshot): string {
  return bytesToHex(blake3(canonicalJsonBytes(snapshot)));
}

export function stateDigest(vm: VM): string {
  return digestSnapshot(snapshotState(vm));
}
