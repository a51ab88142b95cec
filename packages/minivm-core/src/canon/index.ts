export { canonicalJson, canonicalJsonBytes } from './json.js';
export { digestSnapshot, snapshotState, stateDigest } from './state.js';
export type { StateSnapshot } from './state.js';
