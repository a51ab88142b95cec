export * from './tags.js';
export { withTraceLog, emit } from './log.js';
export { traceEnabled, traceToStderr, resetTraceFlagForTest } from './flag.js';
