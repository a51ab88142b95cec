import { AsyncLocalStorage } from 'node:async_hooks';
import type { TraceTag } from './tags.js';
import { traceEnabled, traceToStderr } from './flag.js';

const store = new AsyncLocalStorage<TraceTag[]>();

export function withTraceLog<T>(fn: () => T): { result: T; trace: TraceTag[] } {
  if (!traceEnabled()) {
    return { result: fn(), trace: [] };
  }
  const buf: TraceTag[] = [];
  const result = store.run(buf, fn);
  return { result, trace: buf.slice() };
}

export function emit(tag: TraceTag): void {
  if (!traceEnabled()) return;
  if (traceToStderr()) {
    process.stderr.write(JSON.stringify({ ts: Date.now(), tag }) + '\n');
  }
  // outside withTraceLog there is nowhere to collect; stderr mirroring still applies
  store.getStore()?.push(tag);
}
