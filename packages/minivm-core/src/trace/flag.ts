import { readEnvFlag } from '../util/env.js';

let cached: { enabled: boolean; stderr: boolean } | undefined;

function flags(): { enabled: boolean; stderr: boolean } {
  if (cached === undefined) {
    cached = {
      enabled: readEnvFlag('MINIVM_TRACE'),
      stderr: readEnvFlag('MINIVM_TRACE_STDERR'),
    };
  }
  return cached;
}

export function traceEnabled(): boolean {
  return flags().enabled;
}

export function traceToStderr(): boolean {
  return flags().stderr;
}

export function resetTraceFlagForTest(): void {
  cached = undefined;
}
