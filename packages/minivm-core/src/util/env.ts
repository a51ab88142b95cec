// Environment lookups for the runtime. Values are read on demand; callers cache.
export function readEnvFlag(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const v = (env[name] || '').toLowerCase();
  return v === '1' || v === 'true';
}

export function readEnvInt(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`E_CONFIG ${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}
