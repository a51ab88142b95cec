export function canonicalJsonBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalJson(value));
}

// Sorted keys, no whitespace; bigints render as decimal strings.
export function canonicalJson(v: unknown): string {
  if (v === null) return 'null';
  if (typeof v === 'bigint') return JSON.stringify(v.toString());
  if (typeof v === 'number') {
    if (!Number.isInteger(v)) throw new Error('E_CANON_FLOAT');
    return String(Object.is(v, -0) ? 0 : v);
  }
  if (typeof v === 'string') return JSON.stringify(v);
  if (typeof v === 'boolean') return v ? 'true' : 'false';
  if (Array.isArray(v)) {
    return '[' + v.map(canonicalJson).join(',') + ']';
  }
  if (typeof v === 'object') {
    const entries = Object.entries(v)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, item]) => JSON.stringify(k) + ':' + canonicalJson(item));
    return '{' + entries.join(',') + '}';
  }
  throw new Error('E_CANON_TYPE');
}
