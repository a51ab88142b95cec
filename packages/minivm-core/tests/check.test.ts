import { describe, it, expect } from 'vitest';
import { checkDeclarations } from '../src/check/declarations.js';
import { parse } from '../src/frontend/parser.js';

function undeclared(src: string): string[] {
  const result = parse(src);
  if (!result.ok) throw new Error(result.error.explain);
  return checkDeclarations(result.value).map(d => d.explain);
}

describe('declaration check', () => {
  it('accepts fully declared programs', () => {
    expect(undeclared('let x = 0; while x < 3 ( print x; x = x + 1; )')).toEqual([]);
  });

  it('reports reads and assignments before let', () => {
    expect(undeclared('print a; b = 1; let a = 2;')).toEqual([
      "variable 'a' read before declaration",
      "variable 'b' assigned before declaration",
    ]);
  });

  it('checks an initializer before its own declaration', () => {
    expect(undeclared('let n = n + 1;')).toEqual(["variable 'n' read before declaration"]);
  });

  it('reports each name once', () => {
    expect(undeclared('print q; print q; q = 1;')).toEqual(["variable 'q' read before declaration"]);
  });

  it('follows program order into nested blocks', () => {
    expect(undeclared('if 1 ( let t = 1; ) else print 0; print t;')).toEqual([]);
    expect(undeclared('while u ( let u = 0; )')).toEqual(["variable 'u' read before declaration"]);
  });
});
