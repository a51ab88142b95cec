import type { Expr, Program, Stmt } from '../model/ast.js';
import type { Diagnostic } from '../model/result.js';

/**
 * Opt-in strictness pass. The compiler allocates an address for any name it
 * meets; this reports names used (read or assigned) before a `let` for them
 * appears in program order.
 */
export function checkDeclarations(program: Program): Diagnostic[] {
  const declared = new Set<string>();
  const reported = new Set<string>();
  const out: Diagnostic[] = [];

  const use = (name: string, how: 'read' | 'assigned') => {
    if (declared.has(name) || reported.has(name)) return;
    reported.add(name);
    out.push({ code: 'E_CHECK_UNDECLARED', explain: `variable '${name}' ${how} before declaration` });
  };

  const expr = (e: Expr): void => {
    switch (e.kind) {
      case 'number': return;
      case 'var': use(e.name, 'read'); return;
      case 'binary': expr(e.left); expr(e.right); return;
      default: {
        const _: never = e;
      }
    }
  };

  const stmts = (list: readonly Stmt[]): void => {
    for (const s of list) {
      switch (s.kind) {
        case 'let':
          expr(s.init);
          declared.add(s.name);
          break;
        case 'assign':
          expr(s.value);
          use(s.name, 'assigned');
          break;
        case 'if':
          expr(s.cond);
          stmts(s.then);
          stmts(s.else);
          break;
        case 'while':
          expr(s.cond);
          stmts(s.body);
          break;
        case 'print':
          expr(s.value);
          break;
        default: {
          const _: never = s;
        }
      }
    }
  };

  stmts(program);
  return out;
}
