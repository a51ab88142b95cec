import type { Span } from './token.js';

export type DiagnosticCode =
  | 'E_LEX_UNEXPECTED_CHAR'
  | 'E_LEX_INT_OVERFLOW'
  | 'E_PARSE_UNEXPECTED_TOKEN'
  | 'E_PARSE_UNEXPECTED_EOF'
  | 'E_CHECK_UNDECLARED';

export interface Diagnostic {
  code: DiagnosticCode;
  explain: string;
  span?: Span;
}

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: Diagnostic;
}

export type Result<T> = Ok<T> | Failure;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const failure = (code: DiagnosticCode, explain: string, span?: Span): Failure => ({
  ok: false,
  error: span === undefined ? { code, explain } : { code, explain, span },
});

export const mapValue = <A, B>(result: Result<A>, mapper: (value: A) => B): Result<B> => {
  if (!result.ok) return result;
  return ok(mapper(result.value));
};

export const formatDiagnostic = (d: Diagnostic): string => {
  const base = `${d.code}: ${d.explain}`;
  if (!d.span) return base;
  return `${base} (${d.span.line}:${d.span.column})`;
};
