export * as model from './model/index.js';
export * as trace from './trace/index.js';
export { Lexer, LexError, tokenize } from './frontend/lexer.js';
export type { LexErrorCode } from './frontend/lexer.js';
export { Parser, parse } from './frontend/parser.js';
export { compile } from './compiler/compiler.js';
export type { CompiledProgram } from './compiler/compiler.js';
export { Emitter } from './compiler/emitter.js';
export * from './vm/index.js';
export { checkDeclarations } from './check/declarations.js';
export * from './canon/index.js';
export { compileSource, runSource } from './pipeline.js';
export type { CompileOptions, CompiledSource, RunOptions } from './pipeline.js';
export {
  DEFAULT_STACK_LIMIT,
  parseRunConfig,
  resolveRunConfig,
  runConfigSchema,
} from './config.js';
export type { RunConfig, ResolvedRunConfig } from './config.js';
export { formatDiagnostic } from './model/result.js';
export type { Diagnostic, DiagnosticCode, Result } from './model/result.js';
