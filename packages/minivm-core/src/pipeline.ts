import type { Program } from './model/ast.js';
import { mapValue, type Result } from './model/result.js';
import { parse } from './frontend/parser.js';
import { compile, type CompiledProgram } from './compiler/compiler.js';
import { checkDeclarations } from './check/declarations.js';
import { VM, type VmOptions } from './vm/interpreter.js';
import { DEFAULT_STACK_LIMIT } from './config.js';

export interface CompileOptions {
  /** Reject uses of names that were never declared with `let`. */
  strict?: boolean;
}

export interface CompiledSource extends CompiledProgram {
  program: Program;
}

export function compileSource(src: string, options: CompileOptions = {}): Result<CompiledSource> {
  const parsed = parse(src);
  if (!parsed.ok) return parsed;
  if (options.strict) {
    const [first] = checkDeclarations(parsed.value);
    if (first) return { ok: false, error: first };
  }
  return mapValue(parsed, program => ({ program, ...compile(program) }));
}

export interface RunOptions extends CompileOptions, VmOptions {
  stackLimit?: number;
}

/**
 * Compiles and runs `src` to completion. Compile failures come back as a
 * result; VM faults propagate as {@link VmError}.
 */
export function runSource(src: string, options: RunOptions = {}): Result<VM> {
  const compiled = compileSource(src, options);
  return mapValue(compiled, ({ bytecode }) => {
    const vm = new VM(bytecode, options.stackLimit ?? DEFAULT_STACK_LIMIT, {
      maxSteps: options.maxSteps,
      output: options.output,
    });
    return vm.run();
  });
}
