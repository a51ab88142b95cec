import { readFile } from "node:fs/promises";
import path from "node:path";

import {
  compileSource,
  formatDiagnostic,
  parseRunConfig,
  type CompileOptions,
  type CompiledSource,
  type RunConfig,
} from "@minivm/core";

export const BYTECODE_EXT = ".mvb";

export class ProgramError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProgramError";
  }
}

export async function readSource(file: string): Promise<string> {
  return readFile(file, "utf-8");
}

export async function compileFile(file: string, options: CompileOptions = {}): Promise<CompiledSource> {
  const result = compileSource(await readSource(file), options);
  if (!result.ok) {
    throw new ProgramError(`${file}: ${formatDiagnostic(result.error)}`);
  }
  return result.value;
}

/** Raw bytecode for `.mvb` files, compiled output for anything else. */
export async function loadBytecode(file: string): Promise<Uint8Array> {
  if (path.extname(file) === BYTECODE_EXT) {
    return new Uint8Array(await readFile(file));
  }
  return (await compileFile(file)).bytecode;
}

export async function loadConfigFile(file: string): Promise<RunConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf-8"));
  } catch (error) {
    throw new Error(`E_CONFIG cannot read ${file}: ${(error as Error).message}`);
  }
  return parseRunConfig(raw);
}
