import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { parseFlagArgs, singleFile, UsageError } from "../args.js";
import { compileFile } from "../io.js";

export const COMPILE_USAGE = "Usage: minivm compile <file> --out <file.mvb> [--strict]";

export async function runCompile(args: string[]): Promise<number> {
  const parsed = parseFlagArgs(args, ["--out"], ["--strict", "--help", "-h"]);
  if (parsed.toggles.has("--help") || parsed.toggles.has("-h")) {
    process.stdout.write(`${COMPILE_USAGE}\n`);
    return 0;
  }
  const file = singleFile(parsed, COMPILE_USAGE);
  const out = parsed.values["--out"];
  if (!out) {
    throw new UsageError("--out <file> is required");
  }
  const { bytecode } = await compileFile(file, { strict: parsed.toggles.has("--strict") });
  await mkdir(dirname(out), { recursive: true });
  await writeFile(out, bytecode);
  process.stdout.write(`wrote ${bytecode.length} bytes to ${out}\n`);
  return 0;
}
