import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { VM, canonicalJson, resolveRunConfig, trace, type RunConfig } from "@minivm/core";

import { parseFlagArgs, parsePositiveInt, singleFile } from "../args.js";
import { compileFile, loadConfigFile } from "../io.js";

export const RUN_USAGE =
  "Usage: minivm run <file> [--stack-limit <n>] [--max-steps <n>] [--config <file>] [--trace-out <file>] [--strict]";

/**
 * Collected tags go to `--trace-out` when given, otherwise to stderr unless
 * MINIVM_TRACE_STDERR already mirrored them there.
 */
async function writeTrace(tags: readonly trace.TraceTag[], out: string | undefined): Promise<void> {
  if (tags.length === 0) return;
  const lines = tags.map((tag) => `${canonicalJson(tag)}\n`).join("");
  if (out) {
    await mkdir(dirname(out), { recursive: true });
    await writeFile(out, lines, "utf-8");
  } else if (!trace.traceToStderr()) {
    process.stderr.write(lines);
  }
}

/** Compiles and executes a program. Exit 0 on halt, 1 on a compile or runtime error. */
export async function runRun(args: string[]): Promise<number> {
  const parsed = parseFlagArgs(
    args,
    ["--stack-limit", "--max-steps", "--config", "--trace-out"],
    ["--strict", "--help", "-h"],
  );
  if (parsed.toggles.has("--help") || parsed.toggles.has("-h")) {
    process.stdout.write(`${RUN_USAGE}\n`);
    return 0;
  }
  const file = singleFile(parsed, RUN_USAGE);

  const layers: RunConfig[] = [];
  const configPath = parsed.values["--config"];
  if (configPath) {
    layers.push(await loadConfigFile(configPath));
  }
  layers.push({
    stackLimit: parsePositiveInt("--stack-limit", parsed.values["--stack-limit"]),
    maxSteps: parsePositiveInt("--max-steps", parsed.values["--max-steps"]),
    strict: parsed.toggles.has("--strict") ? true : undefined,
  });
  const config = resolveRunConfig(layers);

  const { bytecode } = await compileFile(file, { strict: config.strict });
  const vm = new VM(bytecode, config.stackLimit, { maxSteps: config.maxSteps });
  // a faulting run still has a trace worth writing before the fault is reported
  const { result: fault, trace: tags } = trace.withTraceLog((): unknown => {
    try {
      vm.run();
      return undefined;
    } catch (error) {
      return error;
    }
  });
  await writeTrace(tags, parsed.values["--trace-out"]);
  if (fault !== undefined) throw fault;
  return 0;
}
