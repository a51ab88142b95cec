import { VmError } from "@minivm/core";

import { ProgramError } from "./io.js";
import { runCheck } from "./commands/check.js";
import { runCompile } from "./commands/compile.js";
import { runDisasm } from "./commands/disasm.js";
import { runRun } from "./commands/run.js";

export const HELP_TEXT = [
  "Usage: minivm <command> [flags]",
  "",
  "Commands:",
  "  run <file>        compile and execute a program",
  "  compile <file>    write bytecode (--out <file.mvb>)",
  "  disasm <file>     print the instruction listing of source or bytecode",
  "  check <file>      parse and report undeclared variables",
  "",
  "Environment:",
  "  MINIVM_STACK_LIMIT    default operand stack capacity (1024)",
  "  MINIVM_TRACE=1        write execution trace tags (stderr, or run --trace-out <file>)",
  "  MINIVM_TRACE_STDERR=1 write trace tags to stderr as JSON lines",
].join("\n");

const COMMANDS = new Map<string, (args: string[]) => Promise<number>>([
  ["run", runRun],
  ["compile", runCompile],
  ["disasm", runDisasm],
  ["check", runCheck],
]);

/**
 * Dispatches one command and maps failures to exit codes:
 * 1 for errors in the program being processed, 2 for everything else.
 */
export async function runCli(args: string[]): Promise<number> {
  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    process.stdout.write(`${HELP_TEXT}\n`);
    return 0;
  }
  const [command, ...rest] = args;
  const handler = COMMANDS.get(command);
  if (!handler) {
    process.stderr.write(`unknown command: ${command}\n${HELP_TEXT}\n`);
    return 2;
  }
  try {
    return await handler(rest);
  } catch (error) {
    if (error instanceof VmError || error instanceof ProgramError) {
      process.stderr.write(`${error.message}\n`);
      return 1;
    }
    process.stderr.write(`${(error as Error).message}\n`);
    return 2;
  }
}
