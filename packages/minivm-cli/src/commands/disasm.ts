import { formatListing, verifyBytecode } from "@minivm/core";

import { parseFlagArgs, singleFile } from "../args.js";
import { loadBytecode } from "../io.js";

export const DISASM_USAGE = "Usage: minivm disasm <file.mvs|file.mvb>";

/** Prints the instruction listing; exits 1 when the bytecode fails verification. */
export async function runDisasm(args: string[]): Promise<number> {
  const parsed = parseFlagArgs(args, [], ["--help", "-h"]);
  if (parsed.toggles.has("--help") || parsed.toggles.has("-h")) {
    process.stdout.write(`${DISASM_USAGE}\n`);
    return 0;
  }
  const file = singleFile(parsed, DISASM_USAGE);
  const report = verifyBytecode(await loadBytecode(file));
  if (report.instructions.length > 0) {
    process.stdout.write(`${formatListing(report.instructions)}\n`);
  }
  for (const message of report.messages) {
    process.stderr.write(`${file}: ${message}\n`);
  }
  return report.ok ? 0 : 1;
}
