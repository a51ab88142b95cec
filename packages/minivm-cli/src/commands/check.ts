import { checkDeclarations, formatDiagnostic, parse } from "@minivm/core";

import { parseFlagArgs, singleFile } from "../args.js";
import { readSource } from "../io.js";

export const CHECK_USAGE = "Usage: minivm check <file>";

export async function runCheck(args: string[]): Promise<number> {
  const parsed = parseFlagArgs(args, [], ["--help", "-h"]);
  if (parsed.toggles.has("--help") || parsed.toggles.has("-h")) {
    process.stdout.write(`${CHECK_USAGE}\n`);
    return 0;
  }
  const file = singleFile(parsed, CHECK_USAGE);
  const result = parse(await readSource(file));
  const diagnostics = result.ok ? checkDeclarations(result.value) : [result.error];
  if (diagnostics.length === 0) {
    process.stdout.write("ok\n");
    return 0;
  }
  for (const d of diagnostics) {
    process.stdout.write(`${file}: ${formatDiagnostic(d)}\n`);
  }
  return 1;
}
