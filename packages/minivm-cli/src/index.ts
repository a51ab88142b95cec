export { HELP_TEXT, runCli } from "./app.js";
export { parseFlagArgs, UsageError } from "./args.js";
export type { ParsedArgs } from "./args.js";
export { ProgramError, compileFile, loadBytecode, loadConfigFile } from "./io.js";
