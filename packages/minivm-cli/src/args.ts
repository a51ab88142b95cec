export type ParsedArgs = {
  positionals: string[];
  values: Partial<Record<string, string>>;
  toggles: Set<string>;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseFlagArgs(
  args: string[],
  valueFlags: string[],
  toggleFlags: string[] = []
): ParsedArgs {
  const valueSet = new Set(valueFlags);
  const toggleSet = new Set(toggleFlags);
  const positionals: string[] = [];
  const values: Partial<Record<string, string>> = {};
  const toggles = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (!token.startsWith("-") || token === "-") {
      positionals.push(token);
      index += 1;
      continue;
    }
    const [flag, inline] = token.split("=", 2);
    if (toggleSet.has(flag)) {
      if (inline !== undefined) {
        throw new UsageError(`flag ${flag} does not take a value`);
      }
      toggles.add(flag);
      index += 1;
      continue;
    }
    if (!valueSet.has(flag)) {
      throw new UsageError(`unknown flag: ${flag}`);
    }
    if (inline !== undefined) {
      values[flag] = inline;
      index += 1;
      continue;
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new UsageError(`missing value for ${flag}`);
    }
    values[flag] = next;
    index += 2;
  }
  return { positionals, values, toggles };
}

export function parsePositiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`${flag} must be a positive integer`);
  }
  return value;
}

export function singleFile(parsed: ParsedArgs, usage: string): string {
  if (parsed.positionals.length !== 1) {
    throw new UsageError(usage);
  }
  return parsed.positionals[0];
}
