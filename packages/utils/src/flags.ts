export type ParsedFlags = {
  values: Partial<Record<string, string>>;
  toggles: Set<string>;
};

/**
 * Parses `--flag value`, `--flag=value` and bare toggle flags. Anything else
 * (positionals, unknown flags, a value flag without its value) throws so the
 * CLI can report a usage error.
 */
export function parseFlagArgs(
  args: readonly string[],
  valueFlags: readonly string[],
  toggleFlags: readonly string[] = []
): ParsedFlags {
  const valueSet = new Set(valueFlags);
  const toggleSet = new Set(toggleFlags);
  const values: Partial<Record<string, string>> = {};
  const toggles = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (!token.startsWith("-")) {
      throw new Error(`unknown argument: ${token}`);
    }
    if (toggleSet.has(token)) {
      toggles.add(token);
      index += 1;
      continue;
    }
    if (!token.startsWith("--")) {
      throw new Error(`unknown flag: ${token}`);
    }
    const [flag, inline] = token.split("=", 2);
    if (toggleSet.has(flag)) {
      if (inline !== undefined) {
        throw new Error(`flag ${flag} does not take a value`);
      }
      toggles.add(flag);
      index += 1;
      continue;
    }
    if (!valueSet.has(flag)) {
      throw new Error(`unknown flag: ${flag}`);
    }
    if (inline !== undefined) {
      values[flag] = inline;
      index += 1;
      continue;
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new Error(`missing value for ${flag}`);
    }
    values[flag] = next;
    index += 2;
  }
  return { values, toggles };
}
