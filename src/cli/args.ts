/** Flags by name; a flag given without a value is `true`. */
export type CliFlags = Record<string, string | true>;

/** Reads `--name value`, `--name=value` and bare `--name` flags; positional words are ignored. */
export function parseFlags(argv: readonly string[]): CliFlags {
  const flags: CliFlags = {};

  let index = 0;
  while (index < argv.length) {
    const token = argv[index];
    index += 1;
    if (!token.startsWith("--")) {
      continue;
    }

    const body = token.slice(2);
    const equals = body.indexOf("=");
    if (equals >= 0) {
      flags[body.slice(0, equals)] = body.slice(equals + 1);
      continue;
    }

    const value = argv[index];
    if (value === undefined || value.startsWith("--")) {
      flags[body] = true;
    } else {
      flags[body] = value;
      index += 1;
    }
  }

  return flags;
}

export function optionalFlag(flags: CliFlags, name: string): string | undefined {
  const value = flags[name];
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

export function requiredFlag(flags: CliFlags, name: string): string {
  const value = optionalFlag(flags, name);
  if (value === undefined) {
    throw new Error(`Missing required argument --${name}`);
  }
  return value;
}

export function booleanFlag(flags: CliFlags, name: string): boolean {
  return flags[name] === true;
}

export function fractionFlag(flags: CliFlags, name: string): number | undefined {
  const raw = optionalFlag(flags, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Invalid --${name} value. Use a number between 0 and 1.`);
  }
  return value;
}

export function positiveIntFlag(flags: CliFlags, name: string): number | undefined {
  const raw = optionalFlag(flags, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid --${name} value. Use a positive integer.`);
  }
  return value;
}
