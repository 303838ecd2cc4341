import type { CliKwargs, CliValue } from "./types.js";

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function stringifyCliValue(value: CliValue): string {
  switch (typeof value) {
    case "string":
      return value;
    case "boolean":
      return String(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot pass non-finite number ${value} on a command line`);
      }
      return String(value);
    default:
      throw new TypeError(`Unsupported command-line value of type ${typeof value}`);
  }
}

/**
 * Keyed flags come first, in insertion order, each followed by its value;
 * positional arguments follow.
 */
export function buildCliCommand(
  executable: string,
  args: readonly CliValue[] = [],
  kwargs: Readonly<CliKwargs> = {},
): string[] {
  const command = [executable];
  for (const [flag, value] of Object.entries(kwargs)) {
    command.push(flag, stringifyCliValue(value));
  }
  for (const arg of args) {
    command.push(stringifyCliValue(arg));
  }
  return command;
}

export function shellQuote(value: string): string {
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function formatCommandLine(command: readonly string[]): string {
  return command.map((part) => shellQuote(part)).join(" ");
}
