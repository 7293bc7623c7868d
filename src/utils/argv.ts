import { ConfigurationError } from "../provision/errors.js";

export function isHelpFlag(token: string): boolean {
  return token === "--help" || token === "-h";
}

/** Value following `args[index]`; a missing value or another flag in its place is an error. */
export function readFlagValue(args: string[], index: number): string {
  const flag = args[index];
  const next = args[index + 1];
  if (next === undefined || next.startsWith("--")) {
    throw new ConfigurationError(`Missing value for ${flag}.`);
  }
  return next;
}

export function parseIntegerFlag(flag: string, value: string, minimum: number): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < minimum) {
    throw new ConfigurationError(`Invalid value for ${flag}: expected an integer greater than or equal to ${minimum}.`);
  }
  return parsed;
}
