import { InvalidArgumentError } from "commander";

/**
 * Option parser for counts where 0 means "unlimited"
 */
export function parseLimit(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

/**
 * Option parser for repeatable and comma-separated module lists,
 * e.g. `-m a,b -m c`
 */
export function collectModules(value: string, previous: string[] = []): string[] {
  const modules = value
    .split(",")
    .map((module) => module.trim())
    .filter((module) => module.length > 0);
  return [...previous, ...modules];
}
