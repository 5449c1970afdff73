const REGEX_SPECIAL = /[.+?^${}()|[\]\\]/g;

/**
 * Test a module path against an exclusion pattern.
 *
 * `*` stands for any run of characters, including `/`, and everything else
 * is literal, so `example.com/tools/*` covers every module below
 * `example.com/tools/` and `*grpc*` any path mentioning grpc. A pattern
 * with no `*` has to equal the path.
 */
export function matchesWildcard(modulePath: string, pattern: string): boolean {
  if (!pattern.includes("*")) {
    return modulePath === pattern;
  }

  const source = pattern
    .split("*")
    .map((literal) => literal.replace(REGEX_SPECIAL, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}$`).test(modulePath);
}

/** True when at least one pattern matches the module path. */
export function matchesAnyWildcard(
  modulePath: string,
  patterns: readonly string[],
): boolean {
  return patterns.some((pattern) => matchesWildcard(modulePath, pattern));
}
