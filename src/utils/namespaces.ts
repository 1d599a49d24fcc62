/**
 * Namespace helpers shared by the dispatcher and writers
 */

/**
 * A namespace is excluded when it equals an entry or is nested under one
 *
 * @example
 * isNamespaceExcluded("System.Collections", ["System"]) // true
 * isNamespaceExcluded("SystemX", ["System"]) // false
 */
export function isNamespaceExcluded(
  namespace: string,
  excluded: readonly string[],
): boolean {
  return excluded.some(
    (entry) => namespace === entry || namespace.startsWith(`${entry}.`),
  );
}

/**
 * Normalize an excluded-namespace list from the CLI or config
 * A single "none" entry (any case) disables exclusion
 */
export function normalizeExcludedNamespaces(entries: readonly string[]): string[] {
  const trimmed = entries.map((e) => e.trim()).filter((e) => e.length > 0);
  if (trimmed.length === 1 && trimmed[0].toLowerCase() === "none") {
    return [];
  }
  return trimmed;
}
