/**
 * Wildcard path resolution
 * Turns a path with `*` segments into a concrete path by picking, at each
 * wildcard segment, the ordinal-greatest matching child directory
 */

import path from "node:path";
import glob from "fast-glob";
import { UnsupportedWildcardPathError } from "../types/errors";
import type { DirectoryProbe } from "../types";

const WILDCARD = "*";

/**
 * Lists child directories with fast-glob
 * A parent that cannot be listed (missing, a file, unreadable) has no children
 */
export const globDirectoryProbe: DirectoryProbe = {
  async listDirectories(parent: string): Promise<string[]> {
    return glob("*", {
      cwd: parent,
      onlyDirectories: true,
      deep: 1,
      dot: true,
      suppressErrors: true,
    });
  },
};

/**
 * Ordinal comparison by UTF-16 code units (no locale, no numeric collation)
 */
export function compareOrdinal(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Build a matcher for one path segment where `*` matches any run of characters
 * and every other character is literal
 */
export function createSegmentMatcher(pattern: string): (name: string) => boolean {
  const source = pattern
    .split(WILDCARD)
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  const regex = new RegExp(`^${source}$`, "s");
  return (name) => regex.test(name);
}

function isNetworkPath(input: string): boolean {
  return /^(\\\\|\/\/)/.test(input);
}

function assertSupported(input: string): void {
  if (isNetworkPath(input)) {
    throw new UnsupportedWildcardPathError(
      input,
      "wildcards in network paths are not supported",
    );
  }

  if (!path.isAbsolute(input)) {
    const first = input.split(/[\\/]/)[0];
    if (first.includes(WILDCARD)) {
      throw new UnsupportedWildcardPathError(
        input,
        "the first path component cannot be a wildcard",
      );
    }
  }
}

/**
 * Resolve a path containing `*` wildcard segments
 *
 * Each wildcard segment is replaced by the ordinal-greatest child directory
 * of the path resolved so far that matches it. A segment with no match is
 * kept as literal text; callers detect misses with their own existence check.
 *
 * @example
 * // with /opt/unity/2021.3.1f1 and /opt/unity/2022.1.0f1 present
 * await findPath("/opt/unity/*") // "/opt/unity/2022.1.0f1"
 */
export async function findPath(
  input: string,
  probe: DirectoryProbe = globDirectoryProbe,
): Promise<string> {
  if (!input.includes(WILDCARD)) {
    return input;
  }

  assertSupported(input);

  const absolutePath = path.resolve(input);
  const { root } = path.parse(absolutePath);
  const segments = absolutePath
    .slice(root.length)
    .split(path.sep)
    .filter((segment) => segment.length > 0);

  let resolved = root;

  for (const segment of segments) {
    if (!segment.includes(WILDCARD)) {
      resolved = path.join(resolved, segment);
      continue;
    }

    const matches = createSegmentMatcher(segment);
    const candidates = (await probe.listDirectories(resolved)).filter(matches);
    const selected = candidates.sort(compareOrdinal).at(-1);

    resolved = path.join(resolved, selected ?? segment);
  }

  return resolved;
}
