import fs from "node:fs";
import path from "node:path";
import { HWDEF_SUFFIXES } from "./build-config";

const INCLUDE_REGEX = /^include\s+(.+)$/;

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

/**
 * Absolute, symlink-resolved form of `filePath`. Paths that do not exist are
 * resolved through their nearest existing ancestor.
 */
export function canonicalPath(filePath: string): string {
  const absolute = path.resolve(filePath);
  try {
    return fs.realpathSync(absolute);
  } catch (err) {
    if (!isNotFound(err)) throw err;
    const parent = path.dirname(absolute);
    if (parent === absolute) return absolute;
    return path.join(canonicalPath(parent), path.basename(absolute));
  }
}

/**
 * Recursively collect every hwdef file reachable from `filePath` through
 * `include` directives, `filePath` itself included.
 *
 * A file is expanded at most once per `seen` set, so include cycles terminate.
 * Missing files contribute nothing.
 */
export function collectHwdefIncludes(
  filePath: string,
  seen: Set<string> = new Set(),
): Set<string> {
  const canonical = canonicalPath(filePath);
  if (seen.has(canonical)) {
    return new Set();
  }
  // must be recorded before following includes, or a self-include loses the root
  seen.add(canonical);

  let content: string;
  try {
    content = fs.readFileSync(canonical, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return new Set();
    throw err;
  }

  const paths = new Set([canonical]);
  for (const line of content.split(/\r?\n/)) {
    const match = INCLUDE_REGEX.exec(line.trim());
    if (!match) continue;
    const includePath = path.resolve(path.dirname(canonical), match[1].trim());
    for (const included of collectHwdefIncludes(includePath, seen)) {
      paths.add(included);
    }
  }
  return paths;
}

/**
 * True for repo-relative paths that look like hardware definition files.
 * Suffix only: every suffix contains "hwdef", so a file named `hwdef.dat`
 * outside a `hwdef/` directory still counts.
 */
export function isHwdefPath(relativePath: string): boolean {
  return HWDEF_SUFFIXES.some((suffix) => relativePath.endsWith(suffix));
}

/** Trimmed, de-duplicated hwdef paths from a changed-file list, in input order. */
export function filterHwdefPaths(paths: string[]): string[] {
  const result = new Set<string>();
  for (const raw of paths) {
    const trimmed = raw.trim();
    if (trimmed && isHwdefPath(trimmed)) {
      result.add(trimmed);
    }
  }
  return [...result];
}
