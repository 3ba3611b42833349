import fs from "node:fs";
import path from "node:path";
import type { BoardRegistry } from "../types";
import { HWDEF_BL_FILENAME, HWDEF_FILENAME } from "./build-config";
import { loadBoardRegistry } from "./board-list";
import { changedFiles, mergeBase } from "./git";
import { canonicalPath, collectHwdefIncludes, filterHwdefPaths } from "./hwdef";
import { progress } from "./progress";

export interface FindModifiedBoardsOptions {
  /** Diff against the merge-base of the two refs rather than `masterBranch` itself */
  useMergeBase?: boolean;
  loadBoards?: (repoRoot: string) => BoardRegistry;
  /** Directory for git failure transcripts */
  scratchDir?: string;
}

/**
 * Hwdef files modified between `branch` and `masterBranch`, relative to the
 * repository root.
 */
export async function getModifiedHwdefPaths(
  repoRoot: string,
  branch: string,
  masterBranch: string,
  useMergeBase = true,
  scratchDir?: string,
): Promise<string[]> {
  const context = { cwd: repoRoot, scratchDir };
  const baseCommit = useMergeBase
    ? await mergeBase(context, branch, masterBranch)
    : masterBranch;
  const deltaFiles = await changedFiles(context, baseCommit, branch);
  return filterHwdefPaths(deltaFiles);
}

/** Union of the include sets of a board's main and bootloader hwdef files. */
export function boardHwdefIncludes(hwdefPath: string, hwdefBlPath: string): Set<string> {
  const includes = collectHwdefIncludes(hwdefPath);
  if (fs.existsSync(hwdefBlPath)) {
    for (const p of collectHwdefIncludes(hwdefBlPath)) {
      includes.add(p);
    }
  }
  return includes;
}

export function sortBoardNames(names: string[]): string[] {
  return [...names].sort((a, b) => {
    const ka = a.toLowerCase();
    const kb = b.toLowerCase();
    if (ka < kb) return -1;
    if (ka > kb) return 1;
    return 0;
  });
}

/**
 * Find boards whose hwdef files, directly or through includes, were modified
 * between `branch` and `masterBranch`.
 */
export async function findModifiedBoards(
  repoRoot: string,
  branch: string,
  masterBranch: string,
  options: FindModifiedBoardsOptions = {},
): Promise<string[]> {
  const {
    useMergeBase = true,
    loadBoards = (root: string) => loadBoardRegistry(root),
    scratchDir,
  } = options;

  const modifiedPaths = await getModifiedHwdefPaths(
    repoRoot,
    branch,
    masterBranch,
    useMergeBase,
    scratchDir,
  );
  if (modifiedPaths.length === 0) {
    return [];
  }
  for (const p of modifiedPaths) {
    progress(`Modified hwdef: ${p}`);
  }

  const modifiedAbs = new Set(
    modifiedPaths.map((p) => canonicalPath(path.resolve(repoRoot, p))),
  );

  const registry = loadBoards(repoRoot);
  const modifiedBoardNames: string[] = [];
  for (const board of registry.boards) {
    for (const hwdefDir of registry.hwdefDirs) {
      const hwdefPath = path.join(hwdefDir, board.name, HWDEF_FILENAME);
      if (!fs.existsSync(hwdefPath)) continue;
      const includes = boardHwdefIncludes(
        hwdefPath,
        path.join(hwdefDir, board.name, HWDEF_BL_FILENAME),
      );
      if ([...includes].some((p) => modifiedAbs.has(p))) {
        modifiedBoardNames.push(board.name);
        progress(`Board ${board.name} uses modified hwdef`);
        break;
      }
    }
  }

  return sortBoardNames(modifiedBoardNames);
}
