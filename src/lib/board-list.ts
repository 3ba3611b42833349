import fs from "node:fs";
import path from "node:path";
import type { Board, BoardRegistry } from "../types";
import { DEFAULT_HWDEF_DIRS, HWDEF_FILENAME } from "./build-config";

function listBoardNames(hwdefDir: string): string[] {
  return fs
    .readdirSync(hwdefDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .filter((name) => fs.existsSync(path.join(hwdefDir, name, HWDEF_FILENAME)))
    .sort();
}

/**
 * Discover boards from the hwdef roots of a checkout. Every directory holding
 * a `hwdef.dat` is a board; extra roots are searched after the default ones.
 */
export function loadBoardRegistry(
  repoRoot: string,
  extraHwdefDirs: string[] = [],
): BoardRegistry {
  const hwdefDirs = [
    ...DEFAULT_HWDEF_DIRS.map((dir) => path.join(repoRoot, dir)),
    ...extraHwdefDirs.map((dir) => path.resolve(repoRoot, dir)),
  ].filter((dir) => fs.existsSync(dir));

  const names = new Set<string>();
  for (const dir of hwdefDirs) {
    for (const name of listBoardNames(dir)) {
      names.add(name);
    }
  }
  const boards: Board[] = [...names].map((name) => ({ name }));
  return { boards, hwdefDirs };
}
