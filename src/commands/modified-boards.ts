import type { ArgumentsCamelCase, Argv } from "yargs";
import type { GlobalArgs } from "../types";
import { loadBoardRegistry } from "../lib/board-list";
import { findModifiedBoards } from "../lib/modified-boards";

export const command = "modified-boards";
export const describe =
  "List boards whose hwdef files (or their includes) changed between two refs";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("branch", {
      type: "string",
      default: "HEAD",
      describe: "Ref containing the changes",
    })
    .option("master", {
      type: "string",
      default: "master",
      describe: "Ref to compare against",
    })
    .option("useMergeBase", {
      type: "boolean",
      default: true,
      describe: "Diff against the merge-base of the two refs instead of --master",
    })
    .option("hwdefDir", {
      type: "string",
      array: true,
      default: [] as string[],
      describe: "Additional hwdef root directories to search for boards",
    });
}

export async function handler(
  argv: ArgumentsCamelCase<
    GlobalArgs & {
      branch: string;
      master: string;
      useMergeBase: boolean;
      hwdefDir: string[];
    }
  >,
) {
  const boards = await findModifiedBoards(argv.repoRoot, argv.branch, argv.master, {
    useMergeBase: argv.useMergeBase,
    scratchDir: argv.scratchDir,
    loadBoards: (repoRoot) => loadBoardRegistry(repoRoot, argv.hwdefDir),
  });
  for (const board of boards) {
    console.log(board);
  }
}
