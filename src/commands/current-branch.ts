import type { ArgumentsCamelCase } from "yargs";
import type { GlobalArgs } from "../types";
import { currentBranchOrCommit } from "../lib/git";

export const command = "current-branch";
export const describe = "Print the current branch, or the short commit hash when detached";

export async function handler(argv: ArgumentsCamelCase<GlobalArgs>) {
  console.log(
    await currentBranchOrCommit({ cwd: argv.repoRoot, scratchDir: argv.scratchDir }),
  );
}
