import type { ArgumentsCamelCase, Argv } from "yargs";
import type { GlobalArgs } from "../types";
import { mergeBase } from "../lib/git";

export const command = "merge-base";
export const describe = "Print the merge-base commit of two refs";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("branch", {
      type: "string",
      demandOption: true,
      describe: "First ref",
    })
    .option("master", {
      type: "string",
      default: "master",
      describe: "Second ref",
    });
}

export async function handler(
  argv: ArgumentsCamelCase<GlobalArgs & { branch: string; master: string }>,
) {
  const context = { cwd: argv.repoRoot, scratchDir: argv.scratchDir };
  console.log(await mergeBase(context, argv.branch, argv.master));
}
