#!/usr/bin/env tsx
import os from "node:os";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import * as modifiedBoards from "./commands/modified-boards";
import * as currentBranch from "./commands/current-branch";
import * as mergeBase from "./commands/merge-base";
import * as waf from "./commands/waf";
import { getRepoRoot } from "./lib/git";

await yargs(hideBin(process.argv))
  .scriptName("build-tools")
  .option("repoRoot", {
    type: "string",
    default: getRepoRoot(),
    describe: "Repository root directory",
  })
  .option("scratchDir", {
    type: "string",
    default: os.tmpdir(),
    describe: "Directory for process failure transcripts",
  })
  .command(modifiedBoards)
  .command(currentBranch)
  .command(mergeBase)
  .command(waf)
  .demandCommand(1, "You must specify a command")
  .version(false)
  .strict()
  .help()
  .parseAsync();
