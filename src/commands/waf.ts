import type { ArgumentsCamelCase, Argv } from "yargs";
import type { GlobalArgs } from "../types";
import { runWaf } from "../lib/waf";

export const command = "waf [args..]";
export const describe =
  "Run waf with pinned build-identity variables and an optional cross toolchain";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .positional("args", {
      type: "string",
      array: true,
      default: [] as string[],
      describe: "Arguments passed to waf (put them after --)",
    })
    .option("compiler", {
      type: "string",
      describe: "Toolchain directory under $AP_GCC_HOME (default $HOME/arm-gcc)",
    });
}

export async function handler(
  argv: ArgumentsCamelCase<GlobalArgs & { args: string[]; compiler?: string }>,
) {
  await runWaf(argv.args, {
    compiler: argv.compiler,
    cwd: argv.repoRoot,
    scratchDir: argv.scratchDir,
  });
}
