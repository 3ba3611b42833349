import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  CC_COMMAND,
  CONSISTENT_BUILD_ENV,
  CXX_COMMAND,
  DEFAULT_GCC_HOME_DIRNAME,
  GCC_HOME_ENV,
  WAF_LOCAL,
  WAF_SUBMODULE,
} from "./build-config";
import { ConfigurationError } from "./errors";
import { runProgram } from "./process";

export const WAF_LABEL = "BT-WAF";

export interface RunWafOptions {
  /** Toolchain directory name under the gcc home, e.g. "gcc-10.2.1" */
  compiler?: string;
  cwd?: string;
  showOutput?: boolean;
  scratchDir?: string;
  /** Base environment for the child (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export function resolveToolchainBinDir(
  compiler: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const gccHome =
    env[GCC_HOME_ENV] ??
    path.join(env.HOME ?? os.homedir(), DEFAULT_GCC_HOME_DIRNAME);
  return path.join(gccHome, compiler, "bin");
}

/** Prefer a checked-in `waf` over the one in the waf submodule. */
export function findWaf(cwd: string): string {
  if (fs.existsSync(path.join(cwd, WAF_LOCAL))) {
    return `./${WAF_LOCAL}`;
  }
  return `./${WAF_SUBMODULE}`;
}

/**
 * Build the environment waf runs in. Only the returned copy is modified, the
 * caller's environment stays untouched.
 */
export function buildWafEnv(
  compiler: string | undefined,
  baseEnv: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv, ...CONSISTENT_BUILD_ENV };
  if (compiler === undefined) {
    return env;
  }
  const binDir = resolveToolchainBinDir(compiler, baseEnv);
  if (!fs.existsSync(binDir)) {
    throw new ConfigurationError(`Missing compiler ${binDir}`);
  }
  env.PATH = baseEnv.PATH ? `${binDir}${path.delimiter}${baseEnv.PATH}` : binDir;
  env.CC = CC_COMMAND;
  env.CXX = CXX_COMMAND;
  return env;
}

export async function runWaf(args: string[], options: RunWafOptions = {}): Promise<void> {
  const cwd = options.cwd ?? ".";
  const env = buildWafEnv(options.compiler, options.env);
  await runProgram(WAF_LABEL, [findWaf(cwd), ...args], {
    env,
    cwd,
    showOutput: options.showOutput ?? true,
    scratchDir: options.scratchDir,
  });
}
