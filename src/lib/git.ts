import { execFileSync } from "node:child_process";
import { ProcessExecutionError } from "./errors";
import { runProgram } from "./process";

export const GIT_LABEL = "BT-GIT";

/** Where git runs and where its failure transcripts go. */
export interface GitContext {
  cwd?: string;
  scratchDir?: string;
}

export interface RunGitOptions extends GitContext {
  showOutput?: boolean;
}

/** Run git with `args`; returns git's output. */
export function runGit(args: string[], options: RunGitOptions = {}): Promise<string> {
  return runProgram(GIT_LABEL, ["git", ...args], {
    showOutput: options.showOutput ?? true,
    cwd: options.cwd,
    scratchDir: options.scratchDir,
  });
}

export async function currentBranchOrCommit(context: GitContext = {}): Promise<string> {
  try {
    const branch = await runGit(["symbolic-ref", "--short", "HEAD"], context);
    return branch.trim();
  } catch (err) {
    if (!(err instanceof ProcessExecutionError)) throw err;
  }
  // detached HEAD: no symbolic ref, so report the commit instead
  const sha = await runGit(["rev-parse", "--short", "HEAD"], context);
  return sha.trim();
}

export async function mergeBase(
  context: GitContext,
  refA: string,
  refB: string,
): Promise<string> {
  const output = await runGit(["merge-base", refA, refB], context);
  return output.trim();
}

/** Repository-relative paths that differ between `baseRef` and `targetRef`. */
export async function changedFiles(
  context: GitContext,
  baseRef: string,
  targetRef: string,
): Promise<string[]> {
  const output = await runGit(["diff", "--name-only", baseRef, targetRef], {
    ...context,
    showOutput: false,
  });
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

export function getRepoRoot(cwd?: string): string {
  try {
    return execFileSync("git", ["rev-parse", "--show-toplevel"], {
      cwd: cwd ?? process.cwd(),
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    }).trim();
  } catch {
    return process.cwd();
  }
}
