import { spawn } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import readline from "node:readline";
import { ProcessExecutionError } from "./errors";
import { progress } from "./progress";

export interface RunProgramOptions {
  /** Echo each output line as it arrives (default true) */
  showOutput?: boolean;
  /** Print the whole transcript on failure when output was hidden (default true) */
  showOutputOnError?: boolean;
  /** Log the command line before running it (default true) */
  showCommand?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Where failure transcripts are written (default: OS temp dir) */
  scratchDir?: string;
}

export type ProgramRunner = (
  label: string,
  command: string[],
  options?: RunProgramOptions,
) => Promise<string>;

// tab, LF, VT, FF, CR and the printable ASCII range
const NON_PRINTABLE = /[^\x09-\x0d\x20-\x7e]/g;

export function toPrintable(text: string): string {
  return text.replace(NON_PRINTABLE, "");
}

export function failureFilePath(scratchDir: string, now = Date.now()): string {
  return path.join(scratchDir, `process-failure-${Math.floor(now / 1000)}`);
}

function writeFailureFile(scratchDir: string, content: string): void {
  try {
    const filePath = failureFilePath(scratchDir);
    fs.writeFileSync(filePath, content);
    progress(`Wrote process failure file (${filePath})`);
  } catch (err) {
    progress(
      `Writing process failure file failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Run `command` and return its combined stdout/stderr transcript.
 *
 * Output is read line by line and echoed as `<label>: <line>` while the child
 * runs. A non-zero exit rejects with {@link ProcessExecutionError} after the
 * transcript has been saved under `scratchDir`.
 */
export const runProgram: ProgramRunner = async (label, command, options = {}) => {
  const {
    showOutput = true,
    showOutputOnError = true,
    showCommand = true,
    cwd = ".",
    env,
    scratchDir = os.tmpdir(),
  } = options;
  const [file, ...args] = command;
  if (file === undefined) {
    throw new Error("runProgram requires a non-empty command");
  }

  const commandDebug = `Running (${command.join(" ")}) in (${cwd})`;
  if (showCommand) {
    progress(commandDebug);
  }

  const child = spawn(file, args, {
    cwd,
    env,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let output = "";
  const onLine = (raw: string) => {
    const line = toPrintable(raw);
    output += `${line}\n`;
    if (showOutput) {
      console.error(`${label}: ${line.trimEnd()}`);
    }
  };
  readline.createInterface({ input: child.stdout, crlfDelay: Infinity }).on("line", onLine);
  readline.createInterface({ input: child.stderr, crlfDelay: Infinity }).on("line", onLine);

  const { code, signal } = await new Promise<{
    code: number | null;
    signal: NodeJS.Signals | null;
  }>((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (exitCode, exitSignal) =>
      resolve({ code: exitCode, signal: exitSignal }),
    );
  });

  if (code !== 0) {
    if (!showOutput && showOutputOnError) {
      // output was hidden, show it now that the command failed
      console.error(output);
    }
    progress(`Process failed (${signal ?? code})`);
    writeFailureFile(scratchDir, `${commandDebug}\n${output}`);
    throw new ProcessExecutionError(command, code, signal);
  }
  return output;
};
