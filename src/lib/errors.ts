/** A spawned command exited non-zero or was killed by a signal. */
export class ProcessExecutionError extends Error {
  readonly command: string[];
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(command: string[], exitCode: number | null, signal: string | null = null) {
    const status = signal ? `signal ${signal}` : `status ${exitCode}`;
    super(`Command '${command.join(" ")}' failed with ${status}`);
    this.name = "ProcessExecutionError";
    this.command = command;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/** A required external setting (toolchain directory, hwdef root) is unusable. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
