export const PROGRESS_PREFIX = "build-tools";

/** Pretty-print a progress message to stderr. */
export function progress(message: string): void {
  console.error(`${PROGRESS_PREFIX}: ${message}`);
}
