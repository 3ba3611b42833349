export interface Board {
  name: string;
}

/** Read-only view of the boards known to the build and where to find them. */
export interface BoardRegistry {
  boards: Board[];
  /** Absolute hardware definition root directories, searched in order */
  hwdefDirs: string[];
}

/** Shape of the global CLI options (defined in cli.ts) */
export interface GlobalArgs {
  repoRoot: string;
  scratchDir: string;
}
