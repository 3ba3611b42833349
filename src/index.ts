export * from "./lib/errors";
export * from "./lib/process";
export * from "./lib/git";
export * from "./lib/waf";
export * from "./lib/hwdef";
export * from "./lib/board-list";
export * from "./lib/modified-boards";
export type * from "./types";
