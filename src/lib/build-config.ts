/** Name of a board's main hardware definition file. */
export const HWDEF_FILENAME = "hwdef.dat";

/** Name of a board's optional bootloader hardware definition file. */
export const HWDEF_BL_FILENAME = "hwdef-bl.dat";

/** File name endings that mark a changed file as a hardware definition. */
export const HWDEF_SUFFIXES = [
  "hwdef.dat",
  "hwdef.inc",
  "hwdef-bl.dat",
  "hwdef-bl.inc",
] as const;

/** Hardware definition roots searched for boards, relative to the repo root. */
export const DEFAULT_HWDEF_DIRS = ["libraries/AP_HAL_ChibiOS/hwdef"];

/**
 * Build-identity variables pinned to placeholder values so that two builds of
 * different trees can be compared byte for byte.
 */
export const CONSISTENT_BUILD_ENV: Readonly<Record<string, string>> = {
  CHIBIOS_GIT_VERSION: "12345678",
  GIT_VERSION: "abcdef",
  GIT_VERSION_EXTENDED: "0123456789abcdef",
  GIT_VERSION_INT: "15",
};

/** Overrides the toolchain root; defaults to `$HOME/arm-gcc`. */
export const GCC_HOME_ENV = "AP_GCC_HOME";
export const DEFAULT_GCC_HOME_DIRNAME = "arm-gcc";

export const CC_COMMAND = "ccache arm-none-eabi-gcc";
export const CXX_COMMAND = "ccache arm-none-eabi-g++";

export const WAF_LOCAL = "waf";
export const WAF_SUBMODULE = "modules/waf/waf-light";
