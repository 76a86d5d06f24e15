import type { LogLevel } from "../logger.js";

/** Verbosity requested on the command line. */
export type Verbosity = "default" | "quiet" | "verbose" | "debug";

/**
 * Combines the verbosity switches. The most talkative one wins when several
 * are given, so `-q --debug` still logs debug entries.
 */
export function verbosityFromSwitches(switches: ReadonlySet<string>): Verbosity {
  if (switches.has("debug")) {
    return "debug";
  }
  if (switches.has("verbose")) {
    return "verbose";
  }
  if (switches.has("quiet")) {
    return "quiet";
  }
  return "default";
}

/** Maps a verbosity onto a logger level; `default` keeps the configured level. */
export function resolveLogLevel(verbosity: Verbosity, configured: LogLevel): LogLevel {
  switch (verbosity) {
    case "debug":
      return "debug";
    case "verbose":
      return "info";
    case "quiet":
      return "error";
    case "default":
      return configured;
  }
}
