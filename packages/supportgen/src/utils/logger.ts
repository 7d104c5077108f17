export type GenLogLevel = "info" | "warn" | "error";

export type GenLogEntry = {
  at: string;
  level: GenLogLevel;
  message: string;
};

export type GenLogger = {
  entries: GenLogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type GenLoggerOptions = {
  /** Record entries without writing to the console. */
  quiet?: boolean;
};

/**
 * Console logger tagged `[supportgen:level]`. Every entry is also kept in
 * `entries`, so tests and the pipeline can inspect what was reported.
 */
export function createGenLogger(options: GenLoggerOptions = {}): GenLogger {
  const entries: GenLogEntry[] = [];

  const push = (level: GenLogLevel, message: string) => {
    entries.push({ at: new Date().toISOString(), level, message });
    if (options.quiet) return;

    if (level === "error") {
      console.error(`[supportgen:${level}] ${message}`);
      return;
    }
    if (level === "warn") {
      console.warn(`[supportgen:${level}] ${message}`);
      return;
    }
    console.log(`[supportgen:${level}] ${message}`);
  };

  return {
    entries,
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
  };
}

const SHOWN_VIOLATIONS = 5;

export function reportViolations(logger: GenLogger, label: string, violations: string[]): void {
  if (violations.length === 0) return;

  logger.warn(`${label}: ${violations.length} validation issue(s)`);
  for (const violation of violations.slice(0, SHOWN_VIOLATIONS)) {
    logger.warn(`  - ${violation}`);
  }
  if (violations.length > SHOWN_VIOLATIONS) {
    logger.warn(`  ... and ${violations.length - SHOWN_VIOLATIONS} more`);
  }
}
