import { getLogger } from "../../instrumentation.js";

export type LogLevel = "info" | "error" | "warn" | "debug";

export interface BuildLogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export function formatLogEntry(entry: BuildLogEntry) {
  return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}`;
}

/**
 * Collects the lines of one build so they can be stored on the Build record,
 * and mirrors each line to the process logger.
 */
export function createBuildLogger(buildReference: string) {
  const entries: BuildLogEntry[] = [];
  const processLog = getLogger().child().withContext({ build: buildReference });

  const log = (level: LogLevel, message: string) => {
    entries.push({ timestamp: new Date().toISOString(), level, message });
    processLog[level](message);
  };

  return {
    info: (message: string) => log("info", message),
    error: (message: string) => log("error", message),
    warn: (message: string) => log("warn", message),
    debug: (message: string) => log("debug", message),
    entries: (): BuildLogEntry[] => [...entries],
    toText: () => entries.map(formatLogEntry).join("\n"),
  };
}

export type BuildLogger = ReturnType<typeof createBuildLogger>;
