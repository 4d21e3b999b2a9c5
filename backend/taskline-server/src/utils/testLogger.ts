/**
 * Logger that records lines for assertions in tests
 */

import { Logger } from "./logger";

export interface RecordedLine {
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

export interface RecordingLogger extends Logger {
  lines: RecordedLine[];
  messages(level: RecordedLine["level"]): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordedLine[] = [];
  return {
    lines,
    messages: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
    debug: (message) => lines.push({ level: "debug", message }),
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
  };
}
