import { LogEntry, LogLevel } from './types.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

const hasData = (entry: LogEntry): boolean =>
  entry.data !== undefined && Object.keys(entry.data).length > 0;

/**
 * Render an entry as a single JSON line
 */
export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevel[entry.level],
    component: entry.component,
    message: entry.message,
    ...(hasData(entry) && { data: entry.data }),
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  });
}

/**
 * Render an entry as `<timestamp> <LEVEL> [component] message {data}`
 */
export function formatText(entry: LogEntry, colors = false): string {
  const levelName = LogLevel[entry.level];
  const level = colors ? `${LEVEL_COLORS[entry.level]}${levelName}${RESET}` : levelName;

  let line = `${entry.timestamp.toISOString()} ${level} [${entry.component}] ${entry.message}`;

  if (hasData(entry)) {
    line += ` ${JSON.stringify(entry.data)}`;
  }

  if (entry.error) {
    line += `\n${entry.error.stack || entry.error.message}`;
  }

  return line;
}
