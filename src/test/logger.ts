/** Logger that records formatted lines instead of printing them. */
import { createLogger, type Logger, type LogLevel } from '@/log/logger';

export type RecordedLine = { level: LogLevel; line: string };

export type RecordingLogger = {
  logger: Logger;
  records: RecordedLine[];
  /** Lines written at the given level (all levels when omitted). */
  lines: (level?: LogLevel) => string[];
};

export const recordingLogger = (level: LogLevel = 'trace'): RecordingLogger => {
  const records: RecordedLine[] = [];
  const logger = createLogger({
    level,
    write: (lvl, line) => {
      records.push({ level: lvl, line });
    },
  });
  return {
    logger,
    records,
    lines: (lvl) =>
      records.filter((r) => lvl === undefined || r.level === lvl).map((r) => r.line),
  };
};
