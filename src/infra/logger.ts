import pino, { type Logger } from 'pino';
import type { LogLevel } from '../config.js';

export interface EventLoggerOptions {
  name: string;
  level: LogLevel;
  /** Append NDJSON to this file instead of stdout. */
  logFile?: string;
}

export type EventLevel = Exclude<LogLevel, 'silent'>;

/**
 * Structured event log. Each entry carries an `event` name plus its data.
 */
export class EventLogger {
  private readonly logger: Logger;

  constructor(options: EventLoggerOptions) {
    const destination = options.logFile
      ? pino.destination({ dest: options.logFile, mkdir: true, sync: false })
      : pino.destination(1);

    this.logger = pino({
      name: options.name,
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
    }, destination);
  }

  log(level: EventLevel, event: string, data: Record<string, unknown> = {}): void {
    this.logger[level]({ event, ...data }, event);
  }

  flush(): void {
    this.logger.flush();
  }
}
