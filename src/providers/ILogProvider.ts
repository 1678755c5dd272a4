/**
 * Logging provider interface.
 * Services receive one by constructor injection; delivery is backend-specific.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601; stamped on arrival when omitted. */
  timestamp?: string;
  fields?: Record<string, unknown>;
}

/** Emitted once per HTTP request by the logging middleware. */
export interface RequestLogEvent extends LogEvent {
  method: string;
  path: string;
  status: number;
  durationMs: number;
  requestId: string;
}

export interface ILogProvider {
  /** Enqueue an event. Never blocks and never throws. */
  log(event: LogEvent): void;

  /** Deliver buffered events. Resolves when the attempt completes. */
  flush(): Promise<void>;

  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}
