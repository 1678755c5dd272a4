/**
 * Shared behaviour of the log providers: level filtering, timestamping,
 * static fields, and the per-level convenience methods.
 */

import { LOG_LEVEL_ORDER, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface BaseLogProviderOptions {
  /** Events below this level are dropped. Default: debug. */
  minLevel?: LogLevel;
  /** Merged into every event's fields (e.g. service name). */
  staticFields?: Record<string, unknown>;
}

export abstract class BaseLogProvider implements ILogProvider {
  private readonly minLevel: LogLevel;
  private readonly staticFields: Record<string, unknown> | undefined;

  protected constructor(options: BaseLogProviderOptions = {}) {
    this.minLevel = options.minLevel ?? 'debug';
    this.staticFields = options.staticFields;
  }

  /** Receives events that passed the level filter, already stamped. */
  protected abstract write(event: LogEvent): void;

  abstract flush(): Promise<void>;

  log(event: LogEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    const fields =
      this.staticFields || event.fields
        ? { ...this.staticFields, ...event.fields }
        : undefined;

    this.write({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(fields ? { fields } : {}),
    });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }
}
