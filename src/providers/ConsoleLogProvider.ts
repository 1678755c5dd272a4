/**
 * In-process log provider.
 * Keeps every event in memory for inspection; optionally echoes to the console
 * (warn and error go to stderr).
 */

import { BaseLogProvider, type BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent, LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions extends BaseLogProviderOptions {
  /** Echo events as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Keep events in `events`. Default: true. */
  retainEvents?: boolean;
}

export class ConsoleLogProvider extends BaseLogProvider {
  /** Every retained event, most recent last. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly retainEvents: boolean;

  constructor(options: ConsoleLogProviderOptions = {}) {
    super(options);
    this.outputToConsole = options.outputToConsole ?? false;
    this.retainEvents = options.retainEvents ?? true;
  }

  protected write(event: LogEvent): void {
    if (this.retainEvents) this.events.push(event);
    if (!this.outputToConsole) return;

    const line = `${event.timestamp} [${event.level.toUpperCase()}] ${event.message}${
      event.fields ? ` ${JSON.stringify(event.fields)}` : ''
    }`;
    if (event.level === 'warn' || event.level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  /** Events at `level`, or messages of all events when omitted. */
  messages(level?: LogLevel): string[] {
    return this.events.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.events.length = 0;
  }
}
