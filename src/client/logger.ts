/**
 * Minimal leveled logger. Any object with these four methods can be passed
 * to the clients in place of the console logger.
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const PREFIX = "[vision-stream]";

/**
 * Logger utility for controlled logging
 */
export class ConsoleLogger implements Logger {
  private debugEnabled: boolean;

  constructor(debugEnabled: boolean = false) {
    this.debugEnabled = debugEnabled;
  }

  debug(...args: unknown[]): void {
    if (this.debugEnabled) {
      console.log(`${PREFIX} debug`, ...args);
    }
  }

  info(...args: unknown[]): void {
    console.log(PREFIX, ...args);
  }

  warn(...args: unknown[]): void {
    console.warn(PREFIX, ...args);
  }

  error(...args: unknown[]): void {
    console.error(PREFIX, ...args);
  }
}
