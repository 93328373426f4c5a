// Minimal logging seam. The library writes through console by default;
// callers (and tests) swap in their own sink via options.

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = '[jsonstrata]';

export const consoleLogger: Logger = {
  debug(message) {
    if (process.env.JSONSTRATA_DEBUG === '1') {
      console.debug(`${PREFIX} ${message}`);
    }
  },
  info(message) {
    console.info(`${PREFIX} ${message}`);
  },
  warn(message) {
    console.warn(`${PREFIX} ${message}`);
  },
  error(message) {
    console.error(`${PREFIX} ${message}`);
  },
};

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Logger that keeps every line in memory, tagged with its level
 */
export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  debug(message: string): void {
    this.lines.push(`debug: ${message}`);
  }
  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }
  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }
}
