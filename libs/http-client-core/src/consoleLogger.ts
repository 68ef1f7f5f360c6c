import type { Logger } from './types';

/**
 * Console logger used by the env factories when no logger is injected.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: unknown): void {
    meta === undefined ? console.debug(message) : console.debug(message, meta);
  }
  info(message: string, meta?: unknown): void {
    meta === undefined ? console.info(message) : console.info(message, meta);
  }
  warn(message: string, meta?: unknown): void {
    meta === undefined ? console.warn(message) : console.warn(message, meta);
  }
  error(message: string, meta?: unknown): void {
    meta === undefined ? console.error(message) : console.error(message, meta);
  }
}
