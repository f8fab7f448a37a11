import pc from 'picocolors';
import type { LoggerPort } from '../../../ports/outbound/logger-port.js';

export interface ConsoleLoggerOptions {
  /** Colour output; automation step logs are plain text. */
  color?: boolean;
}

export class ConsoleLogger implements LoggerPort {
  private color: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.color = options.color ?? pc.isColorSupported;
  }

  info(message: string): void {
    console.log(`${this.paint('[INFO]', pc.cyan)} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${this.paint('[WARNING]', pc.yellow)} ${message}`);
  }

  error(message: string): void {
    console.error(`${this.paint('[ERROR]', pc.red)} ${message}`);
  }

  private paint(label: string, colorize: (text: string) => string): string {
    return this.color ? colorize(label) : label;
  }
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): LoggerPort {
  return new ConsoleLogger(options);
}
