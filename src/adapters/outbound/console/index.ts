export { ConsoleLogger, createConsoleLogger, type ConsoleLoggerOptions } from './console-logger.js';
