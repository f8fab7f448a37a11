import { afterEach, describe, test, expect, vi } from 'vitest';
import { ConsoleLogger } from './console-logger.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('prefixes each level without colour', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ color: false });

    logger.info('Stage prod exists');
    logger.warn('Log group API-Gateway-Execution-Logs_abc123/prod does not exist.');
    logger.error('CloudWatch Log Insights query failed. Query status: Failed');

    expect(log).toHaveBeenCalledWith('[INFO] Stage prod exists');
    expect(warn).toHaveBeenCalledWith('[WARNING] Log group API-Gateway-Execution-Logs_abc123/prod does not exist.');
    expect(error).toHaveBeenCalledWith('[ERROR] CloudWatch Log Insights query failed. Query status: Failed');
  });
});
