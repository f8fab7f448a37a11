import { describe, test, expect } from 'vitest';
import { createAutomationHandler } from './handler.js';
import type { AutomationEvent } from './handler.js';
import { createTroubleshootApiUseCase } from '../../../application/troubleshoot-api.js';
import { InvalidInputError, StageNotFoundError } from '../../../domain/errors.js';
import {
  FakeApiGateway,
  FakeLogsInsights,
  InMemoryErrorPatternRepository,
  RecordingLogger,
  createSampleApi,
  pattern,
} from '../../../test-support/fake-ports.js';

const EXECUTION_LOG_GROUP = 'API-Gateway-Execution-Logs_abc123/prod';
const CONFIG_ERROR_LINE = '(0f1e2d3c-aaaa-bbbb-cccc-123456789abc) Execution failed due to configuration error';

function setup() {
  const logsInsights = new FakeLogsInsights();
  const logger = new RecordingLogger();
  const troubleshooter = createTroubleshootApiUseCase({
    apiGateway: new FakeApiGateway([createSampleApi()]),
    logsInsights,
    patternRepository: new InMemoryErrorPatternRepository([
      pattern('config-error', '.*Execution failed due to configuration error.*', [
        'https://example.com/config',
        'https://example.com/vpc',
      ]),
    ]),
    logger: new RecordingLogger(),
  });
  const handler = createAutomationHandler({
    troubleshooter,
    logger,
    defaultWindowMinutes: 15,
    now: () => new Date('2025-03-10T12:00:00Z'),
  });
  return { handler, logsInsights, logger };
}

const event: AutomationEvent = {
  RestApiId: 'abc123',
  StageName: 'prod',
  ResourcePath: '/users',
  HttpMethod: 'get',
};

describe('automation handler', () => {
  test('returns the recommendation in the automation output shape', async () => {
    const { handler, logsInsights, logger } = setup();
    logsInsights.withGroup(EXECUTION_LOG_GROUP, [CONFIG_ERROR_LINE]);

    const output = await handler(event);

    expect(output).toEqual({
      Found: true,
      ArticleLink: 'https://example.com/config',
      Articles: ['https://example.com/config', 'https://example.com/vpc'],
      LogLine: CONFIG_ERROR_LINE,
      Message: [
        'Found the following error:',
        '',
        `Log: ${CONFIG_ERROR_LINE}`,
        '',
        'Recommended articles:',
        '- https://example.com/config',
        '- https://example.com/vpc',
      ].join('\n'),
    });
    expect(logger.messages).toEqual([
      { level: 'info', message: 'verify-api: REST API abc123 (users-api) exists' },
      { level: 'info', message: 'verify-stage: Stage prod exists' },
      { level: 'info', message: 'verify-resource: Resource /users exists (id res42)' },
      { level: 'info', message: 'verify-method: Method GET is configured' },
      { level: 'info', message: 'analyze-logs: Matched config-error' },
    ]);
  });

  test('defaults the window to the last configured minutes', async () => {
    const { handler, logsInsights } = setup();
    logsInsights.withGroup(EXECUTION_LOG_GROUP, []);

    await handler(event);

    expect(logsInsights.queries[0]?.window).toEqual({
      start: new Date('2025-03-10T11:45:00Z'),
      end: new Date('2025-03-10T12:00:00Z'),
    });
  });

  test('returns empty strings when nothing matched', async () => {
    const { handler, logsInsights } = setup();
    logsInsights.withGroup(EXECUTION_LOG_GROUP, ['Method completed with status: 200']);

    const output = await handler(event);

    expect(output).toEqual({
      Found: false,
      ArticleLink: '',
      Articles: [],
      LogLine: '',
      Message: 'No known error pattern found',
    });
  });

  test('throws the verifier error so the automation step fails', async () => {
    const { handler, logsInsights, logger } = setup();

    await expect(handler({ ...event, StageName: 'staging' })).rejects.toBeInstanceOf(StageNotFoundError);
    expect(logger.messages.at(-1)).toEqual({
      level: 'error',
      message: 'verify-stage: The API stage staging for API ID abc123 was not found.',
    });
    expect(logsInsights.queries).toHaveLength(0);
  });

  test('rejects missing parameters before calling AWS', async () => {
    const { handler, logger, logsInsights } = setup();

    await expect(handler({ ...event, RestApiId: undefined })).rejects.toThrow(
      new InvalidInputError('RestApiId is required')
    );
    expect(logger.messages).toEqual([{ level: 'error', message: 'input: RestApiId is required' }]);
    expect(logsInsights.queries).toHaveLength(0);
  });
});
