import type { TroubleshootPort } from '../../../ports/inbound/troubleshoot-port.js';
import type { LoggerPort } from '../../../ports/outbound/logger-port.js';
import type { TroubleshootingInput } from '../../../domain/entities/api-target.js';
import { isTroubleshootingError } from '../../../domain/errors.js';
import { buildTroubleshootingInput } from '../../../application/build-input.js';
import { createTroubleshootApiUseCase } from '../../../application/troubleshoot-api.js';
import { loadConfig, validateConfig } from '../../../config/index.js';
import { createApiGatewayAdapter, createLogsInsightsAdapter } from '../../outbound/aws/index.js';
import { createYamlErrorPatternRepository } from '../../outbound/filesystem/index.js';
import { createConsoleLogger } from '../../outbound/console/index.js';

/** Parameters passed by the Systems Manager Automation step. */
export interface AutomationEvent {
  RestApiId?: string;
  StageName?: string;
  ResourcePath?: string;
  HttpMethod?: string;
  StartTime?: string;
  EndTime?: string;
  RequestId?: string;
  LogGroupName?: string;
}

export interface AutomationOutput {
  Found: boolean;
  ArticleLink: string;
  Articles: string[];
  LogLine: string;
  Message: string;
}

export interface AutomationHandlerDependencies {
  troubleshooter: TroubleshootPort;
  logger: LoggerPort;
  defaultWindowMinutes: number;
  now?: () => Date;
}

export type AutomationHandler = (event: AutomationEvent) => Promise<AutomationOutput>;

/**
 * Any verifier failure is thrown so that the automation document stops at
 * this step with the error message as its failure reason.
 */
export function createAutomationHandler(deps: AutomationHandlerDependencies): AutomationHandler {
  return async event => {
    let input: TroubleshootingInput;
    try {
      input = buildTroubleshootingInput(
        {
          restApiId: event.RestApiId,
          stageName: event.StageName,
          resourcePath: event.ResourcePath,
          httpMethod: event.HttpMethod,
          startTime: event.StartTime,
          endTime: event.EndTime,
          requestId: event.RequestId,
          logGroupName: event.LogGroupName,
        },
        { defaultWindowMinutes: deps.defaultWindowMinutes, now: deps.now?.() }
      );
    } catch (error) {
      if (isTroubleshootingError(error)) {
        deps.logger.error(`${error.step}: ${error.message}`);
      }
      throw error;
    }

    const report = await deps.troubleshooter.run(input, {
      onStepComplete: record => {
        if (record.status === 'passed') {
          deps.logger.info(`${record.step}: ${record.detail}`);
        }
      },
    });

    if (!report.outcome.ok) {
      deps.logger.error(`${report.outcome.error.step}: ${report.outcome.error.message}`);
      throw report.outcome.error;
    }

    const result = report.outcome.value;
    return {
      Found: result.found,
      ArticleLink: result.articleLink ?? '',
      Articles: [...result.articles],
      LogLine: result.logLine ?? '',
      Message: result.message,
    };
  };
}

let defaultHandler: AutomationHandler | null = null;

function createDefaultHandler(): AutomationHandler {
  const config = loadConfig();
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    throw new Error(`Configuration errors: ${configErrors.join('; ')}`);
  }

  const logger = createConsoleLogger({ color: false });
  const troubleshooter = createTroubleshootApiUseCase({
    apiGateway: createApiGatewayAdapter(config.region),
    logsInsights: createLogsInsightsAdapter({
      region: config.region,
      logger,
      pollIntervalMs: config.queryPollIntervalMs,
      backoffRate: config.queryBackoffRate,
      maxWaitMs: config.queryMaxWaitMs,
    }),
    patternRepository: createYamlErrorPatternRepository(config.patternsPath),
    logger,
  });

  return createAutomationHandler({
    troubleshooter,
    logger,
    defaultWindowMinutes: config.defaultWindowMinutes,
  });
}

export async function handler(event: AutomationEvent): Promise<AutomationOutput> {
  defaultHandler ??= createDefaultHandler();
  return defaultHandler(event);
}
