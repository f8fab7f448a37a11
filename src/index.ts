#!/usr/bin/env node
/**
 * API Gateway Troubleshooter
 *
 * Verifies that a REST API stage, resource and method exist, then scans the
 * stage's execution logs for known errors and points at the matching
 * Knowledge Center articles.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';

import { loadConfig, validateConfig } from './config/index.js';
import {
  createApiGatewayAdapter,
  createLogsInsightsAdapter,
  createStsCredentialsChecker,
} from './adapters/outbound/aws/index.js';
import { createYamlErrorPatternRepository } from './adapters/outbound/filesystem/index.js';
import { createConsoleLogger } from './adapters/outbound/console/index.js';
import { createTuiWorkflow, createRunLogger } from './adapters/inbound/cli/index.js';
import { createTroubleshootApiUseCase } from './application/troubleshoot-api.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    console.error(pc.red('Configuration errors:'));
    for (const error of configErrors) {
      console.error(pc.red(`  - ${error}`));
    }
    return 1;
  }

  const logger = createConsoleLogger();
  const patternRepository = createYamlErrorPatternRepository(config.patternsPath);
  const troubleshooter = createTroubleshootApiUseCase({
    apiGateway: createApiGatewayAdapter(config.region),
    logsInsights: createLogsInsightsAdapter({
      region: config.region,
      logger,
      pollIntervalMs: config.queryPollIntervalMs,
      backoffRate: config.queryBackoffRate,
      maxWaitMs: config.queryMaxWaitMs,
    }),
    patternRepository,
    logger,
  });

  const workflow = createTuiWorkflow({
    troubleshooter,
    credentials: createStsCredentialsChecker(config.region),
    runLogger: createRunLogger(config.runLogDir),
    defaultWindowMinutes: config.defaultWindowMinutes,
    region: config.region,
  });

  // Surface a broken pattern table before asking for any input
  const patterns = await patternRepository.loadPatterns();

  if (!(await workflow.initialize())) {
    return 1;
  }
  p.log.info(`Loaded ${patterns.length} known error patterns from ${pc.dim(patternRepository.getSourcePath())}`);

  let exitCode = await workflow.run();
  while (await askRunAgain()) {
    exitCode = await workflow.run();
  }
  return exitCode;
}

async function askRunAgain(): Promise<boolean> {
  const action = await p.select({
    message: 'What would you like to do?',
    options: [
      { value: 'again', label: 'Troubleshoot another method' },
      { value: 'exit', label: 'Exit' },
    ],
  });

  return !p.isCancel(action) && action === 'again';
}

main()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    p.log.error(pc.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  });
