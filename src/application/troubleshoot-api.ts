import type { TroubleshootHooks, TroubleshootPort } from '../ports/inbound/troubleshoot-port.js';
import type { ApiGatewayPort } from '../ports/outbound/api-gateway-port.js';
import type { LogsInsightsPort } from '../ports/outbound/logs-insights-port.js';
import type { ErrorPatternRepositoryPort } from '../ports/outbound/error-pattern-repository-port.js';
import type { LoggerPort } from '../ports/outbound/logger-port.js';
import type { TroubleshootingInput } from '../domain/entities/api-target.js';
import type {
  AnalysisResult,
  StepOutcome,
  StepRecord,
  TroubleshootingReport,
} from '../domain/entities/analysis-result.js';
import type { PipelineStep } from '../domain/errors.js';
import type { MethodSummary, StageSummary } from '../ports/outbound/api-gateway-port.js';
import { VerifyApiUseCase } from './verify-api.js';
import { VerifyStageUseCase } from './verify-stage.js';
import { VerifyResourceUseCase } from './verify-resource.js';
import { VerifyMethodUseCase } from './verify-method.js';
import { AnalyzeLogsUseCase } from './analyze-logs.js';

function describeStage(stage: StageSummary): string {
  const deployment = stage.deploymentId ? ` (deployment ${stage.deploymentId})` : '';
  const accessLogs = stage.accessLogDestinationArn ? ' with access logging' : '';
  return `Stage ${stage.stageName} exists${deployment}${accessLogs}`;
}

function describeMethod(method: MethodSummary): string {
  const settings: string[] = [];
  if (method.integrationType) settings.push(`integration ${method.integrationType}`);
  if (method.authorizationType) settings.push(`authorization ${method.authorizationType}`);
  const suffix = settings.length > 0 ? ` (${settings.join(', ')})` : '';
  return `Method ${method.httpMethod} is configured${suffix}`;
}

export interface TroubleshootApiDependencies {
  apiGateway: ApiGatewayPort;
  logsInsights: LogsInsightsPort;
  patternRepository: ErrorPatternRepositoryPort;
  logger: LoggerPort;
}

/**
 * API -> stage -> resource -> method -> logs. Each verifier gates the next
 * and the first failure ends the run.
 */
export class TroubleshootApiUseCase implements TroubleshootPort {
  private verifyApi: VerifyApiUseCase;
  private verifyStage: VerifyStageUseCase;
  private verifyResource: VerifyResourceUseCase;
  private verifyMethod: VerifyMethodUseCase;
  private analyzeLogs: AnalyzeLogsUseCase;

  constructor(deps: TroubleshootApiDependencies) {
    this.verifyApi = new VerifyApiUseCase(deps.apiGateway, deps.logger);
    this.verifyStage = new VerifyStageUseCase(deps.apiGateway, deps.logger);
    this.verifyResource = new VerifyResourceUseCase(deps.apiGateway, deps.logger);
    this.verifyMethod = new VerifyMethodUseCase(deps.apiGateway, deps.logger);
    this.analyzeLogs = new AnalyzeLogsUseCase(deps.logsInsights, deps.patternRepository, deps.logger);
  }

  async run(input: TroubleshootingInput, hooks: TroubleshootHooks = {}): Promise<TroubleshootingReport> {
    const { target } = input;
    const steps: StepRecord[] = [];

    const track = async <T>(
      step: PipelineStep,
      describe: (value: T) => string,
      body: () => Promise<StepOutcome<T>>
    ): Promise<StepOutcome<T>> => {
      hooks.onStepStart?.(step);
      const startedAt = Date.now();
      const outcome = await body();
      const record: StepRecord = {
        step,
        status: outcome.ok ? 'passed' : 'failed',
        durationMs: Date.now() - startedAt,
        detail: outcome.ok ? describe(outcome.value) : outcome.error.message,
      };
      steps.push(record);
      hooks.onStepComplete?.(record);
      return outcome;
    };

    const report = (outcome: StepOutcome<AnalysisResult>): TroubleshootingReport => ({
      input,
      steps,
      outcome,
    });

    const api = await track(
      'verify-api',
      value => `REST API ${value.id}${value.name ? ` (${value.name})` : ''} exists`,
      () => this.verifyApi.execute(target.restApiId)
    );
    if (!api.ok) return report(api);

    const stage = await track(
      'verify-stage',
      describeStage,
      () => this.verifyStage.execute(target.restApiId, target.stageName)
    );
    if (!stage.ok) return report(stage);

    const resource = await track(
      'verify-resource',
      value => `Resource ${value.path} exists (id ${value.id})`,
      () => this.verifyResource.execute(target.restApiId, target.resourcePath)
    );
    if (!resource.ok) return report(resource);

    const method = await track(
      'verify-method',
      describeMethod,
      () => this.verifyMethod.execute(target.restApiId, resource.value, target.httpMethod)
    );
    if (!method.ok) return report(method);

    const analysis = await track(
      'analyze-logs',
      value => (value.found ? `Matched ${value.patternName ?? value.patternId ?? 'known error'}` : value.message),
      () =>
        this.analyzeLogs.execute({
          target,
          window: input.window,
          requestId: input.requestId,
          logGroupName: input.logGroupName,
          accessLogDestinationArn: stage.value.accessLogDestinationArn,
        })
    );

    return report(analysis);
  }
}

export function createTroubleshootApiUseCase(deps: TroubleshootApiDependencies): TroubleshootApiUseCase {
  return new TroubleshootApiUseCase(deps);
}
