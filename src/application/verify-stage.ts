import type { ApiGatewayPort, StageSummary } from '../ports/outbound/api-gateway-port.js';
import type { LoggerPort } from '../ports/outbound/logger-port.js';
import type { StepOutcome } from '../domain/entities/analysis-result.js';
import { StageNotFoundError } from '../domain/errors.js';
import { runStep } from './run-step.js';

export class VerifyStageUseCase {
  constructor(
    private apiGateway: ApiGatewayPort,
    private logger: LoggerPort
  ) {}

  async execute(restApiId: string, stageName: string): Promise<StepOutcome<StageSummary>> {
    return runStep('verify-stage', 'API Gateway', async () => {
      const stage = await this.apiGateway.getStage(restApiId, stageName);

      if (!stage || stage.stageName !== stageName) {
        this.logger.warn(`The API stage ${stageName} for API ID ${restApiId} was not found.`);
        throw new StageNotFoundError(restApiId, stageName);
      }

      return stage;
    });
  }
}
