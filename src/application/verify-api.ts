import type { ApiGatewayPort, RestApiSummary } from '../ports/outbound/api-gateway-port.js';
import type { LoggerPort } from '../ports/outbound/logger-port.js';
import type { StepOutcome } from '../domain/entities/analysis-result.js';
import { NotFoundError } from '../domain/errors.js';
import { runStep } from './run-step.js';

export class VerifyApiUseCase {
  constructor(
    private apiGateway: ApiGatewayPort,
    private logger: LoggerPort
  ) {}

  async execute(restApiId: string): Promise<StepOutcome<RestApiSummary>> {
    return runStep('verify-api', 'API Gateway', async () => {
      const api = await this.apiGateway.getRestApi(restApiId);

      if (!api || api.id !== restApiId) {
        this.logger.warn(`API ${restApiId} was not found.`);
        throw new NotFoundError(restApiId);
      }

      return api;
    });
  }
}
