import type { ApiGatewayPort, ResourceSummary } from '../ports/outbound/api-gateway-port.js';
import type { LoggerPort } from '../ports/outbound/logger-port.js';
import type { StepOutcome } from '../domain/entities/analysis-result.js';
import { ResourceNotFoundError } from '../domain/errors.js';
import { runStep } from './run-step.js';

export class VerifyResourceUseCase {
  constructor(
    private apiGateway: ApiGatewayPort,
    private logger: LoggerPort
  ) {}

  async execute(restApiId: string, resourcePath: string): Promise<StepOutcome<ResourceSummary>> {
    return runStep('verify-resource', 'API Gateway', async () => {
      const resource = await this.apiGateway.findResourceByPath(restApiId, resourcePath);

      if (!resource) {
        this.logger.warn(`Resource ${resourcePath} was not found in API ${restApiId}.`);
        throw new ResourceNotFoundError(restApiId, resourcePath);
      }

      return resource;
    });
  }
}
