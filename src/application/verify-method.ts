import type { ApiGatewayPort, MethodSummary, ResourceSummary } from '../ports/outbound/api-gateway-port.js';
import type { LoggerPort } from '../ports/outbound/logger-port.js';
import type { HttpMethod } from '../domain/entities/api-target.js';
import type { StepOutcome } from '../domain/entities/analysis-result.js';
import { MethodNotFoundError } from '../domain/errors.js';
import { runStep } from './run-step.js';

export class VerifyMethodUseCase {
  constructor(
    private apiGateway: ApiGatewayPort,
    private logger: LoggerPort
  ) {}

  async execute(
    restApiId: string,
    resource: ResourceSummary,
    httpMethod: HttpMethod
  ): Promise<StepOutcome<MethodSummary>> {
    return runStep('verify-method', 'API Gateway', async () => {
      const method = await this.apiGateway.getMethod(restApiId, resource.id, httpMethod);

      if (!method || method.httpMethod !== httpMethod) {
        this.logger.warn(`Method ${httpMethod} not found for resource ${resource.id} in API ${restApiId}.`);
        throw new MethodNotFoundError(restApiId, resource.path, httpMethod);
      }

      return method;
    });
  }
}
