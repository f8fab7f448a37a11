import {
  APIGatewayClient,
  GetMethodCommand,
  GetResourcesCommand,
  GetRestApiCommand,
  GetStageCommand,
} from '@aws-sdk/client-api-gateway';
import type {
  ApiGatewayPort,
  MethodSummary,
  ResourceSummary,
  RestApiSummary,
  StageSummary,
} from '../../../ports/outbound/api-gateway-port.js';
import type { HttpMethod } from '../../../domain/entities/api-target.js';
import type { PipelineStep } from '../../../domain/errors.js';
import { AccessDeniedError } from '../../../domain/errors.js';
import { isNotFound, isUnauthorized } from './service-errors.js';

export class ApiGatewayAdapter implements ApiGatewayPort {
  private client: APIGatewayClient;

  constructor(region: string, client?: APIGatewayClient) {
    this.client = client ?? new APIGatewayClient({ region });
  }

  async getRestApi(restApiId: string): Promise<RestApiSummary | null> {
    try {
      const response = await this.client.send(new GetRestApiCommand({ restApiId }));
      if (!response.id) {
        return null;
      }
      return { id: response.id, name: response.name };
    } catch (error) {
      return this.handleLookupError(error, 'verify-api', 'apigateway:GetRestApi');
    }
  }

  async getStage(restApiId: string, stageName: string): Promise<StageSummary | null> {
    try {
      const response = await this.client.send(new GetStageCommand({ restApiId, stageName }));
      if (!response.stageName) {
        return null;
      }
      return {
        stageName: response.stageName,
        deploymentId: response.deploymentId,
        accessLogDestinationArn: response.accessLogSettings?.destinationArn,
      };
    } catch (error) {
      return this.handleLookupError(error, 'verify-stage', 'apigateway:GetStage');
    }
  }

  async findResourceByPath(restApiId: string, resourcePath: string): Promise<ResourceSummary | null> {
    let position: string | undefined;

    try {
      do {
        const command = new GetResourcesCommand({
          restApiId,
          position,
          limit: 500,
        });

        const response = await this.client.send(command);
        position = response.position;

        const match = (response.items ?? []).find(item => item.path === resourcePath);
        if (match?.id && match.path) {
          return { id: match.id, path: match.path };
        }
      } while (position);
    } catch (error) {
      return this.handleLookupError(error, 'verify-resource', 'apigateway:GetResources');
    }

    return null;
  }

  async getMethod(restApiId: string, resourceId: string, httpMethod: HttpMethod): Promise<MethodSummary | null> {
    try {
      const response = await this.client.send(
        new GetMethodCommand({ restApiId, resourceId, httpMethod })
      );
      if (!response.httpMethod) {
        return null;
      }
      return {
        httpMethod: response.httpMethod,
        authorizationType: response.authorizationType,
        integrationType: response.methodIntegration?.type,
      };
    } catch (error) {
      return this.handleLookupError(error, 'verify-method', 'apigateway:GetMethod');
    }
  }

  private handleLookupError(error: unknown, step: PipelineStep, operation: string): null {
    if (isNotFound(error)) {
      return null;
    }
    if (isUnauthorized(error)) {
      throw new AccessDeniedError(step, operation, { cause: error });
    }
    throw error;
  }
}

export function createApiGatewayAdapter(region: string): ApiGatewayPort {
  return new ApiGatewayAdapter(region);
}
