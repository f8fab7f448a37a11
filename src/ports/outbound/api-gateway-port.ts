import type { HttpMethod } from '../../domain/entities/api-target.js';

export interface RestApiSummary {
  readonly id: string;
  readonly name?: string;
}

export interface StageSummary {
  readonly stageName: string;
  readonly deploymentId?: string;
  /** Destination ARN from the stage's access log settings, when configured. */
  readonly accessLogDestinationArn?: string;
}

export interface ResourceSummary {
  readonly id: string;
  readonly path: string;
}

export interface MethodSummary {
  readonly httpMethod: string;
  readonly authorizationType?: string;
  readonly integrationType?: string;
}

/**
 * Read-only view of the API Gateway control plane. Lookups resolve to null
 * when the provider reports the entity as missing; authorization and
 * unexpected failures are thrown as troubleshooting errors.
 */
export interface ApiGatewayPort {
  getRestApi(restApiId: string): Promise<RestApiSummary | null>;

  getStage(restApiId: string, stageName: string): Promise<StageSummary | null>;

  findResourceByPath(restApiId: string, resourcePath: string): Promise<ResourceSummary | null>;

  getMethod(restApiId: string, resourceId: string, httpMethod: HttpMethod): Promise<MethodSummary | null>;
}
