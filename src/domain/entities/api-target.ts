export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS', 'ANY'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * The REST API method being diagnosed, as supplied by the automation document.
 */
export interface ApiTarget {
  readonly restApiId: string;
  readonly stageName: string;
  readonly resourcePath: string;
  readonly httpMethod: HttpMethod;
}

export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

export interface TroubleshootingInput {
  readonly target: ApiTarget;
  readonly window: TimeWindow;
  readonly requestId?: string;
  /** Overrides the stage's execution log group. */
  readonly logGroupName?: string;
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}

export function executionLogGroupName(restApiId: string, stageName: string): string {
  return `API-Gateway-Execution-Logs_${restApiId}/${stageName}`;
}

/**
 * Access log settings carry a destination ARN; Logs Insights wants the bare
 * group name, which is the last ARN segment.
 */
export function logGroupNameFromArn(destinationArn: string): string {
  const segments = destinationArn.split(':');
  return segments[segments.length - 1] ?? destinationArn;
}
