export type PipelineStep =
  | 'input'
  | 'verify-api'
  | 'verify-stage'
  | 'verify-resource'
  | 'verify-method'
  | 'analyze-logs';

export type TroubleshootingErrorCode =
  | 'INVALID_INPUT'
  | 'API_NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'STAGE_NOT_FOUND'
  | 'RESOURCE_NOT_FOUND'
  | 'METHOD_NOT_FOUND'
  | 'QUERY_TIMEOUT'
  | 'LOG_QUERY_FAILED'
  | 'PROVIDER_ERROR';

/**
 * Base class for every failure that halts a troubleshooting run.
 * The message is written for the operator reading the automation output.
 */
export abstract class TroubleshootingError extends Error {
  abstract readonly code: TroubleshootingErrorCode;
  readonly step: PipelineStep;

  constructor(step: PipelineStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.step = step;
  }
}

export class InvalidInputError extends TroubleshootingError {
  readonly code = 'INVALID_INPUT';

  constructor(message: string) {
    super('input', message);
  }
}

/** The REST API id does not resolve to an API in this account and region. */
export class NotFoundError extends TroubleshootingError {
  readonly code = 'API_NOT_FOUND';
  readonly restApiId: string;

  constructor(restApiId: string) {
    super('verify-api', `REST API ${restApiId} was not found.`);
    this.restApiId = restApiId;
  }
}

export class AccessDeniedError extends TroubleshootingError {
  readonly code = 'ACCESS_DENIED';
  readonly operation: string;

  constructor(step: PipelineStep, operation: string, options?: { cause?: unknown }) {
    super(step, `The IAM role is not authorized to call ${operation} on the provided resource.`, options);
    this.operation = operation;
  }
}

export class StageNotFoundError extends TroubleshootingError {
  readonly code = 'STAGE_NOT_FOUND';

  constructor(restApiId: string, stageName: string) {
    super('verify-stage', `The API stage ${stageName} for API ID ${restApiId} was not found.`);
  }
}

export class ResourceNotFoundError extends TroubleshootingError {
  readonly code = 'RESOURCE_NOT_FOUND';

  constructor(restApiId: string, resourcePath: string) {
    super('verify-resource', `Resource path ${resourcePath} was not found in API ${restApiId}.`);
  }
}

export class MethodNotFoundError extends TroubleshootingError {
  readonly code = 'METHOD_NOT_FOUND';

  constructor(restApiId: string, resourcePath: string, httpMethod: string) {
    super('verify-method', `Method ${httpMethod} is not configured for resource ${resourcePath} in API ${restApiId}.`);
  }
}

export class QueryTimeoutError extends TroubleshootingError {
  readonly code = 'QUERY_TIMEOUT';
  readonly logGroupName: string;

  constructor(logGroupName: string, detail: string) {
    super('analyze-logs', `CloudWatch Logs Insights query on ${logGroupName} timed out: ${detail}`);
    this.logGroupName = logGroupName;
  }
}

export class LogQueryFailedError extends TroubleshootingError {
  readonly code = 'LOG_QUERY_FAILED';
  readonly status: string;

  constructor(logGroupName: string, status: string) {
    super('analyze-logs', `CloudWatch Logs Insights query on ${logGroupName} failed with status: ${status}`);
    this.status = status;
  }
}

/** Any provider failure the pipeline has no specific meaning for. */
export class ProviderError extends TroubleshootingError {
  readonly code = 'PROVIDER_ERROR';

  constructor(step: PipelineStep, service: string, cause: unknown) {
    const detail = cause instanceof Error ? `${cause.name} - ${cause.message}` : String(cause);
    super(step, `Unexpected ${service} error: ${detail}`, { cause });
  }
}

export function isTroubleshootingError(error: unknown): error is TroubleshootingError {
  return error instanceof TroubleshootingError;
}
