import type { TroubleshootingInput } from '../domain/entities/api-target.js';
import { HTTP_METHODS, isHttpMethod } from '../domain/entities/api-target.js';
import { InvalidInputError } from '../domain/errors.js';
import { resolveTimeWindow } from '../domain/services/time-window.js';

/** Raw parameters, as they arrive from the automation document or the prompts. */
export interface TroubleshootingParameters {
  readonly restApiId?: string;
  readonly stageName?: string;
  readonly resourcePath?: string;
  readonly httpMethod?: string;
  readonly startTime?: string;
  readonly endTime?: string;
  readonly requestId?: string;
  readonly logGroupName?: string;
}

export interface BuildInputOptions {
  readonly defaultWindowMinutes: number;
  readonly now?: Date;
}

function required(name: string, value: string | undefined): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new InvalidInputError(`${name} is required`);
  }
  return trimmed;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function buildTroubleshootingInput(
  params: TroubleshootingParameters,
  options: BuildInputOptions
): TroubleshootingInput {
  const restApiId = required('RestApiId', params.restApiId);
  const stageName = required('StageName', params.stageName);
  const resourcePath = required('ResourcePath', params.resourcePath);
  const httpMethod = required('HttpMethod', params.httpMethod).toUpperCase();

  if (!resourcePath.startsWith('/')) {
    throw new InvalidInputError(`ResourcePath must start with "/": ${resourcePath}`);
  }
  if (!isHttpMethod(httpMethod)) {
    throw new InvalidInputError(`HttpMethod must be one of ${HTTP_METHODS.join(', ')}: ${httpMethod}`);
  }

  const window = resolveTimeWindow({
    startTime: params.startTime,
    endTime: params.endTime,
    defaultWindowMinutes: options.defaultWindowMinutes,
    now: options.now,
  });

  return {
    target: { restApiId, stageName, resourcePath, httpMethod },
    window,
    requestId: optional(params.requestId),
    logGroupName: optional(params.logGroupName),
  };
}
