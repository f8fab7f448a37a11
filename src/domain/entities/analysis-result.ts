import type { PipelineStep, TroubleshootingError } from '../errors.js';
import type { TroubleshootingInput } from './api-target.js';

export const NO_MATCH_MESSAGE = 'No known error pattern found';
export const NO_LOG_GROUP_MESSAGE = 'No log group was found for the API.';
export const ACCESS_LOG_5XX_ARTICLE = 'https://repost.aws/knowledge-center/api-gateway-find-5xx-errors-cloudwatch';

export interface AccessLogFindings {
  readonly logGroupName: string;
  readonly serverErrorCount: number;
  readonly article: string;
  readonly message: string;
}

export interface AnalysisResult {
  readonly found: boolean;
  readonly articleLink?: string;
  readonly articles: readonly string[];
  readonly patternId?: string;
  readonly patternName?: string;
  readonly logLine?: string;
  readonly message: string;
  readonly accessLogFindings?: AccessLogFindings;
}

export type StepOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: TroubleshootingError };

export function succeeded<T>(value: T): StepOutcome<T> {
  return { ok: true, value };
}

export function failed<T>(error: TroubleshootingError): StepOutcome<T> {
  return { ok: false, error };
}

export interface StepRecord {
  readonly step: PipelineStep;
  readonly status: 'passed' | 'failed';
  readonly durationMs: number;
  readonly detail: string;
}

export interface TroubleshootingReport {
  readonly input: TroubleshootingInput;
  readonly steps: readonly StepRecord[];
  readonly outcome: StepOutcome<AnalysisResult>;
}

export function createNoMatchResult(
  message: string = NO_MATCH_MESSAGE,
  accessLogFindings?: AccessLogFindings
): AnalysisResult {
  return { found: false, articles: [], message, accessLogFindings };
}
