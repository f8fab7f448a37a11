import {
  CloudWatchLogsClient,
  GetQueryResultsCommand,
  StartQueryCommand,
  StopQueryCommand,
  type GetQueryResultsCommandOutput,
  type ResultField,
} from '@aws-sdk/client-cloudwatch-logs';
import type {
  LogsInsightsPort,
  LogsInsightsQuery,
  LogsInsightsQueryResult,
  LogsInsightsQueryStatus,
} from '../../../ports/outbound/logs-insights-port.js';
import type { LoggerPort } from '../../../ports/outbound/logger-port.js';
import { AccessDeniedError, LogQueryFailedError, QueryTimeoutError } from '../../../domain/errors.js';
import { toEpochSeconds } from '../../../domain/services/time-window.js';
import { hasServiceErrorName, isUnauthorized } from './service-errors.js';

export interface LogsInsightsAdapterOptions {
  region: string;
  logger: LoggerPort;
  /** First wait between result polls; grows by `backoffRate` each round. */
  pollIntervalMs: number;
  backoffRate: number;
  /** Total polling budget before the query is stopped. */
  maxWaitMs: number;
  client?: CloudWatchLogsClient;
  sleep?: (ms: number) => Promise<void>;
}

const PENDING_STATUSES: ReadonlySet<LogsInsightsQueryStatus> = new Set(['Scheduled', 'Running']);

function toQueryStatus(status: string | undefined): LogsInsightsQueryStatus {
  switch (status) {
    case 'Scheduled':
    case 'Running':
    case 'Complete':
    case 'Failed':
    case 'Cancelled':
    case 'Timeout':
      return status;
    default:
      return 'Unknown';
  }
}

function rowMessage(row: readonly ResultField[]): string | undefined {
  const message = row.find(field => field.field === '@message') ?? row[0];
  return message?.value;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class LogsInsightsAdapter implements LogsInsightsPort {
  private client: CloudWatchLogsClient;
  private logger: LoggerPort;
  private pollIntervalMs: number;
  private backoffRate: number;
  private maxWaitMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: LogsInsightsAdapterOptions) {
    this.client = options.client ?? new CloudWatchLogsClient({ region: options.region });
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs;
    this.backoffRate = options.backoffRate;
    this.maxWaitMs = options.maxWaitMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async runQuery(query: LogsInsightsQuery): Promise<LogsInsightsQueryResult | null> {
    const queryId = await this.startQuery(query);
    if (queryId === null) {
      return null;
    }

    let response = await this.getResults(queryId);
    let status = toQueryStatus(response.status);
    let waited = 0;
    let wait = this.pollIntervalMs;

    while (PENDING_STATUSES.has(status)) {
      if (waited + wait > this.maxWaitMs) {
        await this.stopQuery(queryId);
        throw new QueryTimeoutError(query.logGroupName, `no result after ${waited} ms`);
      }

      await this.sleep(wait);
      waited += wait;
      wait *= this.backoffRate;

      response = await this.getResults(queryId);
      status = toQueryStatus(response.status);
    }

    const lines: string[] = [];
    for (const row of response.results ?? []) {
      const message = rowMessage(row);
      if (message !== undefined) {
        lines.push(message);
      }
    }

    return { status, lines };
  }

  private async startQuery(query: LogsInsightsQuery): Promise<string | null> {
    try {
      const response = await this.client.send(
        new StartQueryCommand({
          logGroupName: query.logGroupName,
          queryString: query.queryString,
          startTime: toEpochSeconds(query.window.start),
          endTime: toEpochSeconds(query.window.end),
        })
      );

      if (!response.queryId) {
        throw new LogQueryFailedError(query.logGroupName, 'Unknown');
      }
      return response.queryId;
    } catch (error) {
      if (hasServiceErrorName(error, 'ResourceNotFoundException')) {
        return null;
      }
      if (isUnauthorized(error)) {
        throw new AccessDeniedError('analyze-logs', 'logs:StartQuery', { cause: error });
      }
      throw error;
    }
  }

  private async getResults(queryId: string): Promise<GetQueryResultsCommandOutput> {
    return this.client.send(new GetQueryResultsCommand({ queryId }));
  }

  private async stopQuery(queryId: string): Promise<void> {
    try {
      await this.client.send(new StopQueryCommand({ queryId }));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Could not stop Logs Insights query ${queryId}: ${errorMessage}`);
    }
  }
}

export function createLogsInsightsAdapter(options: LogsInsightsAdapterOptions): LogsInsightsPort {
  return new LogsInsightsAdapter(options);
}
