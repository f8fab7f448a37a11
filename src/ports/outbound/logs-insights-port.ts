import type { TimeWindow } from '../../domain/entities/api-target.js';

export interface LogsInsightsQuery {
  readonly logGroupName: string;
  readonly queryString: string;
  readonly window: TimeWindow;
}

export type LogsInsightsQueryStatus =
  | 'Scheduled'
  | 'Running'
  | 'Complete'
  | 'Failed'
  | 'Cancelled'
  | 'Timeout'
  | 'Unknown';

export interface LogsInsightsQueryResult {
  readonly status: LogsInsightsQueryStatus;
  readonly lines: readonly string[];
}

export interface LogsInsightsPort {
  /**
   * Run a query to completion. Resolves to null when the log group does not
   * exist. A query that ends in any status other than Complete is returned
   * as-is; the caller decides whether that is fatal.
   */
  runQuery(query: LogsInsightsQuery): Promise<LogsInsightsQueryResult | null>;
}
