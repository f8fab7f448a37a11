import type { LogsInsightsPort } from '../ports/outbound/logs-insights-port.js';
import type { ErrorPatternRepositoryPort } from '../ports/outbound/error-pattern-repository-port.js';
import type { LoggerPort } from '../ports/outbound/logger-port.js';
import type { ApiTarget, TimeWindow } from '../domain/entities/api-target.js';
import { executionLogGroupName, logGroupNameFromArn } from '../domain/entities/api-target.js';
import type { AccessLogFindings, AnalysisResult, StepOutcome } from '../domain/entities/analysis-result.js';
import { ACCESS_LOG_5XX_ARTICLE } from '../domain/entities/analysis-result.js';
import type { CompiledErrorPattern } from '../domain/entities/error-pattern.js';
import { compileErrorPattern } from '../domain/entities/error-pattern.js';
import { LogQueryFailedError, QueryTimeoutError } from '../domain/errors.js';
import { analyzeLogLines } from '../domain/services/log-analyzer.js';
import { ACCESS_LOG_5XX_QUERY, buildExecutionLogQuery } from '../domain/services/log-queries.js';
import { runStep } from './run-step.js';

export interface AnalyzeLogsInput {
  readonly target: ApiTarget;
  readonly window: TimeWindow;
  readonly requestId?: string;
  readonly logGroupName?: string;
  readonly accessLogDestinationArn?: string;
}

export class AnalyzeLogsUseCase {
  private compiledPatterns: readonly CompiledErrorPattern[] | null = null;

  constructor(
    private logsInsights: LogsInsightsPort,
    private patternRepository: ErrorPatternRepositoryPort,
    private logger: LoggerPort
  ) {}

  /**
   * The pattern table is loaded outside the step: a broken table is a
   * deployment problem and surfaces as a plain error, not as a diagnosis.
   */
  async execute(input: AnalyzeLogsInput): Promise<StepOutcome<AnalysisResult>> {
    const patterns = await this.loadPatterns();

    return runStep('analyze-logs', 'CloudWatch Logs', async () => {
      const accessLogFindings = input.accessLogDestinationArn
        ? await this.checkAccessLogs(input.accessLogDestinationArn, input.window)
        : undefined;

      const logGroupName = input.logGroupName
        ?? executionLogGroupName(input.target.restApiId, input.target.stageName);

      const result = await this.logsInsights.runQuery({
        logGroupName,
        queryString: buildExecutionLogQuery(input.requestId),
        window: input.window,
      });

      if (result === null) {
        this.logger.warn(`Log group ${logGroupName} does not exist.`);
        return analyzeLogLines(null, patterns, accessLogFindings);
      }

      if (result.status === 'Timeout') {
        throw new QueryTimeoutError(logGroupName, 'the provider reported status Timeout');
      }
      if (result.status !== 'Complete') {
        this.logger.error(`CloudWatch Log Insights query failed. Query status: ${result.status}`);
        throw new LogQueryFailedError(logGroupName, result.status);
      }

      return analyzeLogLines(result.lines, patterns, accessLogFindings);
    });
  }

  private async loadPatterns(): Promise<readonly CompiledErrorPattern[]> {
    if (!this.compiledPatterns) {
      const definitions = await this.patternRepository.loadPatterns();
      this.compiledPatterns = definitions.map(compileErrorPattern);
    }
    return this.compiledPatterns;
  }

  /**
   * Access logs only add context to the recommendation. A missing group, an
   * unfinished query or a local timeout there is reported and the run carries
   * on; any other failure fails the step.
   */
  private async checkAccessLogs(
    destinationArn: string,
    window: TimeWindow
  ): Promise<AccessLogFindings | undefined> {
    const logGroupName = logGroupNameFromArn(destinationArn);

    try {
      const result = await this.logsInsights.runQuery({
        logGroupName,
        queryString: ACCESS_LOG_5XX_QUERY,
        window,
      });

      if (result === null) {
        this.logger.warn(`Access log group ${logGroupName} does not exist.`);
        return undefined;
      }
      if (result.status !== 'Complete') {
        this.logger.warn(`Access log query on ${logGroupName} ended with status ${result.status}.`);
        return undefined;
      }
      if (result.lines.length === 0) {
        return undefined;
      }

      return {
        logGroupName,
        serverErrorCount: result.lines.length,
        article: ACCESS_LOG_5XX_ARTICLE,
        message: `5XX errors found in access logs. Recommended article for review:\n${ACCESS_LOG_5XX_ARTICLE}`,
      };
    } catch (error) {
      if (!(error instanceof QueryTimeoutError)) {
        throw error;
      }
      this.logger.warn(`Access log query on ${logGroupName} failed: ${error.message}`);
      return undefined;
    }
  }
}
