import type { AccessLogFindings, AnalysisResult } from '../entities/analysis-result.js';
import { NO_LOG_GROUP_MESSAGE, NO_MATCH_MESSAGE, createNoMatchResult } from '../entities/analysis-result.js';
import type { CompiledErrorPattern } from '../entities/error-pattern.js';
import { REDACTION_NOTICE } from '../entities/error-pattern.js';

export interface PatternMatch {
  readonly pattern: CompiledErrorPattern;
  readonly line: string;
}

/**
 * Find the first pattern, in table order, that matches any of the lines.
 * Table order wins over line order: a later line matching an earlier pattern
 * beats an earlier line matching a later pattern.
 */
export function findFirstMatch(
  lines: readonly string[],
  patterns: readonly CompiledErrorPattern[]
): PatternMatch | null {
  for (const pattern of patterns) {
    for (const line of lines) {
      const match = pattern.matcher.exec(line);
      if (match) {
        return { pattern, line: match[0] };
      }
    }
  }
  return null;
}

/**
 * Replace a matched line by the request id and error phrase captured by the
 * pattern's redaction expression.
 */
export function redactLogLine(pattern: CompiledErrorPattern, line: string): string {
  if (!pattern.redactor) {
    return line;
  }

  const captured = pattern.redactor.exec(line);
  if (!captured) {
    return REDACTION_NOTICE;
  }

  const groups = captured.slice(1).filter((group): group is string => group !== undefined);
  return [...groups, REDACTION_NOTICE].join(' ');
}

export function formatFoundMessage(
  logLine: string,
  articles: readonly string[],
  accessLogFindings?: AccessLogFindings
): string {
  const articleList = articles.map(article => `- ${article}`).join('\n');
  const message = `Found the following error:\n\nLog: ${logLine}\n\nRecommended articles:\n${articleList}`;
  return appendAccessLogFindings(message, accessLogFindings);
}

function appendAccessLogFindings(message: string, findings?: AccessLogFindings): string {
  if (!findings) {
    return message;
  }
  return `${message}\n\n${findings.message}`;
}

/**
 * Match execution log lines against the signature table.
 *
 * `lines` is null when the log group does not exist, which is reported
 * separately from a log group with nothing recognisable in it.
 */
export function analyzeLogLines(
  lines: readonly string[] | null,
  patterns: readonly CompiledErrorPattern[],
  accessLogFindings?: AccessLogFindings
): AnalysisResult {
  if (lines === null) {
    return createNoMatchResult(appendAccessLogFindings(NO_LOG_GROUP_MESSAGE, accessLogFindings), accessLogFindings);
  }

  const match = findFirstMatch(lines, patterns);
  if (!match) {
    return createNoMatchResult(appendAccessLogFindings(NO_MATCH_MESSAGE, accessLogFindings), accessLogFindings);
  }

  const { definition } = match.pattern;
  const logLine = definition.redact ? redactLogLine(match.pattern, match.line) : match.line;

  return {
    found: true,
    articleLink: definition.articles[0],
    articles: definition.articles,
    patternId: definition.id,
    patternName: definition.name,
    logLine,
    message: formatFoundMessage(logLine, definition.articles, accessLogFindings),
    accessLogFindings,
  };
}
