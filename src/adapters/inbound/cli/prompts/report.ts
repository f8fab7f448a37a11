import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { AnalysisResult, TroubleshootingReport } from '../../../../domain/entities/analysis-result.js';

function formatWindow(report: TroubleshootingReport): string {
  const { start, end } = report.input.window;
  return `${start.toISOString()} → ${end.toISOString()}`;
}

function renderAnalysis(result: AnalysisResult): void {
  if (!result.found) {
    p.log.success(result.message);
    return;
  }

  const lines = [
    `${pc.bold('Pattern:')} ${result.patternName ?? result.patternId ?? 'unknown'}`,
    `${pc.bold('Log:')}     ${result.logLine ?? ''}`,
    '',
    pc.bold('Recommended articles:'),
    ...result.articles.map(article => `  ${pc.cyan(article)}`),
  ];
  p.note(lines.join('\n'), pc.red('Known error found'));
}

/** Print the report and return the process exit code. */
export function renderReport(report: TroubleshootingReport): number {
  const { target } = report.input;
  p.log.info(
    `${target.httpMethod} ${target.resourcePath} on ${target.restApiId}/${target.stageName}\n${pc.dim(formatWindow(report))}`
  );

  for (const step of report.steps) {
    const label = `${step.step} ${pc.dim(`(${step.durationMs} ms)`)}`;
    if (step.status === 'passed') {
      p.log.step(`${pc.green('✓')} ${label}: ${step.detail}`);
    } else {
      p.log.error(`${pc.red('✗')} ${label}: ${step.detail}`);
    }
  }

  if (!report.outcome.ok) {
    p.log.error(pc.red(`${report.outcome.error.name}: ${report.outcome.error.message}`));
    return 1;
  }

  const result = report.outcome.value;
  renderAnalysis(result);
  // A negative message already ends with the access log note
  if (result.found && result.accessLogFindings) {
    p.log.warn(result.accessLogFindings.message);
  }
  return 0;
}
