import * as fs from 'fs';
import * as path from 'path';
import type { TroubleshootingParameters } from '../../../application/build-input.js';
import type { AnalysisResult, StepOutcome, StepRecord } from '../../../domain/entities/analysis-result.js';
import type { PipelineStep } from '../../../domain/errors.js';

export type RunLogOutcome =
  | { readonly ok: true; readonly result: AnalysisResult }
  | { readonly ok: false; readonly code: string; readonly step: PipelineStep; readonly message: string };

export interface RunLogDocument {
  readonly sessionId: string;
  readonly startedAt: string;
  parameters?: TroubleshootingParameters;
  readonly steps: StepRecord[];
  outcome?: RunLogOutcome;
}

/**
 * One troubleshooting run written to `<sessionId>.json`. The file is
 * rewritten after every record so an interrupted run still leaves a trace.
 */
export class RunLogSession {
  readonly filePath: string;
  private document: RunLogDocument;

  constructor(logsDir: string, startedAt: Date) {
    const sessionId = startedAt.toISOString().replace(/[:.]/g, '-');
    this.filePath = path.join(logsDir, `${sessionId}.json`);
    this.document = { sessionId, startedAt: startedAt.toISOString(), steps: [] };
  }

  recordParameters(parameters: TroubleshootingParameters): void {
    this.document.parameters = parameters;
    this.flush();
  }

  recordStep(record: StepRecord): void {
    this.document.steps.push(record);
    this.flush();
  }

  /** Returns the path of the written file. */
  finish(outcome: StepOutcome<AnalysisResult>): string {
    this.document.outcome = outcome.ok
      ? { ok: true, result: outcome.value }
      : { ok: false, code: outcome.error.code, step: outcome.error.step, message: outcome.error.message };
    this.flush();
    return this.filePath;
  }

  private flush(): void {
    fs.writeFileSync(this.filePath, JSON.stringify(this.document, null, 2));
  }
}

export class RunLogger {
  private logsDir: string;

  constructor(logsDir: string) {
    this.logsDir = logsDir;
    if (!fs.existsSync(this.logsDir)) {
      fs.mkdirSync(this.logsDir, { recursive: true });
    }
  }

  startRun(now: Date = new Date()): RunLogSession {
    return new RunLogSession(this.logsDir, now);
  }
}

export function createRunLogger(logsDir: string | undefined): RunLogger | null {
  return logsDir ? new RunLogger(logsDir) : null;
}
