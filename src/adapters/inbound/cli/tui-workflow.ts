import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { TroubleshootPort } from '../../../ports/inbound/troubleshoot-port.js';
import type { TroubleshootingParameters } from '../../../application/build-input.js';
import { buildTroubleshootingInput } from '../../../application/build-input.js';
import type { TroubleshootingInput } from '../../../domain/entities/api-target.js';
import type { AnalysisResult, StepOutcome, TroubleshootingReport } from '../../../domain/entities/analysis-result.js';
import { failed } from '../../../domain/entities/analysis-result.js';
import type { PipelineStep } from '../../../domain/errors.js';
import { isTroubleshootingError } from '../../../domain/errors.js';
import type { StsCredentialsChecker } from '../../outbound/aws/credentials-checker.js';
import type { RunLogger, RunLogSession } from './run-logger.js';
import { runApiTargetPrompt, renderReport } from './prompts/index.js';

const STEP_LABELS: Record<PipelineStep, string> = {
  'input': 'Validating parameters',
  'verify-api': 'Checking REST API',
  'verify-stage': 'Checking stage',
  'verify-resource': 'Checking resource path',
  'verify-method': 'Checking HTTP method',
  'analyze-logs': 'Querying execution logs',
};

export interface TuiWorkflowDependencies {
  troubleshooter: TroubleshootPort;
  credentials: StsCredentialsChecker;
  runLogger: RunLogger | null;
  defaultWindowMinutes: number;
  region: string;
}

export class TuiWorkflow {
  private deps: TuiWorkflowDependencies;

  constructor(deps: TuiWorkflowDependencies) {
    this.deps = deps;
  }

  async initialize(): Promise<boolean> {
    console.clear();
    p.intro(pc.bgCyan(pc.black(' API Gateway Troubleshooter ')));
    p.log.info('Verifies an API Gateway method and scans its execution logs for known errors.');

    const spinner = p.spinner();
    spinner.start(`Checking AWS credentials (${this.deps.region})...`);
    const status = await this.deps.credentials.validateCredentials();

    if (!status.valid) {
      spinner.stop(pc.red('AWS credentials unavailable'));
      p.log.error(status.error ?? 'Invalid AWS credentials');
      return false;
    }

    spinner.stop(`Using ${pc.cyan(status.arn ?? 'unknown identity')} in account ${status.accountId ?? 'unknown'}`);
    return true;
  }

  /** Returns the process exit code. */
  async run(defaults: TroubleshootingParameters = {}): Promise<number> {
    const prompt = await runApiTargetPrompt({
      defaults,
      defaultWindowMinutes: this.deps.defaultWindowMinutes,
    });

    if (!prompt.confirmed) {
      p.cancel('Cancelled');
      return 1;
    }
    const session = this.deps.runLogger?.startRun();
    session?.recordParameters(prompt.parameters);

    let report: TroubleshootingReport;
    try {
      const input = buildTroubleshootingInput(prompt.parameters, {
        defaultWindowMinutes: this.deps.defaultWindowMinutes,
      });
      report = await this.execute(input, session);
    } catch (error) {
      if (isTroubleshootingError(error)) {
        p.log.error(pc.red(error.message));
        this.finish(failed(error), session);
        return 1;
      }
      throw error;
    }

    const exitCode = renderReport(report);
    this.finish(report.outcome, session);
    return exitCode;
  }

  private async execute(input: TroubleshootingInput, session: RunLogSession | undefined): Promise<TroubleshootingReport> {
    const spinner = p.spinner();

    return this.deps.troubleshooter.run(input, {
      onStepStart: step => spinner.start(`${STEP_LABELS[step]}...`),
      onStepComplete: record => {
        spinner.stop(
          record.status === 'passed'
            ? `${STEP_LABELS[record.step]} ${pc.green('done')}`
            : `${STEP_LABELS[record.step]} ${pc.red('failed')}`
        );
        session?.recordStep(record);
      },
    });
  }

  private finish(outcome: StepOutcome<AnalysisResult>, session: RunLogSession | undefined): void {
    if (!session) {
      p.outro(outcome.ok ? 'Done' : 'Stopped');
      return;
    }

    const logFile = session.finish(outcome);
    p.outro(`Run log written to ${pc.dim(logFile)}`);
  }
}

export function createTuiWorkflow(deps: TuiWorkflowDependencies): TuiWorkflow {
  return new TuiWorkflow(deps);
}
