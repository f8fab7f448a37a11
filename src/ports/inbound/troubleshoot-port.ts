import type { TroubleshootingInput } from '../../domain/entities/api-target.js';
import type { PipelineStep } from '../../domain/errors.js';
import type { StepRecord, TroubleshootingReport } from '../../domain/entities/analysis-result.js';

export interface TroubleshootHooks {
  readonly onStepStart?: (step: PipelineStep) => void;
  readonly onStepComplete?: (record: StepRecord) => void;
}

export interface TroubleshootPort {
  run(input: TroubleshootingInput, hooks?: TroubleshootHooks): Promise<TroubleshootingReport>;
}
