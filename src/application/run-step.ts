import type { StepOutcome } from '../domain/entities/analysis-result.js';
import { failed, succeeded } from '../domain/entities/analysis-result.js';
import type { PipelineStep } from '../domain/errors.js';
import { ProviderError, isTroubleshootingError } from '../domain/errors.js';

/**
 * Run one pipeline step and fold whatever it throws into a failed outcome.
 * Errors without troubleshooting meaning are wrapped as provider errors.
 */
export async function runStep<T>(
  step: PipelineStep,
  service: string,
  body: () => Promise<T>
): Promise<StepOutcome<T>> {
  try {
    return succeeded(await body());
  } catch (error) {
    if (isTroubleshootingError(error)) {
      return failed(error);
    }
    return failed(new ProviderError(step, service, error));
  }
}
