import * as p from '@clack/prompts';
import pc from 'picocolors';
import { HTTP_METHODS, isHttpMethod } from '../../../../domain/entities/api-target.js';
import type { TroubleshootingParameters } from '../../../../application/build-input.js';

export interface ApiTargetPromptOptions {
  defaults?: TroubleshootingParameters;
  defaultWindowMinutes: number;
}

export interface ApiTargetPromptResult {
  parameters: TroubleshootingParameters;
  confirmed: boolean;
}

const CANCELLED: ApiTargetPromptResult = { parameters: {}, confirmed: false };

function requiredText(label: string) {
  return (value: string): string | undefined => {
    if (!value || value.trim().length === 0) {
      return `${label} is required`;
    }
    return undefined;
  };
}

function optionalTimestamp(value: string): string | undefined {
  if (value && value.trim() && Number.isNaN(new Date(value.trim()).getTime())) {
    return 'Use an ISO-8601 timestamp, e.g. 2025-01-31T14:00:00Z';
  }
  return undefined;
}

export async function runApiTargetPrompt(options: ApiTargetPromptOptions): Promise<ApiTargetPromptResult> {
  const { defaults = {}, defaultWindowMinutes } = options;

  p.intro(pc.bgCyan(pc.black(' API Target ')));

  // Individual prompts instead of group() so Ctrl+C stops immediately
  const restApiId = await p.text({
    message: 'REST API id:',
    placeholder: 'abc123defg',
    initialValue: defaults.restApiId,
    validate: requiredText('RestApiId'),
  });
  if (p.isCancel(restApiId)) return CANCELLED;

  const stageName = await p.text({
    message: 'Stage name:',
    placeholder: 'prod',
    initialValue: defaults.stageName,
    validate: requiredText('StageName'),
  });
  if (p.isCancel(stageName)) return CANCELLED;

  const resourcePath = await p.text({
    message: 'Resource path:',
    placeholder: '/users',
    initialValue: defaults.resourcePath,
    validate: value => {
      if (!value || !value.trim().startsWith('/')) {
        return 'ResourcePath must start with "/"';
      }
      return undefined;
    },
  });
  if (p.isCancel(resourcePath)) return CANCELLED;

  const defaultMethod = defaults.httpMethod?.toUpperCase();
  const httpMethod = await p.select({
    message: 'HTTP method:',
    initialValue: defaultMethod && isHttpMethod(defaultMethod) ? defaultMethod : 'GET',
    options: HTTP_METHODS.map(method => ({ value: method, label: method })),
  });
  if (p.isCancel(httpMethod)) return CANCELLED;

  const startTime = await p.text({
    message: `Start time ${pc.dim(`(blank = ${defaultWindowMinutes} minutes ago)`)}:`,
    placeholder: '2025-01-31T14:00:00Z',
    initialValue: defaults.startTime,
    validate: optionalTimestamp,
  });
  if (p.isCancel(startTime)) return CANCELLED;

  const endTime = await p.text({
    message: `End time ${pc.dim('(blank = now)')}:`,
    placeholder: '2025-01-31T14:15:00Z',
    initialValue: defaults.endTime,
    validate: optionalTimestamp,
  });
  if (p.isCancel(endTime)) return CANCELLED;

  const requestId = await p.text({
    message: `Request id ${pc.dim('(optional)')}:`,
    placeholder: '0f1e2d3c-aaaa-bbbb-cccc-123456789abc',
    initialValue: defaults.requestId,
  });
  if (p.isCancel(requestId)) return CANCELLED;

  return {
    parameters: {
      restApiId,
      stageName,
      resourcePath,
      httpMethod,
      startTime,
      endTime,
      requestId,
      logGroupName: defaults.logGroupName,
    },
    confirmed: true,
  };
}
