export { TuiWorkflow, createTuiWorkflow, type TuiWorkflowDependencies } from './tui-workflow.js';
export { RunLogger, RunLogSession, createRunLogger, type RunLogDocument, type RunLogOutcome } from './run-logger.js';
