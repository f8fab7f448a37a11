export {
  handler,
  createAutomationHandler,
  type AutomationEvent,
  type AutomationOutput,
  type AutomationHandler,
  type AutomationHandlerDependencies,
} from './handler.js';
