export { runApiTargetPrompt, type ApiTargetPromptOptions, type ApiTargetPromptResult } from './api-target.js';
export { renderReport } from './report.js';
