export { sanitizeUserInput, normalizeContent, DEFAULT_MAX_INPUT_LENGTH } from './sanitizer';
export { precheck, detectPromptInjection, detectOffTopic } from './precheck';
export type { PrecheckResult, PrecheckReason, PrecheckOptions } from './precheck';
export { needsHumanApproval } from './riskGate';
export { postProcessResponse, redactSensitiveInfo, containsProhibitedContent } from './outputFilter';
