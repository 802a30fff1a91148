import { GuardrailRules } from '../config/guardrails';

export type PrecheckReason = 'injection' | 'off_topic';

export interface PrecheckResult {
  blocked: boolean;
  reason?: PrecheckReason;
}

export interface PrecheckOptions {
  offTopicBlocking: boolean;
}

export function detectPromptInjection(text: string, rules: GuardrailRules): boolean {
  return Boolean(text) && rules.injection !== null && rules.injection.test(text);
}

export function detectOffTopic(text: string, rules: GuardrailRules): boolean {
  return Boolean(text) && rules.offTopic !== null && rules.offTopic.test(text);
}

/**
 * Runs on sanitized text before any model call. Injection attempts are always
 * blocked; off-topic keywords only when off-topic blocking is on.
 */
export function precheck(
  text: string,
  rules: GuardrailRules,
  options: PrecheckOptions
): PrecheckResult {
  if (detectPromptInjection(text, rules)) {
    return { blocked: true, reason: 'injection' };
  }
  if (options.offTopicBlocking && detectOffTopic(text, rules)) {
    return { blocked: true, reason: 'off_topic' };
  }
  return { blocked: false };
}
