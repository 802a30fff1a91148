import { GuardrailRules } from '../config/guardrails';

/**
 * Money movement and account closure are never executed by the assistant;
 * they are held for a human operator.
 */
export function needsHumanApproval(text: string, rules: GuardrailRules): boolean {
  return Boolean(text) && rules.highRisk !== null && rules.highRisk.test(text);
}
