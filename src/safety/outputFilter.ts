import { GuardrailRules } from '../config/guardrails';

export function redactSensitiveInfo(text: string, rules: GuardrailRules): string {
  if (!text) {
    return text;
  }
  return rules.sensitive.reduce(
    (current, pattern) => current.replace(pattern, rules.redactionToken),
    text
  );
}

export function containsProhibitedContent(text: string, rules: GuardrailRules): boolean {
  return rules.prohibited !== null && rules.prohibited.test(text);
}

/**
 * Last filter before a reply is stored or returned: redact identifiers, then
 * discard the whole draft if it carries a prohibited disclosure.
 */
export function postProcessResponse(response: string, rules: GuardrailRules): string {
  const redacted = redactSensitiveInfo(response, rules);
  if (containsProhibitedContent(redacted, rules)) {
    return rules.messages.safeFallback;
  }
  return redacted;
}
