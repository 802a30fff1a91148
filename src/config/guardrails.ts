/**
 * Guardrail configuration: pattern sets and fixed replies loaded from JSON so
 * they can be tuned without a code change.
 */

import fs from 'fs';
import { z } from 'zod';

const nonEmpty = z.string().min(1);

export const guardrailConfigSchema = z.object({
  maxInputLength: z.number().int().positive().default(2000),
  injectionPatterns: z.array(nonEmpty),
  offTopicKeywords: z.array(nonEmpty).default([]),
  accountKeywords: z.array(nonEmpty),
  highRiskKeywords: z.array(nonEmpty).default([]),
  sensitivePatterns: z.array(nonEmpty),
  prohibitedOutputPatterns: z.array(nonEmpty),
  redactionToken: nonEmpty.default('[REDACTED]'),
  messages: z.object({
    emptyInput: nonEmpty,
    precheckRefusal: nonEmpty,
    guardianRefusal: nonEmpty,
    riskHold: nonEmpty,
    safeFallback: nonEmpty,
    serviceUnavailable: nonEmpty,
    rateLimited: nonEmpty
  })
});

export type GuardrailConfig = z.input<typeof guardrailConfigSchema>;

export type GuardrailMessages = z.infer<typeof guardrailConfigSchema>['messages'];

/**
 * Compiled form used by the safety filters. Off-topic and high-risk keywords
 * are anchored on a leading word boundary, so "story" does not fire on
 * "history" while "jokes" still matches "joke". Account keywords match
 * anywhere in the text ("overspending" counts as "spend").
 */
export interface GuardrailRules {
  maxInputLength: number;
  injection: RegExp | null;
  offTopic: RegExp | null;
  account: RegExp | null;
  highRisk: RegExp | null;
  sensitive: RegExp[];
  prohibited: RegExp | null;
  redactionToken: string;
  messages: GuardrailMessages;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileAlternation(patterns: string[]): RegExp | null {
  if (patterns.length === 0) {
    return null;
  }
  // dotAll: `.*` in a pattern must also span line breaks
  return new RegExp(patterns.map(p => `(?:${p})`).join('|'), 'is');
}

function compileKeywords(keywords: string[], wordStart = true): RegExp | null {
  if (keywords.length === 0) {
    return null;
  }
  const alternation = `(?:${keywords.map(escapeRegExp).join('|')})`;
  return new RegExp(wordStart ? `\\b${alternation}` : alternation, 'i');
}

export function compileGuardrails(input: GuardrailConfig): GuardrailRules {
  const config = guardrailConfigSchema.parse(input);

  return {
    maxInputLength: config.maxInputLength,
    injection: compileAlternation(config.injectionPatterns),
    offTopic: compileKeywords(config.offTopicKeywords),
    account: compileKeywords(config.accountKeywords, false),
    highRisk: compileKeywords(config.highRiskKeywords),
    // global: only ever used with String.prototype.replace
    sensitive: config.sensitivePatterns.map(p => new RegExp(p, 'g')),
    prohibited: compileAlternation(config.prohibitedOutputPatterns),
    redactionToken: config.redactionToken,
    messages: config.messages
  };
}

export function loadGuardrails(filePath: string): GuardrailRules {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to read guardrail config at ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = guardrailConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
    throw new Error(`Invalid guardrail config at ${filePath}: ${fields.join('; ')}`);
  }

  return compileGuardrails(parsed.data);
}
