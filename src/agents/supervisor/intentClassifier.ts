import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage } from '@langchain/core/messages';
import { GuardrailRules } from '../../config/guardrails';
import { logger } from '../../config/logger';
import { normalizeContent } from '../../safety/sanitizer';
import { Destination, RoutingDecision } from '../../types/chat.types';
import { withTimeout } from '../../utils/timeout';
import { ROUTER_PROMPT } from '../promptTemplates';

export type RouteVerdict =
  | { kind: 'destination'; destination: Destination }
  | { kind: 'invalid'; raw: string };

const ROUTE_LABELS: Record<string, Destination> = {
  ACCOUNT: Destination.ACCOUNT,
  INFO: Destination.INFO,
  BLOCK: Destination.BLOCK,
  OFF_TOPIC: Destination.BLOCK
};

/**
 * Coerces free model text into the closed set of routing outcomes. A bare
 * label wins; otherwise the text must mention exactly one of ACCOUNT or INFO.
 */
export function parseRouteDecision(text: string): RouteVerdict {
  const cleaned = text.trim().toUpperCase().replace(/^[^A-Z_]+|[^A-Z_]+$/g, '');
  const exact = ROUTE_LABELS[cleaned];
  if (exact !== undefined) {
    return { kind: 'destination', destination: exact };
  }

  const mentionsAccount = /\bACCOUNT\b/.test(cleaned);
  const mentionsInfo = /\bINFO\b/.test(cleaned);
  if (mentionsAccount && !mentionsInfo) {
    return { kind: 'destination', destination: Destination.ACCOUNT };
  }
  if (mentionsInfo && !mentionsAccount) {
    return { kind: 'destination', destination: Destination.INFO };
  }

  return { kind: 'invalid', raw: text };
}

export interface IntentClassifierOptions {
  timeoutMs: number;
}

/**
 * Picks the specialist for a message that already passed the pre-check.
 * Never throws: every failure resolves to INFO.
 */
export class IntentClassifier {
  private readonly model: BaseChatModel;
  private readonly rules: GuardrailRules;
  private readonly timeoutMs: number;

  constructor(model: BaseChatModel, rules: GuardrailRules, options: IntentClassifierOptions) {
    this.model = model;
    this.rules = rules;
    this.timeoutMs = options.timeoutMs;
  }

  async route(text: string): Promise<RoutingDecision> {
    if (!text) {
      return { destination: Destination.INFO, source: 'empty' };
    }

    if (this.rules.account !== null && this.rules.account.test(text)) {
      return { destination: Destination.ACCOUNT, source: 'keyword' };
    }

    try {
      const prompt = await ROUTER_PROMPT.format({ user_input: text });
      const response = await withTimeout(
        this.model.invoke([new HumanMessage(prompt)]),
        this.timeoutMs,
        'Intent router'
      );
      const verdict = parseRouteDecision(normalizeContent(response.content));

      if (verdict.kind === 'invalid') {
        logger.warn('Router returned an unrecognized label, defaulting to INFO', { raw: verdict.raw });
        return { destination: Destination.INFO, source: 'fallback' };
      }
      // The router may only pick a specialist; blocking is the guardian's call
      if (verdict.destination === Destination.BLOCK) {
        logger.warn('Router returned BLOCK, defaulting to INFO');
        return { destination: Destination.INFO, source: 'fallback' };
      }

      return { destination: verdict.destination, source: 'model' };
    } catch (error) {
      logger.warn('Intent routing failed, defaulting to INFO', {
        error: error instanceof Error ? error.message : String(error)
      });
      return { destination: Destination.INFO, source: 'fallback' };
    }
  }
}
