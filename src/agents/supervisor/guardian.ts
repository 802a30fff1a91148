import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { normalizeContent } from '../../safety/sanitizer';
import { ConversationMessage, GuardianDecision } from '../../types/chat.types';
import { withTimeout } from '../../utils/timeout';
import { toLangChainMessages } from '../messages';
import { GUARDIAN_PROMPT } from '../promptTemplates';

const guardianResponseSchema = z.object({
  allowed: z.boolean(),
  reason: z.string().default('')
});

/**
 * Pulls the first JSON object out of a model reply, tolerating code fences
 * and surrounding prose.
 */
export function parseGuardianDecision(text: string): GuardianDecision | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = guardianResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export interface GuardianOptions {
  timeoutMs: number;
}

/**
 * Allow/block gate over the whole conversation. Fails closed.
 */
export class Guardian {
  private readonly model: BaseChatModel;
  private readonly timeoutMs: number;

  constructor(model: BaseChatModel, options: GuardianOptions) {
    this.model = model;
    this.timeoutMs = options.timeoutMs;
  }

  async evaluate(history: readonly ConversationMessage[], text: string): Promise<GuardianDecision> {
    try {
      const response = await withTimeout(
        this.model.invoke([
          new SystemMessage(GUARDIAN_PROMPT),
          ...toLangChainMessages(history),
          new HumanMessage(text)
        ]),
        this.timeoutMs,
        'Guardian'
      );

      const decision = parseGuardianDecision(normalizeContent(response.content));
      if (decision === null) {
        logger.warn('Guardian reply could not be parsed, blocking');
        return { allowed: false, reason: 'unparseable guardian response' };
      }
      return decision;
    } catch (error) {
      logger.warn('Guardian check failed, blocking', {
        error: error instanceof Error ? error.message : String(error)
      });
      return { allowed: false, reason: 'guardian unavailable' };
    }
  }
}
