import { ChatAnthropic } from '@langchain/anthropic';
import { env } from './env';

let chatModel: ChatAnthropic | null = null;

export function initializeLangChain(): ChatAnthropic {
  if (!chatModel) {
    if (!env.ANTHROPIC_API_KEY) {
      throw new Error('ANTHROPIC_API_KEY is not configured');
    }

    chatModel = new ChatAnthropic({
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      temperature: 0,
      maxTokens: env.ANTHROPIC_MAX_TOKENS,
    });
  }

  return chatModel;
}
