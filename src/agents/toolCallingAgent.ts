/**
 * Specialist backed by a chat model with a restricted tool set. The tool loop
 * itself is LangChain's AgentExecutor.
 */

import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatPromptTemplate, MessagesPlaceholder } from '@langchain/core/prompts';
import { StructuredToolInterface } from '@langchain/core/tools';
import { AgentExecutor, createToolCallingAgent } from 'langchain/agents';
import { ConversationMessage, Destination } from '../types/chat.types';
import { normalizeContent } from '../safety/sanitizer';
import { AgentContext, SpecialistAgent } from './baseAgent';
import { toLangChainMessages } from './messages';

const MAX_TOOL_ITERATIONS = 5;

export abstract class ToolCallingAgent extends SpecialistAgent {
  protected readonly model: BaseChatModel;
  private readonly prompt: ChatPromptTemplate;

  constructor(name: string, destination: Destination, model: BaseChatModel, systemPrompt: string) {
    super(name, destination);
    this.model = model;
    this.prompt = ChatPromptTemplate.fromMessages([
      ['system', systemPrompt],
      new MessagesPlaceholder('chat_history'),
      ['human', '{input}'],
      new MessagesPlaceholder('agent_scratchpad')
    ]);
  }

  /**
   * Tools are built per call so they can close over the session's user.
   */
  abstract createTools(context: AgentContext): StructuredToolInterface[];

  protected async execute(
    history: readonly ConversationMessage[],
    context: AgentContext
  ): Promise<string> {
    const latest = history[history.length - 1];
    if (!latest || latest.role !== 'user') {
      throw new Error('Conversation must end with a user message');
    }

    const tools = this.createTools(context);
    const agent = createToolCallingAgent({ llm: this.model, tools, prompt: this.prompt });
    const executor = new AgentExecutor({
      agent,
      tools,
      maxIterations: MAX_TOOL_ITERATIONS
    });

    const result = await executor.invoke({
      input: latest.content,
      chat_history: toLangChainMessages(history.slice(0, -1))
    });

    return normalizeContent(result.output);
  }
}
