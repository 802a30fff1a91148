import { AIMessage, BaseMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import { ConversationMessage } from '../types/chat.types';

export function toLangChainMessage(message: ConversationMessage): BaseMessage {
  switch (message.role) {
    case 'user':
      return new HumanMessage(message.content);
    case 'assistant':
      return new AIMessage(message.content);
    case 'system':
      return new SystemMessage(message.content);
  }
}

export function toLangChainMessages(history: readonly ConversationMessage[]): BaseMessage[] {
  return history.map(toLangChainMessage);
}
