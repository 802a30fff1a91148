import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StructuredToolInterface } from '@langchain/core/tools';
import { BankDataStore } from '../../services/bankData';
import { Destination } from '../../types/chat.types';
import { AgentContext } from '../baseAgent';
import { ACCOUNT_PROMPT } from '../promptTemplates';
import { ToolCallingAgent } from '../toolCallingAgent';
import { createAccountTools } from '../tools';

/**
 * Balance and transaction lookups for the session's bound user
 */
export class AccountAgent extends ToolCallingAgent {
  private readonly bankData: BankDataStore;

  constructor(model: BaseChatModel, bankData: BankDataStore) {
    super('account', Destination.ACCOUNT, model, ACCOUNT_PROMPT);
    this.bankData = bankData;
  }

  createTools(context: AgentContext): StructuredToolInterface[] {
    return createAccountTools(this.bankData, context.userId);
  }
}
