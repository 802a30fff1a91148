import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StructuredToolInterface } from '@langchain/core/tools';
import { BankDataStore } from '../../services/bankData';
import { Destination } from '../../types/chat.types';
import { ToolCallingAgent } from '../toolCallingAgent';
import { INFO_PROMPT } from '../promptTemplates';
import { createInfoTools } from '../tools';

/**
 * General bank information. Has no access to per-user records.
 */
export class InfoAgent extends ToolCallingAgent {
  private readonly bankData: BankDataStore;

  constructor(model: BaseChatModel, bankData: BankDataStore) {
    super('info', Destination.INFO, model, INFO_PROMPT);
    this.bankData = bankData;
  }

  createTools(): StructuredToolInterface[] {
    return createInfoTools(this.bankData);
  }
}
