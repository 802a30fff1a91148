/**
 * Composition root: wires the stores, supervisor stages and specialists that
 * make up one assistant instance. Everything stateful is owned here and torn
 * down by `shutdown`.
 */

import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { AccountAgent } from '../agents/account';
import { BlockAgent } from '../agents/block';
import { SpecialistAgent } from '../agents/baseAgent';
import { InfoAgent } from '../agents/info';
import { Guardian, IntentClassifier } from '../agents/supervisor';
import { GuardrailRules } from '../config/guardrails';
import { RateLimitStore } from '../middleware/rateLimiter';
import { Destination } from '../types/chat.types';
import { ApprovalQueue } from './approvalQueue';
import { BankDataStore } from './bankData';
import { ChatDispatcher } from './chatDispatcher';
import { ConversationStore, ConversationStoreConfig } from './conversationStore';
import { FlowStore } from './flowStore';

export interface RateLimitSettings {
  windowMs: number;
  max: number;
}

export interface AssistantOptions {
  model: BaseChatModel;
  rules: GuardrailRules;
  bankData: BankDataStore;
  flows: FlowStore;
  demoUserId: string;
  offTopicBlocking: boolean;
  guardianEnabled: boolean;
  riskGateEnabled: boolean;
  llmTimeoutMs: number;
  session: ConversationStoreConfig;
  rateLimit: RateLimitSettings;
}

export interface Assistant {
  dispatcher: ChatDispatcher;
  store: ConversationStore;
  approvals: ApprovalQueue;
  flows: FlowStore;
  rules: GuardrailRules;
  rateLimit: RateLimitSettings;
  rateLimitStore: RateLimitStore;
  shutdown(): void;
}

export function buildAssistant(options: AssistantOptions): Assistant {
  const { model, rules, bankData, llmTimeoutMs } = options;

  const store = new ConversationStore(options.session);
  const approvals = new ApprovalQueue();
  const rateLimitStore = new RateLimitStore(options.rateLimit.windowMs);

  const classifier = new IntentClassifier(model, rules, { timeoutMs: llmTimeoutMs });
  const guardian = options.guardianEnabled
    ? new Guardian(model, { timeoutMs: llmTimeoutMs })
    : null;

  const agents: Record<Destination, SpecialistAgent> = {
    [Destination.ACCOUNT]: new AccountAgent(model, bankData),
    [Destination.INFO]: new InfoAgent(model, bankData),
    [Destination.BLOCK]: new BlockAgent(rules.messages.guardianRefusal)
  };

  const dispatcher = new ChatDispatcher({
    rules,
    store,
    approvals,
    flows: options.flows,
    classifier,
    guardian,
    agents,
    demoUserId: options.demoUserId,
    offTopicBlocking: options.offTopicBlocking,
    riskGateEnabled: options.riskGateEnabled,
    handlerTimeoutMs: llmTimeoutMs
  });

  return {
    dispatcher,
    store,
    approvals,
    flows: options.flows,
    rules,
    rateLimit: options.rateLimit,
    rateLimitStore,
    shutdown() {
      store.shutdown();
      rateLimitStore.destroy();
      approvals.clear();
    }
  };
}
