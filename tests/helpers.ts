/**
 * Shared fixtures for unit and route tests
 */

import { FakeListChatModel } from '@langchain/core/utils/testing';
import { resolveProjectPath } from '../src/config/env';
import { GuardrailRules, loadGuardrails } from '../src/config/guardrails';
import { BankDataStore } from '../src/services/bankData';
import { FlowStore } from '../src/services/flowStore';
import { Assistant, AssistantOptions, buildAssistant } from '../src/services/assistant';

export const TEST_SESSION_ID = 'test-session-123';

export const loadTestRules = (): GuardrailRules =>
  loadGuardrails(resolveProjectPath('config/guardrails.json'));

export const loadTestBankData = (): BankDataStore =>
  BankDataStore.fromDirectory(resolveProjectPath('data'));

export const loadTestFlows = (): FlowStore =>
  FlowStore.fromFile(resolveProjectPath('data/flows.json'));

/**
 * Model stand-in that answers with the given responses in order.
 */
export const createFakeModel = (...responses: string[]): FakeListChatModel =>
  new FakeListChatModel({ responses: responses.length > 0 ? responses : ['INFO'] });

export const createTestAssistant = (overrides: Partial<AssistantOptions> = {}): Assistant =>
  buildAssistant({
    model: createFakeModel(),
    rules: loadTestRules(),
    bankData: loadTestBankData(),
    flows: loadTestFlows(),
    demoUserId: 'user_101',
    offTopicBlocking: true,
    guardianEnabled: false,
    riskGateEnabled: true,
    llmTimeoutMs: 1000,
    session: {
      maxMessages: 40,
      idleTimeoutMs: 60000,
      cleanupIntervalMs: 30000
    },
    rateLimit: {
      windowMs: 60000,
      max: 30
    },
    ...overrides
  });
