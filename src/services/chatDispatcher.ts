/**
 * Per-message pipeline: sanitize, guard, classify, hand off to a specialist,
 * filter the reply, record the turn.
 */

import { AgentResult, ProcessingEvent, SpecialistAgent } from '../agents/baseAgent';
import { Guardian, IntentClassifier } from '../agents/supervisor';
import { GuardrailRules } from '../config/guardrails';
import { logger } from '../config/logger';
import {
  needsHumanApproval,
  postProcessResponse,
  precheck,
  redactSensitiveInfo,
  sanitizeUserInput
} from '../safety';
import {
  ClassificationDecision,
  ConversationMessage,
  Destination,
  DispatchRequest,
  DispatchResult,
  DispatchState
} from '../types/chat.types';
import { ApprovalQueue } from './approvalQueue';
import { ConversationStore } from './conversationStore';
import { FlowStore } from './flowStore';

export interface ChatDispatcherConfig {
  rules: GuardrailRules;
  store: ConversationStore;
  approvals: ApprovalQueue;
  flows: FlowStore;
  classifier: IntentClassifier;
  guardian: Guardian | null;
  agents: Record<Destination, SpecialistAgent>;
  demoUserId: string;
  offTopicBlocking: boolean;
  riskGateEnabled: boolean;
  handlerTimeoutMs: number;
}

export class ChatDispatcher {
  private readonly config: ChatDispatcherConfig;

  constructor(config: ChatDispatcherConfig) {
    this.config = config;

    for (const agent of Object.values(config.agents)) {
      this.attachAgentLogging(agent);
    }
  }

  /**
   * Messages for the same session are handled one at a time, in arrival order.
   */
  dispatch(request: DispatchRequest): Promise<DispatchResult> {
    return this.config.store.runExclusive(request.sessionId, () => this.run(request));
  }

  private async run(request: DispatchRequest): Promise<DispatchResult> {
    const { rules, store } = this.config;
    const { sessionId } = request;
    const states: DispatchState[] = ['RECEIVED'];
    const finish = (
      response: string,
      extra: Partial<Pick<DispatchResult, 'decision' | 'options' | 'nextStep'>> = {}
    ): DispatchResult => {
      states.push('DONE');
      return {
        response,
        sessionId,
        states,
        history: store.getHistory(sessionId),
        ...extra
      };
    };

    const text = sanitizeUserInput(request.message, rules.maxInputLength);
    states.push('SANITIZED');

    if (!text) {
      states.push('EMPTY');
      return finish(rules.messages.emptyInput);
    }

    const check = precheck(text, rules, { offTopicBlocking: this.config.offTopicBlocking });
    if (check.blocked) {
      states.push('BLOCKED_PRECHECK');
      logger.warn('Message blocked by pre-check', { sessionId, reason: check.reason });
      return finish(rules.messages.precheckRefusal);
    }

    if (request.currentStepId) {
      const scripted = this.config.flows.resolve(request.currentStepId, text);
      if (scripted) {
        states.push('SCRIPTED');
        store.appendTurn(sessionId, text, scripted.response);
        return finish(scripted.response, { options: scripted.options, nextStep: scripted.nextStep });
      }
    }

    if (this.config.riskGateEnabled && needsHumanApproval(text, rules)) {
      states.push('RISK_HELD');
      const approval = this.config.approvals.submit(sessionId, redactSensitiveInfo(text, rules));
      logger.warn('High-risk request held for approval', {
        sessionId,
        approvalId: approval.id
      });
      return finish(rules.messages.riskHold);
    }

    states.push('CLASSIFYING');
    const history = store.getHistory(sessionId);
    const decision = await this.classify(history, text);

    if (!decision.allowed) {
      states.push('BLOCKED_GUARDIAN');
      logger.warn('Message blocked by guardian', { sessionId, reason: decision.reason });
      const blocked = await this.config.agents[Destination.BLOCK].process(
        [...history, userMessage(text)],
        { sessionId, userId: this.config.demoUserId },
        { timeout: this.config.handlerTimeoutMs }
      );
      return finish(this.finalText(blocked, rules.messages.guardianRefusal), { decision });
    }

    states.push('ROUTED');
    logger.info('Message routed', {
      sessionId,
      destination: decision.destination,
      reason: decision.reason
    });

    const result = await this.config.agents[decision.destination].process(
      [...history, userMessage(text)],
      { sessionId, userId: this.config.demoUserId },
      { timeout: this.config.handlerTimeoutMs }
    );
    states.push('HANDLED');

    const response = this.finalText(result);
    states.push('POSTPROCESSED');

    store.appendTurn(sessionId, text, response, decision.destination);
    return finish(response, { decision });
  }

  private async classify(
    history: readonly ConversationMessage[],
    text: string
  ): Promise<ClassificationDecision> {
    const { guardian, classifier } = this.config;

    if (guardian) {
      const verdict = await guardian.evaluate(history, text);
      if (!verdict.allowed) {
        return { ...verdict, destination: Destination.BLOCK };
      }
      const routing = await classifier.route(text);
      return { allowed: true, reason: verdict.reason, destination: routing.destination };
    }

    const routing = await classifier.route(text);
    return { allowed: true, reason: `routed by ${routing.source}`, destination: routing.destination };
  }

  private finalText(result: AgentResult, fallback = this.config.rules.messages.safeFallback): string {
    if (!result.success || result.text === undefined) {
      return fallback;
    }
    return postProcessResponse(result.text, this.config.rules);
  }

  private attachAgentLogging(agent: SpecialistAgent): void {
    agent.on('processing:complete', (event: ProcessingEvent) => {
      logger.debug('Agent completed', event);
    });
    agent.on('processing:error', (event: ProcessingEvent) => {
      logger.warn('Agent failed, returning safe fallback', event);
    });
  }
}

function userMessage(text: string): ConversationMessage {
  return { role: 'user', content: text, timestamp: new Date() };
}
