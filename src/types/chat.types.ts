/**
 * Shared types for the chat pipeline
 */

export enum Destination {
  ACCOUNT = 'ACCOUNT',
  INFO = 'INFO',
  BLOCK = 'BLOCK'
}

export type MessageRole = 'user' | 'assistant' | 'system';

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: Date;
  destination?: Destination;
}

export interface Session {
  sessionId: string;
  messages: ConversationMessage[];
  createdAt: Date;
  lastActivity: Date;
}

export interface GuardianDecision {
  allowed: boolean;
  reason: string;
}

export type RoutingSource = 'empty' | 'keyword' | 'model' | 'fallback';

export interface RoutingDecision {
  destination: Destination;
  source: RoutingSource;
}

export interface ClassificationDecision extends GuardianDecision {
  destination: Destination;
}

export type DispatchState =
  | 'RECEIVED'
  | 'SANITIZED'
  | 'EMPTY'
  | 'BLOCKED_PRECHECK'
  | 'SCRIPTED'
  | 'RISK_HELD'
  | 'CLASSIFYING'
  | 'BLOCKED_GUARDIAN'
  | 'ROUTED'
  | 'HANDLED'
  | 'POSTPROCESSED'
  | 'DONE';

export interface DispatchRequest {
  message: unknown;
  sessionId: string;
  currentStepId?: string;
}

export interface DispatchResult {
  response: string;
  sessionId: string;
  states: DispatchState[];
  decision?: ClassificationDecision;
  options?: string[];
  nextStep?: string | null;
  history: readonly ConversationMessage[];
}
