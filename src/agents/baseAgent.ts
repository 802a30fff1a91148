import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ConversationMessage, Destination } from '../types/chat.types';
import { withTimeout } from '../utils/timeout';

export interface AgentContext {
  sessionId: string;
  userId: string;
}

export interface AgentResult {
  success: boolean;
  text?: string;
  error?: {
    message: string;
    code: string;
  };
  metadata: {
    agentName: string;
    agentId: string;
    timestamp: string;
    processingTime: number;
  };
}

export interface ProcessOptions {
  timeout?: number;
}

export interface ProcessingEvent {
  agentId: string;
  agentName: string;
  sessionId: string;
}

/**
 * A role-bound responder. Subclasses produce one assistant reply from the
 * conversation so far; `process` bounds that call and converts failures into
 * an unsuccessful result instead of throwing.
 *
 * Events: `processing:start`, `processing:complete`, `processing:error`.
 */
export abstract class SpecialistAgent extends EventEmitter {
  protected readonly id: string;
  protected readonly name: string;
  readonly destination: Destination;

  constructor(name: string, destination: Destination) {
    super();
    this.id = uuidv4();
    this.name = name;
    this.destination = destination;
  }

  getId(): string {
    return this.id;
  }

  getName(): string {
    return this.name;
  }

  /**
   * @param history prior turns followed by the new user message; read-only
   */
  protected abstract execute(
    history: readonly ConversationMessage[],
    context: AgentContext
  ): Promise<string>;

  async process(
    history: readonly ConversationMessage[],
    context: AgentContext,
    options: ProcessOptions = {}
  ): Promise<AgentResult> {
    const startTime = Date.now();
    const { timeout = 15000 } = options;
    const event: ProcessingEvent = {
      agentId: this.id,
      agentName: this.name,
      sessionId: context.sessionId
    };

    this.emit('processing:start', event);

    try {
      const text = await withTimeout(
        this.execute(history, context),
        timeout,
        `${this.name} agent`
      );

      const result: AgentResult = {
        success: true,
        text,
        metadata: this.buildMetadata(startTime)
      };

      this.emit('processing:complete', { ...event, processingTime: result.metadata.processingTime });

      return result;
    } catch (error) {
      const errorObj = {
        message: error instanceof Error ? error.message : String(error),
        code: error instanceof Error && 'code' in error && typeof error.code === 'string'
          ? error.code
          : 'EXECUTION_ERROR'
      };

      this.emit('processing:error', { ...event, error: errorObj });

      return {
        success: false,
        error: errorObj,
        metadata: this.buildMetadata(startTime)
      };
    }
  }

  private buildMetadata(startTime: number): AgentResult['metadata'] {
    return {
      agentName: this.name,
      agentId: this.id,
      timestamp: new Date().toISOString(),
      processingTime: Date.now() - startTime
    };
  }
}
