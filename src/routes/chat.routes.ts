/**
 * Chat API routes
 */

import { Router, Request, Response } from 'express';
import { logger } from '../config/logger';
import { createRateLimiter, sessionKeyGenerator } from '../middleware/rateLimiter';
import { ApiError } from '../middleware/error-handler';
import {
  ApprovalDecision,
  ChatRequest,
  validateApprovalDecision,
  validateChatRequest
} from '../middleware/validation';
import { Assistant } from '../services/assistant';
import { ApprovalRequest, ApprovalStatus } from '../services/approvalQueue';

interface ChatResponseBody {
  response: string;
  options?: string[];
  next_step?: string | null;
}

const APPROVAL_STATUSES: readonly ApprovalStatus[] = ['pending', 'approved', 'rejected'];

const isApprovalStatus = (value: unknown): value is ApprovalStatus =>
  APPROVAL_STATUSES.some(status => status === value);

const toApprovalBody = (request: ApprovalRequest) => ({
  id: request.id,
  session_id: request.sessionId,
  message: request.message,
  status: request.status,
  created_at: request.createdAt.toISOString()
});

export function createChatRouter(assistant: Assistant): Router {
  const router = Router();

  const chatRateLimiter = createRateLimiter(
    {
      windowMs: assistant.rateLimit.windowMs,
      max: assistant.rateLimit.max,
      message: assistant.rules.messages.rateLimited,
      keyGenerator: sessionKeyGenerator
    },
    assistant.rateLimitStore
  );

  /**
   * POST /chat
   * Run one message through the assistant pipeline
   */
  router.post(
    '/',
    chatRateLimiter,
    validateChatRequest,
    async (req: Request<Record<string, string>, unknown, ChatRequest>, res: Response) => {
      const { message, session_id: sessionId, current_step_id: currentStepId } = req.body;

      try {
        const result = await assistant.dispatcher.dispatch({ message, sessionId, currentStepId });

        const body: ChatResponseBody = { response: result.response };
        if (result.options !== undefined) {
          body.options = result.options;
        }
        if (result.nextStep !== undefined) {
          body.next_step = result.nextStep;
        }

        res.json(body);
      } catch (error) {
        logger.error('Chat request failed', {
          requestId: req.id,
          sessionId,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined
        });

        res.status(500).json({ error: assistant.rules.messages.serviceUnavailable });
      }
    }
  );

  /**
   * GET /chat/approvals
   * High-risk requests held for manual review
   */
  router.get('/approvals', (req: Request, res: Response) => {
    const { status } = req.query;
    const filter = isApprovalStatus(status) ? status : 'pending';

    res.json({
      approvals: assistant.approvals.list(filter).map(toApprovalBody)
    });
  });

  /**
   * POST /chat/approvals/:id
   * Record the reviewer's decision on a held request
   */
  router.post(
    '/approvals/:id',
    validateApprovalDecision,
    (req: Request<Record<string, string>, unknown, ApprovalDecision>, res: Response) => {
      const { id } = req.params;
      const resolved = assistant.approvals.resolve(id, req.body.status);

      if (resolved === null) {
        const existing = assistant.approvals.get(id);
        throw existing
          ? new ApiError(409, `Approval request is already ${existing.status}`, { id })
          : new ApiError(404, 'Approval request not found', { id });
      }

      logger.info('Approval request resolved', {
        requestId: req.id,
        approvalId: id,
        sessionId: resolved.sessionId,
        status: resolved.status
      });

      res.json(toApprovalBody(resolved));
    }
  );

  return router;
}
