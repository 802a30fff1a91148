/**
 * Zod-based request validation
 */

import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import { logger } from '../config/logger';

export const DEFAULT_SESSION_ID = 'user_session_101';

export const chatRequestSchema = z.object({
  message: z.string().max(20000).default('').describe('User message'),
  session_id: z.string().min(1).max(100).default(DEFAULT_SESSION_ID).describe('Session identifier'),
  current_step_id: z.string().min(1).max(100).optional().describe('Scripted flow step the client is on')
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export const approvalDecisionSchema = z.object({
  status: z.enum(['approved', 'rejected']).describe('Outcome of the manual review')
});

export type ApprovalDecision = z.infer<typeof approvalDecisionSchema>;

interface ValidationErrorResponse {
  error: string;
  details: Array<{
    field: string;
    message: string;
    code?: string;
  }>;
  requestId?: string;
}

function formatZodErrors(error: ZodError): ValidationErrorResponse['details'] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code
  }));
}

/**
 * Replaces `req.body` with the parsed value, defaults applied
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const validationError: ValidationErrorResponse = {
        error: 'Request validation failed',
        details: formatZodErrors(result.error),
        requestId: req.id
      };

      logger.warn('Request validation failed', {
        endpoint: req.path,
        method: req.method,
        errors: validationError.details
      });

      res.status(400).json(validationError);
      return;
    }

    req.body = result.data;
    next();
  };
}

export const validateChatRequest = validate(chatRequestSchema);

export const validateApprovalDecision = validate(approvalDecisionSchema);
