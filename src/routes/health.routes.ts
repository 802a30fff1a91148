import { Router, Request, Response } from 'express';
import { Assistant } from '../services/assistant';

export function createHealthRouter(assistant: Assistant): Router {
  const router = Router();

  /**
   * GET /api/health
   */
  router.get('/', (_req: Request, res: Response) => {
    const stats = assistant.store.getStats();

    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: {
        total: stats.totalSessions,
        messages: stats.totalMessages,
        activeLocks: stats.activeLocks,
        oldestActivity: stats.oldestActivity ? stats.oldestActivity.toISOString() : null
      },
      pendingApprovals: assistant.approvals.list('pending').length
    });
  });

  /**
   * GET /api/health/live
   */
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  return router;
}
