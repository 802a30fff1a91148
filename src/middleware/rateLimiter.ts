/**
 * Fixed-window rate limiting for the chat endpoint
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimiterConfig {
  windowMs: number;
  max: number;
  message?: string;
  keyGenerator?: (req: Request) => string;
  standardHeaders?: boolean;
}

/**
 * Per-key counters. Owned by the application instance rather than the module,
 * so each app (and each test) gets its own window state.
 */
export class RateLimitStore {
  private store: Map<string, RateLimitEntry> = new Map();
  private cleanupInterval: NodeJS.Timeout | null;

  constructor(cleanupIntervalMs: number = 60000) {
    this.cleanupInterval = setInterval(() => this.prune(), cleanupIntervalMs);
    this.cleanupInterval.unref();
  }

  increment(key: string, windowMs: number, now: number = Date.now()): RateLimitEntry {
    const entry = this.store.get(key);

    if (!entry || entry.resetTime <= now) {
      const newEntry: RateLimitEntry = {
        count: 1,
        resetTime: now + windowMs
      };
      this.store.set(key, newEntry);
      return { ...newEntry };
    }

    entry.count++;
    return { ...entry };
  }

  get(key: string, now: number = Date.now()): RateLimitEntry | undefined {
    const entry = this.store.get(key);
    if (entry && entry.resetTime > now) {
      return { ...entry };
    }
    return undefined;
  }

  reset(key: string): void {
    this.store.delete(key);
  }

  prune(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (entry.resetTime <= now) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.store.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
  }
}

export function createRateLimiter(config: RateLimiterConfig, store: RateLimitStore) {
  const {
    windowMs,
    max,
    message = 'Rate limit exceeded.',
    keyGenerator = defaultKeyGenerator,
    standardHeaders = true
  } = config;

  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyGenerator(req);
    const entry = store.increment(key, windowMs);

    const remaining = Math.max(0, max - entry.count);
    const resetTime = new Date(entry.resetTime);

    if (standardHeaders) {
      res.setHeader('RateLimit-Limit', max.toString());
      res.setHeader('RateLimit-Remaining', remaining.toString());
      res.setHeader('RateLimit-Reset', resetTime.toISOString());
    }

    if (entry.count > max) {
      logger.warn('Rate limit exceeded', {
        key,
        count: entry.count,
        max,
        resetTime: resetTime.toISOString()
      });

      const retryAfter = Math.max(0, Math.ceil((entry.resetTime - Date.now()) / 1000));
      res.setHeader('Retry-After', retryAfter.toString());

      res.status(429).json({ error: message });
      return;
    }

    next();
  };
}

function defaultKeyGenerator(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const ip = forwarded
    ? (typeof forwarded === 'string' ? forwarded.split(',')[0].trim() : forwarded[0])
    : req.ip || req.socket.remoteAddress || 'unknown';

  return `rate-limit:${ip}`;
}

/**
 * Keys on the chat session id when the body carries one, else the caller's IP
 */
export function sessionKeyGenerator(req: Request): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'session_id' in body) {
    const sessionId = body.session_id;
    if (typeof sessionId === 'string' && sessionId.length > 0) {
      return `rate-limit:session:${sessionId}`;
    }
  }
  return defaultKeyGenerator(req);
}
