import express, { Application } from 'express';
import request from 'supertest';
import { createRateLimiter, RateLimitStore, sessionKeyGenerator } from '../rateLimiter';

describe('RateLimitStore', () => {
  let store: RateLimitStore;

  beforeEach(() => {
    store = new RateLimitStore();
  });

  afterEach(() => {
    store.destroy();
  });

  it('should count hits within a window', () => {
    const now = 1_000_000;

    expect(store.increment('k', 1000, now).count).toBe(1);
    expect(store.increment('k', 1000, now + 10).count).toBe(2);
    expect(store.get('k', now + 20)).toEqual({ count: 2, resetTime: now + 1000 });
  });

  it('should start a new window once the old one expires', () => {
    const now = 1_000_000;
    store.increment('k', 1000, now);
    store.increment('k', 1000, now + 10);

    const entry = store.increment('k', 1000, now + 1000);

    expect(entry).toEqual({ count: 1, resetTime: now + 2000 });
  });

  it('should prune expired windows', () => {
    const now = 1_000_000;
    store.increment('a', 1000, now);
    store.increment('b', 5000, now);

    expect(store.prune(now + 2000)).toBe(1);
    expect(store.size).toBe(1);
    expect(store.get('a', now + 2000)).toBeUndefined();
  });

  it('should reset a key', () => {
    store.increment('k', 1000);
    store.reset('k');

    expect(store.get('k')).toBeUndefined();
  });
});

describe('createRateLimiter', () => {
  let store: RateLimitStore;
  let app: Application;

  beforeEach(() => {
    store = new RateLimitStore();
    app = express();
    app.use(express.json());
    app.post(
      '/chat',
      createRateLimiter({ windowMs: 60000, max: 2, keyGenerator: sessionKeyGenerator }, store),
      (_req, res) => {
        res.json({ ok: true });
      }
    );
  });

  afterEach(() => {
    store.destroy();
  });

  it('should reject requests past the limit with 429', async () => {
    await request(app).post('/chat').send({ session_id: 'abc' }).expect(200);
    await request(app).post('/chat').send({ session_id: 'abc' }).expect(200);

    const response = await request(app).post('/chat').send({ session_id: 'abc' });

    expect(response.status).toBe(429);
    expect(response.body).toEqual({ error: 'Rate limit exceeded.' });
    expect(response.headers['retry-after']).toBeDefined();
  });

  it('should count each session separately', async () => {
    await request(app).post('/chat').send({ session_id: 'abc' });
    await request(app).post('/chat').send({ session_id: 'abc' });

    const response = await request(app).post('/chat').send({ session_id: 'xyz' });

    expect(response.status).toBe(200);
  });

  it('should fall back to the client address when there is no session id', async () => {
    const client = () => request(app).post('/chat').set('X-Forwarded-For', '203.0.113.7, 10.0.0.1').send({});
    await client().expect(200);
    await client().expect(200);

    await client().expect(429);
    expect(store.get('rate-limit:203.0.113.7')?.count).toBe(3);
  });

  it('should send the remaining allowance in headers', async () => {
    const response = await request(app).post('/chat').send({ session_id: 'abc' });

    expect(response.headers['ratelimit-limit']).toBe('2');
    expect(response.headers['ratelimit-remaining']).toBe('1');
  });
});
