import request from 'supertest';
import { Application } from 'express';
import { StructuredToolInterface } from '@langchain/core/tools';
import { createApp } from '../../src/app';
import { Assistant } from '../../src/services/assistant';
import { createTestAssistant, loadTestRules } from '../helpers';

jest.mock('../../src/config/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    http: jest.fn()
  },
  stream: { write: jest.fn() }
}));

const mockInvoke = jest.fn();

jest.mock('langchain/agents', () => ({
  createToolCallingAgent: jest.fn(() => ({})),
  AgentExecutor: jest.fn().mockImplementation((config: { tools: StructuredToolInterface[] }) => ({
    invoke: (input: unknown) => mockInvoke(input, config.tools)
  }))
}));

describe('Chat API', () => {
  const messages = loadTestRules().messages;
  let assistant: Assistant;
  let app: Application;

  beforeEach(() => {
    assistant = createTestAssistant();
    app = createApp(assistant);
  });

  afterEach(() => {
    assistant.shutdown();
    mockInvoke.mockReset();
    jest.clearAllMocks();
  });

  describe('POST /chat', () => {
    it('should answer a balance question', async () => {
      mockInvoke.mockImplementation(async (_input: unknown, tools: StructuredToolInterface[]) => ({
        output: await tools[0].invoke({})
      }));

      const response = await request(app)
        .post('/chat')
        .send({ message: "What's my balance?", session_id: 'route-session' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ response: 'Balance: $1250.00 (Checking)' });
    });

    it('should ask for a valid message when the text is blank', async () => {
      const response = await request(app).post('/chat').send({ message: '   ', session_id: 'route-session' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ response: 'Please type a valid message.' });
    });

    it('should treat a missing message as blank', async () => {
      const response = await request(app).post('/chat').send({ session_id: 'route-session' });

      expect(response.body).toEqual({ response: 'Please type a valid message.' });
    });

    it('should refuse off-topic requests', async () => {
      const response = await request(app).post('/chat').send({ message: 'Tell me a joke' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ response: messages.precheckRefusal });
    });

    it('should reject a body of the wrong shape with 400', async () => {
      const response = await request(app).post('/chat').send({ message: 42 });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Request validation failed');
      expect(response.body.details[0].field).toBe('message');
    });

    it('should reject malformed JSON with 400', async () => {
      const response = await request(app)
        .post('/chat')
        .set('Content-Type', 'application/json')
        .send('{"message": ');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Malformed JSON body');
    });

    it('should use the default session when none is given', async () => {
      mockInvoke.mockResolvedValue({ output: 'ok' });

      await request(app).post('/chat').send({ message: 'my balance' });

      expect(assistant.store.getHistory('user_session_101')).toHaveLength(2);
    });

    it('should serve scripted steps with options and the next step', async () => {
      const response = await request(app)
        .post('/chat')
        .send({ message: 'Bank information', session_id: 'route-session', current_step_id: 'start' });

      expect(response.body).toEqual({
        response: 'I can answer questions about fees, branch hours and savings rates.',
        options: ['Back to start'],
        next_step: 'info_menu'
      });
    });

    it('should send a null next step at the end of a flow', async () => {
      const response = await request(app)
        .post('/chat')
        .send({ message: 'Talk to support', session_id: 'route-session', current_step_id: 'start' });

      expect(response.body).toEqual({
        response: 'Our support team is available at 1-800-555-0100, 8am-8pm Mon-Sat.',
        options: [],
        next_step: null
      });
    });

    it('should hide unexpected failures behind a generic 500', async () => {
      jest.spyOn(assistant.dispatcher, 'dispatch').mockRejectedValue(new Error('secret connection string'));

      const response = await request(app).post('/chat').send({ message: 'my balance' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: messages.serviceUnavailable });
    });

    it('should return 429 once the session exceeds its limit', async () => {
      assistant.shutdown();
      assistant = createTestAssistant({ rateLimit: { windowMs: 60000, max: 2 } });
      app = createApp(assistant);

      const send = () => request(app).post('/chat').send({ message: 'Tell me a joke', session_id: 'busy' });
      await send().expect(200);
      await send().expect(200);

      const response = await send();

      expect(response.status).toBe(429);
      expect(response.body).toEqual({ error: 'Rate limit exceeded.' });
    });
  });

  describe('GET /chat/approvals', () => {
    it('should list requests held by the risk gate', async () => {
      const held = await request(app)
        .post('/chat')
        .send({ message: 'Wire $2000 to my landlord', session_id: 'risky' });
      expect(held.body).toEqual({ response: messages.riskHold });

      const response = await request(app).get('/chat/approvals');

      expect(response.status).toBe(200);
      expect(response.body.approvals).toHaveLength(1);
      expect(response.body.approvals[0]).toMatchObject({
        session_id: 'risky',
        message: 'Wire $2000 to my landlord',
        status: 'pending'
      });
    });

    it('should not expose card numbers from held requests', async () => {
      await request(app)
        .post('/chat')
        .send({ message: 'wire money from card 4111111111111111', session_id: 'risky' });

      const response = await request(app).get('/chat/approvals');

      expect(response.body.approvals[0].message).toBe('wire money from card [REDACTED]');
    });

    it('should filter by status', async () => {
      const approval = assistant.approvals.submit('s1', 'close account');
      await request(app).post(`/chat/approvals/${approval.id}`).send({ status: 'approved' }).expect(200);

      const pending = await request(app).get('/chat/approvals');
      const approved = await request(app).get('/chat/approvals?status=approved');

      expect(pending.body.approvals).toEqual([]);
      expect(approved.body.approvals).toHaveLength(1);
    });
  });

  describe('POST /chat/approvals/:id', () => {
    it('should record the decision on a pending request', async () => {
      const approval = assistant.approvals.submit('s1', 'close account');

      const response = await request(app)
        .post(`/chat/approvals/${approval.id}`)
        .send({ status: 'rejected' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ id: approval.id, session_id: 's1', status: 'rejected' });
      expect(assistant.approvals.get(approval.id)?.status).toBe('rejected');
    });

    it('should return 404 for an unknown request', async () => {
      const response = await request(app).post('/chat/approvals/missing-id').send({ status: 'approved' });

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({ error: 'Approval request not found', details: { id: 'missing-id' } });
    });

    it('should return 409 when the request was already settled', async () => {
      const approval = assistant.approvals.submit('s1', 'close account');
      assistant.approvals.resolve(approval.id, 'approved');

      const response = await request(app)
        .post(`/chat/approvals/${approval.id}`)
        .send({ status: 'rejected' });

      expect(response.status).toBe(409);
      expect(response.body.error).toBe('Approval request is already approved');
    });

    it('should reject an unknown status with 400', async () => {
      const approval = assistant.approvals.submit('s1', 'close account');

      const response = await request(app)
        .post(`/chat/approvals/${approval.id}`)
        .send({ status: 'pending' });

      expect(response.status).toBe(400);
      expect(response.body.details[0].field).toBe('status');
      expect(assistant.approvals.get(approval.id)?.status).toBe('pending');
    });
  });

  describe('service endpoints', () => {
    it('should describe the service at the root', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ name: 'Banking Assistant', status: 'running' });
    });

    it('should return 404 for unknown endpoints', async () => {
      const response = await request(app).get('/api/non-existent');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Cannot GET /api/non-existent');
    });

    it('should include a request id header', async () => {
      const response = await request(app).get('/');

      expect(response.headers['x-request-id']).toBeTruthy();
    });

    it('should echo a caller-supplied request id', async () => {
      const response = await request(app).get('/').set('X-Request-Id', 'req-123');

      expect(response.headers['x-request-id']).toBe('req-123');
    });
  });
});
