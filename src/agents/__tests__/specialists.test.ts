import { StructuredToolInterface } from '@langchain/core/tools';
import { AccountAgent } from '../account';
import { BlockAgent } from '../block';
import { InfoAgent } from '../info';
import { ConversationMessage, Destination } from '../../types/chat.types';
import { createFakeModel, loadTestBankData } from '../../../tests/helpers';

const mockInvoke = jest.fn();

jest.mock('langchain/agents', () => ({
  createToolCallingAgent: jest.fn(() => ({})),
  AgentExecutor: jest.fn().mockImplementation((config: { tools: StructuredToolInterface[] }) => ({
    invoke: (input: unknown) => mockInvoke(input, config.tools)
  }))
}));

const context = { sessionId: 'session-a', userId: 'user_101' };

const turn = (content: string, role: ConversationMessage['role'] = 'user'): ConversationMessage => ({
  role,
  content,
  timestamp: new Date()
});

describe('specialist agents', () => {
  const bankData = loadTestBankData();

  afterEach(() => {
    mockInvoke.mockReset();
  });

  describe('AccountAgent', () => {
    it('should answer from its balance tool', async () => {
      mockInvoke.mockImplementation(async (_input: unknown, tools: StructuredToolInterface[]) => ({
        output: await tools[0].invoke({})
      }));
      const agent = new AccountAgent(createFakeModel(), bankData);

      const result = await agent.process([turn('What is my balance?')], context);

      expect(result.success).toBe(true);
      expect(result.text).toBe('Balance: $1250.00 (Checking)');
      expect(agent.destination).toBe(Destination.ACCOUNT);
    });

    it('should split the latest message from the prior history', async () => {
      mockInvoke.mockResolvedValue({ output: 'done' });
      const agent = new AccountAgent(createFakeModel(), bankData);

      await agent.process(
        [turn('Hi'), turn('Hello! How can I help?', 'assistant'), turn('Show my transactions')],
        context
      );

      const [input, tools] = mockInvoke.mock.calls[0];
      expect(input.input).toBe('Show my transactions');
      expect(input.chat_history).toHaveLength(2);
      expect(input.chat_history[0].content).toBe('Hi');
      expect(input.chat_history[1].content).toBe('Hello! How can I help?');
      expect(tools.map((t: StructuredToolInterface) => t.name)).toEqual(['get_my_balance', 'get_my_transactions']);
    });

    it('should flatten structured output into text', async () => {
      mockInvoke.mockResolvedValue({ output: [{ type: 'text', text: 'Your balance' }, { type: 'text', text: 'is fine.' }] });
      const agent = new AccountAgent(createFakeModel(), bankData);

      const result = await agent.process([turn('balance?')], context);

      expect(result.text).toBe('Your balance is fine.');
    });

    it('should fail when the conversation does not end with a user message', async () => {
      const agent = new AccountAgent(createFakeModel(), bankData);

      const result = await agent.process([turn('Hello', 'assistant')], context);

      expect(result.success).toBe(false);
      expect(result.error?.message).toBe('Conversation must end with a user message');
      expect(mockInvoke).not.toHaveBeenCalled();
    });

    it('should report executor failures', async () => {
      mockInvoke.mockRejectedValue(new Error('upstream 529'));
      const agent = new AccountAgent(createFakeModel(), bankData);

      const result = await agent.process([turn('balance?')], context);

      expect(result.success).toBe(false);
      expect(result.error?.message).toBe('upstream 529');
    });
  });

  describe('InfoAgent', () => {
    it('should only carry the policy tool', async () => {
      mockInvoke.mockImplementation(async (_input: unknown, tools: StructuredToolInterface[]) => ({
        output: `${tools.length}:${await tools[0].invoke({ topic: 'branch hours' })}`
      }));
      const agent = new InfoAgent(createFakeModel(), bankData);

      const result = await agent.process([turn('When are you open?')], context);

      expect(result.text).toBe('1:Branches are open 9am-5pm Mon-Fri.');
      expect(agent.destination).toBe(Destination.INFO);
    });
  });

  describe('BlockAgent', () => {
    it('should return the fixed refusal without calling a model', async () => {
      const agent = new BlockAgent('No can do.');

      const result = await agent.process([turn('anything')], context);

      expect(result.success).toBe(true);
      expect(result.text).toBe('No can do.');
      expect(agent.destination).toBe(Destination.BLOCK);
      expect(mockInvoke).not.toHaveBeenCalled();
    });
  });
});
