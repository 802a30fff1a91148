/**
 * Tool capabilities bound to the specialist agents. Every tool is a pure
 * read against the reference data store.
 */

import { tool } from '@langchain/core/tools';
import { z } from 'zod';
import { BankDataStore } from '../services/bankData';

export function createAccountTools(store: BankDataStore, userId: string) {
  const getMyBalance = tool(
    async () => store.getBalance(userId),
    {
      name: 'get_my_balance',
      description: 'Check the balance of the logged-in user.',
      schema: z.object({})
    }
  );

  const getMyTransactions = tool(
    async () => {
      const lines = store.getTransactions(userId);
      return lines.length > 0 ? lines.join('\n') : 'No recent transactions found.';
    },
    {
      name: 'get_my_transactions',
      description: 'Get the recent spending history of the logged-in user.',
      schema: z.object({})
    }
  );

  return [getMyBalance, getMyTransactions];
}

export function createInfoTools(store: BankDataStore) {
  const getBankPolicies = tool(
    async ({ topic }) => store.getPolicy(topic),
    {
      name: 'get_bank_policies',
      description: 'Retrieves general bank information (fees, hours, rates).',
      schema: z.object({
        topic: z.string().describe('The policy topic, e.g. fees, hours or rates')
      })
    }
  );

  return [getBankPolicies];
}
