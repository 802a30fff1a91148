/**
 * Read-only reference data behind the account and info tools
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../config/logger';

const userRecordSchema = z.object({
  user_id: z.string(),
  name: z.string(),
  balance: z.string(),
  account_type: z.string()
});

const transactionRecordSchema = z.object({
  user_id: z.string(),
  date: z.string(),
  merchant: z.string(),
  amount: z.string()
});

const policyRecordSchema = z.object({
  topic: z.string().min(1),
  text: z.string().min(1)
});

export type UserRecord = z.infer<typeof userRecordSchema>;
export type TransactionRecord = z.infer<typeof transactionRecordSchema>;
export type PolicyRecord = z.infer<typeof policyRecordSchema>;

export interface BankData {
  users: UserRecord[];
  transactions: TransactionRecord[];
  policies: PolicyRecord[];
}

export const USER_NOT_FOUND = 'Error: User not found or account data is missing.';
export const POLICY_NOT_FOUND = "I couldn't find a specific policy on that.";
export const DEFAULT_TRANSACTION_LIMIT = 5;

function readRecords<T>(filePath: string, schema: z.ZodType<T>): T[] {
  if (!fs.existsSync(filePath)) {
    logger.warn('Reference data file missing', { filePath });
    return [];
  }
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return z.array(schema).parse(raw);
}

export class BankDataStore {
  private readonly data: BankData;

  constructor(data: BankData) {
    this.data = data;
  }

  static fromDirectory(dataDir: string): BankDataStore {
    const store = new BankDataStore({
      users: readRecords(path.join(dataDir, 'users.json'), userRecordSchema),
      transactions: readRecords(path.join(dataDir, 'transactions.json'), transactionRecordSchema),
      policies: readRecords(path.join(dataDir, 'policies.json'), policyRecordSchema)
    });

    logger.info('Reference data loaded', {
      dataDir,
      users: store.data.users.length,
      transactions: store.data.transactions.length,
      policies: store.data.policies.length
    });

    return store;
  }

  getBalance(userId: string): string {
    const user = this.data.users.find(u => u.user_id === userId);
    if (!user) {
      return USER_NOT_FOUND;
    }
    return `Balance: $${user.balance} (${user.account_type})`;
  }

  /**
   * Most recent entries last, in file order.
   */
  getTransactions(userId: string, limit: number = DEFAULT_TRANSACTION_LIMIT): string[] {
    if (limit <= 0) {
      return [];
    }
    return this.data.transactions
      .filter(t => t.user_id === userId)
      .map(t => `${t.date}: ${t.merchant} ($${t.amount})`)
      .slice(-limit);
  }

  getPolicy(topic: string): string {
    const needle = topic.toLowerCase();
    const match = this.data.policies.find(p => needle.includes(p.topic.toLowerCase()));
    return match ? match.text : POLICY_NOT_FOUND;
  }
}
