import { v4 as uuidv4 } from 'uuid';

export type ApprovalStatus = 'pending' | 'approved' | 'rejected';

export interface ApprovalRequest {
  id: string;
  sessionId: string;
  message: string;
  status: ApprovalStatus;
  createdAt: Date;
}

const DEFAULT_MAX_ENTRIES = 100;

/**
 * High-risk requests held for a human. Oldest entries drop off once the queue
 * is full.
 */
export class ApprovalQueue {
  private requests: ApprovalRequest[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    this.maxEntries = maxEntries;
  }

  submit(sessionId: string, message: string): ApprovalRequest {
    const request: ApprovalRequest = {
      id: uuidv4(),
      sessionId,
      message,
      status: 'pending',
      createdAt: new Date()
    };

    this.requests.push(request);
    if (this.requests.length > this.maxEntries) {
      this.requests.splice(0, this.requests.length - this.maxEntries);
    }

    return { ...request };
  }

  list(status?: ApprovalStatus): ApprovalRequest[] {
    return this.requests
      .filter(request => status === undefined || request.status === status)
      .map(request => ({ ...request }));
  }

  get(id: string): ApprovalRequest | null {
    const request = this.requests.find(entry => entry.id === id);
    return request ? { ...request } : null;
  }

  /**
   * Settle a pending request. Returns null when the id is unknown or the
   * request was already settled.
   */
  resolve(id: string, status: Exclude<ApprovalStatus, 'pending'>): ApprovalRequest | null {
    const request = this.requests.find(entry => entry.id === id);
    if (!request || request.status !== 'pending') {
      return null;
    }
    request.status = status;
    return { ...request };
  }

  get size(): number {
    return this.requests.length;
  }

  clear(): void {
    this.requests = [];
  }
}
