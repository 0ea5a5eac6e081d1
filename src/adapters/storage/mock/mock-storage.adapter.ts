import {
  ALL_COUNTERS,
  CloseResult,
  Conversation,
  ConversationStore,
  ConversationTransaction,
  CounterName,
  CounterSnapshot,
  RecalculationResult,
  StorageError,
  StoreStatistics,
  TransitionOutcome,
} from '../../../core';
import { SerialQueue } from '../serial-queue';

/**
 * Mock storage adapter for testing
 * Provides in-memory storage with deterministic behavior
 */
export class MockStorageAdapter implements ConversationStore {
  private conversations: Map<string, Conversation> = new Map();
  private counters: Map<CounterName, number> = new Map();

  // Transaction support
  private readonly queue = new SerialQueue();
  private failures: Map<string, Error> = new Map();
  private closed = false;

  private readonly options: Required<MockStorageOptions>;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  /**
   * Simulate I/O latency if configured; lets concurrent callers interleave
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  /**
   * Throw the failure injected for `operation`, if any
   */
  private checkFailure(operation: string): void {
    if (this.closed) {
      throw new StorageError('Store is closed', operation);
    }
    const failure = this.failures.get(operation);
    if (failure) {
      throw StorageError.wrap(operation, failure);
    }
  }

  // ==================== Lifecycle ====================

  async initialize(): Promise<void> {
    this.closed = false;
    for (const name of ALL_COUNTERS) {
      if (!this.counters.has(name)) {
        this.counters.set(name, 0);
      }
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // ==================== Transaction Support ====================

  async withTransaction<T>(
    work: (txn: ConversationTransaction) => Promise<T>,
  ): Promise<T> {
    return this.queue.run(async () => {
      this.checkFailure('withTransaction');

      // Save current state for rollback
      const conversationsBefore = new Map(
        [...this.conversations].map(([id, c]): [string, Conversation] => [
          id,
          c.clone(),
        ]),
      );
      const countersBefore = new Map(this.counters);

      try {
        return await work(this.createTransaction());
      } catch (error) {
        this.conversations = conversationsBefore;
        this.counters = countersBefore;
        throw StorageError.wrap('withTransaction', error);
      }
    });
  }

  private createTransaction(): ConversationTransaction {
    return {
      get: async (senderId) => {
        await this.simulateLatency();
        this.checkFailure('get');
        return this.conversations.get(senderId)?.clone() ?? null;
      },

      upsertOpen: async (senderId, timestamp, contactName) => {
        await this.simulateLatency();
        this.checkFailure('upsertOpen');

        const existing = this.conversations.get(senderId);
        if (existing) {
          existing.reopen(timestamp, contactName);
          return existing.clone();
        }

        const conversation = Conversation.open(senderId, timestamp, contactName);
        this.conversations.set(senderId, conversation);
        return conversation.clone();
      },

      touch: async (senderId, timestamp, contactName) => {
        await this.simulateLatency();
        this.checkFailure('touch');
        this.conversations.get(senderId)?.touch(timestamp, contactName);
      },

      close: async (senderId, timestamp): Promise<CloseResult> => {
        await this.simulateLatency();
        this.checkFailure('close');

        const conversation = this.conversations.get(senderId);
        if (!conversation) {
          return TransitionOutcome.NOT_FOUND;
        }
        if (conversation.isClosed()) {
          return TransitionOutcome.ALREADY_CLOSED;
        }
        conversation.close(timestamp);
        return TransitionOutcome.CLOSED;
      },

      incrementCounter: async (name, delta) => {
        this.checkFailure('incrementCounter');
        this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
      },

      setCounter: async (name, value) => {
        this.checkFailure('setCounter');
        this.counters.set(name, value);
      },

      readCounters: async () => this.snapshotCounters(),
    };
  }

  // ==================== Queries ====================
  // Reads queue behind writes so they never see a transaction half applied

  async getConversation(senderId: string): Promise<Conversation | null> {
    return this.queue.run(async () => {
      await this.simulateLatency();
      this.checkFailure('getConversation');
      return this.conversations.get(senderId)?.clone() ?? null;
    });
  }

  async listConversations(): Promise<Conversation[]> {
    return this.queue.run(async () => {
      await this.simulateLatency();
      this.checkFailure('listConversations');
      return [...this.conversations.values()]
        .map((c) => c.clone())
        .sort((a, b) => b.creationTimestamp - a.creationTimestamp);
    });
  }

  async readCounters(): Promise<CounterSnapshot> {
    return this.queue.run(async () => {
      this.checkFailure('readCounters');
      return this.snapshotCounters();
    });
  }

  async recalculateCounters(): Promise<RecalculationResult> {
    return this.withTransaction(async (txn) => {
      const stats = this.countRows();
      await txn.setCounter(CounterName.OPEN_CONVERSATIONS, stats.openCount);
      await txn.setCounter(CounterName.CLOSED_CONVERSATIONS, stats.closedCount);
      await txn.setCounter(CounterName.NEW_CONVERSATIONS, stats.openCount);
      return {
        open: stats.openCount,
        closed: stats.closedCount,
        new: stats.openCount,
      };
    });
  }

  async isHealthy(): Promise<boolean> {
    return !this.closed && !this.failures.has('isHealthy');
  }

  async getStatistics(): Promise<StoreStatistics> {
    return this.queue.run(async () => {
      this.checkFailure('getStatistics');
      return this.countRows();
    });
  }

  // ==================== Test Helpers ====================

  /**
   * Make every later call of `operation` fail until cleared
   */
  injectFailure(operation: string, error: Error = new Error('Injected failure')): void {
    this.failures.set(operation, error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /**
   * Overwrite a counter outside the lifecycle engine, to simulate drift
   */
  seedCounter(name: CounterName, value: number): void {
    this.counters.set(name, value);
  }

  /**
   * Insert a row outside the lifecycle engine, to simulate history that was
   * never counted
   */
  seedConversation(conversation: Conversation): void {
    this.conversations.set(conversation.senderId, conversation.clone());
  }

  clear(): void {
    this.conversations.clear();
    this.counters.clear();
    this.failures.clear();
    for (const name of ALL_COUNTERS) {
      this.counters.set(name, 0);
    }
  }

  private snapshotCounters(): CounterSnapshot {
    return {
      [CounterName.NEW_CONVERSATIONS]:
        this.counters.get(CounterName.NEW_CONVERSATIONS) ?? 0,
      [CounterName.OPEN_CONVERSATIONS]:
        this.counters.get(CounterName.OPEN_CONVERSATIONS) ?? 0,
      [CounterName.CLOSED_CONVERSATIONS]:
        this.counters.get(CounterName.CLOSED_CONVERSATIONS) ?? 0,
    };
  }

  private countRows(): StoreStatistics {
    let openCount = 0;
    let closedCount = 0;
    for (const conversation of this.conversations.values()) {
      if (conversation.isOpen()) {
        openCount++;
      } else {
        closedCount++;
      }
    }
    return {
      conversationCount: this.conversations.size,
      openCount,
      closedCount,
    };
  }
}

export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}
