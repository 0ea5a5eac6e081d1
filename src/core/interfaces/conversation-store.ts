import { Conversation } from '../domain/models';
import { CounterName } from '../domain/enums';
import {
  CloseResult,
  CounterSnapshot,
  RecalculationResult,
  StoreStatistics,
} from './common.types';

/**
 * Operations available inside one atomic store transaction.
 * Everything done through a single handle commits or rolls back together.
 */
export interface ConversationTransaction {
  get(senderId: string): Promise<Conversation | null>;

  /**
   * Set status open, creation timestamp to `timestamp`, clear the closed
   * timestamp; creates the row when absent. The contact name only changes
   * when one is given.
   */
  upsertOpen(
    senderId: string,
    timestamp: number,
    contactName?: string,
  ): Promise<Conversation>;

  /**
   * Record a message on an open conversation; no status change
   */
  touch(senderId: string, timestamp: number, contactName?: string): Promise<void>;

  close(senderId: string, timestamp: number): Promise<CloseResult>;

  incrementCounter(name: CounterName, delta: number): Promise<void>;

  setCounter(name: CounterName, value: number): Promise<void>;

  readCounters(): Promise<CounterSnapshot>;
}

/**
 * Conversation store - durable per-sender state plus named counters.
 *
 * Implementations run transactions one at a time (single writer) and report
 * every failure as a StorageError after rolling back.
 */
export interface ConversationStore {
  /**
   * Create missing counters with value 0; existing values are kept
   */
  initialize(): Promise<void>;

  /**
   * Execute operations within one transaction.
   * Commits when `work` resolves, rolls back when it rejects.
   */
  withTransaction<T>(work: (txn: ConversationTransaction) => Promise<T>): Promise<T>;

  getConversation(senderId: string): Promise<Conversation | null>;

  /**
   * All conversations, newest creation timestamp first
   */
  listConversations(): Promise<Conversation[]>;

  readCounters(): Promise<CounterSnapshot>;

  /**
   * Recount rows per status and overwrite the counters; new := open
   */
  recalculateCounters(): Promise<RecalculationResult>;

  isHealthy(): Promise<boolean>;

  getStatistics(): Promise<StoreStatistics>;

  close(): Promise<void>;
}
