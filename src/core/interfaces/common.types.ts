import { CounterName, TransitionOutcome } from '../domain/enums';

/**
 * Normalized inbound message event produced by the payload decoder
 */
export interface DecodedMessageEvent {
  senderId: string;
  /** Epoch seconds */
  messageTimestamp: number;
  contactName?: string;
  /** Platform message type (text, image, ...); informational only */
  messageType?: string;
}

/**
 * Current counter values keyed by counter name
 */
export type CounterSnapshot = Record<CounterName, number>;

/**
 * Signed deltas applied to counters by one transition
 */
export type CounterDeltas = Partial<Record<CounterName, number>>;

/**
 * Outcome of a store-level close
 */
export type CloseResult =
  | TransitionOutcome.CLOSED
  | TransitionOutcome.ALREADY_CLOSED
  | TransitionOutcome.NOT_FOUND;

/**
 * Values written by a recalculation
 */
export interface RecalculationResult {
  open: number;
  closed: number;
  new: number;
}

/**
 * Row counts reported on the readiness endpoint
 */
export interface StoreStatistics {
  conversationCount: number;
  openCount: number;
  closedCount: number;
}
