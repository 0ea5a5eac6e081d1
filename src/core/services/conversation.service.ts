import {
  ConversationStore,
  CounterSnapshot,
  RecalculationResult,
  CloseResult,
} from '../interfaces';
import { ConversationStatusRecord } from '../domain/models';
import { TransitionOutcome } from '../domain/enums';
import { ConversationLifecycleEngine } from '../state-machine';

export const SUBSCRIBE_MODE = 'subscribe';

/**
 * JSON object text for an ordered map. Sender ids are digit strings, which a
 * plain object would enumerate in ascending numeric order.
 */
export function toOrderedJson<V>(entries: Map<string, V>): string {
  const members = [...entries].map(
    ([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value)}`,
  );
  return `{${members.join(',')}}`;
}

/**
 * Query-first Conversation Service
 *
 * Read access to conversation state and counters, plus the administrative
 * operations. Every mutation goes through the lifecycle engine.
 */
export class ConversationService {
  constructor(
    private readonly store: ConversationStore,
    private readonly engine: ConversationLifecycleEngine,
  ) {}

  async getCounts(): Promise<CounterSnapshot> {
    return this.store.readCounters();
  }

  /**
   * Status records keyed by sender, newest creation first
   */
  async listStatuses(): Promise<Map<string, ConversationStatusRecord>> {
    const conversations = await this.store.listConversations();
    return new Map(
      conversations.map((c): [string, ConversationStatusRecord] => [
        c.senderId,
        c.toStatusRecord(),
      ]),
    );
  }

  async getStatus(senderId: string): Promise<ConversationStatusRecord | null> {
    const conversation = await this.store.getConversation(senderId);
    return conversation ? conversation.toStatusRecord() : null;
  }

  async closeConversation(senderId: string): Promise<CloseResult> {
    const result = await this.engine.close(senderId);

    switch (result.outcome) {
      case TransitionOutcome.CLOSED:
      case TransitionOutcome.ALREADY_CLOSED:
      case TransitionOutcome.NOT_FOUND:
        return result.outcome;
      default:
        throw new Error(`Unexpected close outcome: ${result.outcome}`);
    }
  }

  async recalculateCounters(): Promise<RecalculationResult> {
    return this.store.recalculateCounters();
  }

  /**
   * Webhook subscription handshake: the challenge to echo back, or null
   * when the request must be refused
   */
  verifySubscription(
    mode: string | undefined,
    token: string | undefined,
    challenge: string | undefined,
    verifyToken: string | undefined,
  ): string | null {
    if (!verifyToken || mode !== SUBSCRIBE_MODE || token !== verifyToken) {
      return null;
    }
    return challenge ?? '';
  }
}
