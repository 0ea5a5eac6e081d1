/**
 * Persisted lifecycle phase of a conversation
 */
export enum ConversationStatus {
  /**
   * Conversation accepts messages without changing counters
   */
  OPEN = 'open',

  /**
   * Closed by an administrator; the next message reopens it
   */
  CLOSED = 'closed',
}
