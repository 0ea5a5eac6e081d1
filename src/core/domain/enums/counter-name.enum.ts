/**
 * Named aggregate counters kept beside the conversations table
 */
export enum CounterName {
  /**
   * Opens and reopens not yet matched by a close.
   * Mirrors OPEN_CONVERSATIONS after recalculation; may go negative when
   * closes hit conversations opened before counting started.
   */
  NEW_CONVERSATIONS = 'new_conversation_count',

  OPEN_CONVERSATIONS = 'open_conversation_count',

  CLOSED_CONVERSATIONS = 'closed_conversation_count',
}

export const ALL_COUNTERS: readonly CounterName[] = [
  CounterName.NEW_CONVERSATIONS,
  CounterName.OPEN_CONVERSATIONS,
  CounterName.CLOSED_CONVERSATIONS,
];
