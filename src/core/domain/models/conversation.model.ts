import { ConversationStatus } from '../enums';

/**
 * Wire shape of a conversation on the query surface
 */
export interface ConversationStatusRecord {
  status: ConversationStatus;
  creation_timestamp: number;
  closed_timestamp: number | null;
  last_message_timestamp: number | null;
  contact_name: string | null;
}

/**
 * Per-sender conversation record.
 * Invariant: closedTimestamp is set iff status is CLOSED.
 */
export class Conversation {
  constructor(
    public readonly senderId: string,
    public status: ConversationStatus,
    public creationTimestamp: number,
    public closedTimestamp: number | null = null,
    public lastMessageTimestamp: number | null = null,
    public contactName: string | null = null,
  ) {}

  /**
   * Build a freshly opened conversation
   */
  static open(
    senderId: string,
    timestamp: number,
    contactName?: string,
  ): Conversation {
    return new Conversation(
      senderId,
      ConversationStatus.OPEN,
      timestamp,
      null,
      timestamp,
      contactName ?? null,
    );
  }

  isOpen(): boolean {
    return this.status === ConversationStatus.OPEN;
  }

  isClosed(): boolean {
    return this.status === ConversationStatus.CLOSED;
  }

  /**
   * Start a new open period; the creation timestamp moves to the message
   */
  reopen(timestamp: number, contactName?: string): void {
    this.status = ConversationStatus.OPEN;
    this.creationTimestamp = timestamp;
    this.closedTimestamp = null;
    this.touch(timestamp, contactName);
  }

  /**
   * Record activity without touching the lifecycle phase
   */
  touch(timestamp: number, contactName?: string): void {
    this.lastMessageTimestamp = timestamp;
    if (contactName) {
      this.contactName = contactName;
    }
  }

  close(timestamp: number): void {
    this.status = ConversationStatus.CLOSED;
    this.closedTimestamp = timestamp;
  }

  clone(): Conversation {
    return new Conversation(
      this.senderId,
      this.status,
      this.creationTimestamp,
      this.closedTimestamp,
      this.lastMessageTimestamp,
      this.contactName,
    );
  }

  toStatusRecord(): ConversationStatusRecord {
    return {
      status: this.status,
      creation_timestamp: this.creationTimestamp,
      closed_timestamp: this.closedTimestamp,
      last_message_timestamp: this.lastMessageTimestamp,
      contact_name: this.contactName,
    };
  }
}
