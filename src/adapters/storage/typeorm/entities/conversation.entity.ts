import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { ConversationStatus } from '../../../../core';

/**
 * TypeORM entity for Conversation
 */
@Entity('conversations')
@Index(['status'])
@Index(['creationTimestamp'])
export class ConversationEntity {
  @PrimaryColumn({ name: 'sender_id', type: 'varchar' })
  senderId!: string;

  @Column({ type: 'varchar', length: 16 })
  status!: ConversationStatus;

  @Column({ name: 'creation_timestamp', type: 'integer' })
  creationTimestamp!: number;

  @Column({ name: 'closed_timestamp', type: 'integer', nullable: true })
  closedTimestamp!: number | null;

  @Column({ name: 'last_message_timestamp', type: 'integer', nullable: true })
  lastMessageTimestamp!: number | null;

  @Column({ name: 'contact_name', type: 'varchar', nullable: true })
  contactName!: string | null;
}
