import { DataSource, EntityManager, Repository } from 'typeorm';
import {
  ALL_COUNTERS,
  CloseResult,
  Conversation,
  ConversationStatus,
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
import { ConversationEntity, CounterEntity } from './entities';

/**
 * TypeORM implementation of ConversationStore for SQLite
 *
 * The SQLite drivers share one connection, so transactions and reads are
 * queued and run one at a time.
 */
export class TypeORMStorageAdapter implements ConversationStore {
  private conversationRepo: Repository<ConversationEntity>;
  private counterRepo: Repository<CounterEntity>;
  private readonly queue = new SerialQueue();

  constructor(private readonly dataSource: DataSource) {
    this.conversationRepo = dataSource.getRepository(ConversationEntity);
    this.counterRepo = dataSource.getRepository(CounterEntity);
  }

  /**
   * Lifecycle
   */

  async initialize(): Promise<void> {
    await this.run('initialize', async () => {
      if (!this.dataSource.isInitialized) {
        await this.dataSource.initialize();
      }

      await this.counterRepo
        .createQueryBuilder()
        .insert()
        .into(CounterEntity)
        .values(ALL_COUNTERS.map((name) => ({ name, value: 0 })))
        .orIgnore()
        .execute();
    });
  }

  async close(): Promise<void> {
    await this.run('close', async () => {
      if (this.dataSource.isInitialized) {
        await this.dataSource.destroy();
      }
    });
  }

  /**
   * Transaction Management
   */

  async withTransaction<T>(
    work: (txn: ConversationTransaction) => Promise<T>,
  ): Promise<T> {
    return this.inTransaction('withTransaction', (manager) =>
      work(this.createTransaction(manager)),
    );
  }

  private inTransaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    return this.run(operation, async () => {
      const queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();

      try {
        const result = await work(queryRunner.manager);
        await queryRunner.commitTransaction();
        return result;
      } catch (error) {
        await queryRunner.rollbackTransaction();
        throw error;
      } finally {
        await queryRunner.release();
      }
    });
  }

  private createTransaction(manager: EntityManager): ConversationTransaction {
    return {
      get: (senderId) => this.findConversation(manager, senderId),

      upsertOpen: async (senderId, timestamp, contactName) => {
        const existing = await this.findConversation(manager, senderId);
        let conversation: Conversation;
        if (existing) {
          existing.reopen(timestamp, contactName);
          conversation = existing;
        } else {
          conversation = Conversation.open(senderId, timestamp, contactName);
        }

        await manager.save(ConversationEntity, this.toEntity(conversation));
        return conversation;
      },

      touch: async (senderId, timestamp, contactName) => {
        await manager.update(
          ConversationEntity,
          { senderId },
          contactName
            ? { lastMessageTimestamp: timestamp, contactName }
            : { lastMessageTimestamp: timestamp },
        );
      },

      close: async (senderId, timestamp): Promise<CloseResult> => {
        const existing = await this.findConversation(manager, senderId);
        if (!existing) {
          return TransitionOutcome.NOT_FOUND;
        }
        if (existing.isClosed()) {
          return TransitionOutcome.ALREADY_CLOSED;
        }

        await manager.update(
          ConversationEntity,
          { senderId },
          { status: ConversationStatus.CLOSED, closedTimestamp: timestamp },
        );
        return TransitionOutcome.CLOSED;
      },

      incrementCounter: async (name, delta) => {
        if (delta > 0) {
          await manager.increment(CounterEntity, { name }, 'value', delta);
        } else if (delta < 0) {
          await manager.decrement(CounterEntity, { name }, 'value', -delta);
        }
      },

      setCounter: async (name, value) => {
        await manager.save(CounterEntity, { name, value });
      },

      readCounters: async () =>
        this.toSnapshot(await manager.find(CounterEntity)),
    };
  }

  /**
   * Queries
   */

  async getConversation(senderId: string): Promise<Conversation | null> {
    return this.run('getConversation', () =>
      this.findConversation(this.dataSource.manager, senderId),
    );
  }

  async listConversations(): Promise<Conversation[]> {
    return this.run('listConversations', async () => {
      const entities = await this.conversationRepo.find({
        order: { creationTimestamp: 'DESC' },
      });
      return entities.map((entity) => this.toDomain(entity));
    });
  }

  async readCounters(): Promise<CounterSnapshot> {
    return this.run('readCounters', async () =>
      this.toSnapshot(await this.counterRepo.find()),
    );
  }

  async recalculateCounters(): Promise<RecalculationResult> {
    return this.inTransaction('recalculateCounters', async (manager) => {
      const stats = await this.countRows(manager);
      const txn = this.createTransaction(manager);

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

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    try {
      await this.run('isHealthy', () => this.dataSource.query('SELECT 1'));
      return true;
    } catch {
      return false;
    }
  }

  async getStatistics(): Promise<StoreStatistics> {
    return this.run('getStatistics', () =>
      this.countRows(this.dataSource.manager),
    );
  }

  /**
   * Helpers
   */

  private run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      try {
        return await work();
      } catch (error) {
        throw StorageError.wrap(operation, error);
      }
    });
  }

  private async findConversation(
    manager: EntityManager,
    senderId: string,
  ): Promise<Conversation | null> {
    const entity = await manager.findOne(ConversationEntity, {
      where: { senderId },
    });
    return entity ? this.toDomain(entity) : null;
  }

  private async countRows(manager: EntityManager): Promise<StoreStatistics> {
    const openCount = await manager.count(ConversationEntity, {
      where: { status: ConversationStatus.OPEN },
    });
    const closedCount = await manager.count(ConversationEntity, {
      where: { status: ConversationStatus.CLOSED },
    });

    return {
      conversationCount: openCount + closedCount,
      openCount,
      closedCount,
    };
  }

  private toSnapshot(rows: CounterEntity[]): CounterSnapshot {
    const snapshot: CounterSnapshot = {
      [CounterName.NEW_CONVERSATIONS]: 0,
      [CounterName.OPEN_CONVERSATIONS]: 0,
      [CounterName.CLOSED_CONVERSATIONS]: 0,
    };
    for (const row of rows) {
      snapshot[row.name] = row.value;
    }
    return snapshot;
  }

  private toDomain(entity: ConversationEntity): Conversation {
    return new Conversation(
      entity.senderId,
      entity.status,
      entity.creationTimestamp,
      entity.closedTimestamp,
      entity.lastMessageTimestamp,
      entity.contactName,
    );
  }

  private toEntity(conversation: Conversation): ConversationEntity {
    return this.conversationRepo.create({
      senderId: conversation.senderId,
      status: conversation.status,
      creationTimestamp: conversation.creationTimestamp,
      closedTimestamp: conversation.closedTimestamp,
      lastMessageTimestamp: conversation.lastMessageTimestamp,
      contactName: conversation.contactName,
    });
  }
}
