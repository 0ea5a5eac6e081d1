import {
  Conversation,
  ConversationLifecycleEngine,
  ConversationStatus,
  CounterName,
  LifecycleState,
  MockStorageAdapter,
  StorageError,
  TransitionEvent,
  TransitionOutcome,
  TransitionRuleMissingError,
  TriggerType,
} from '../../src';

describe('ConversationLifecycleEngine', () => {
  let store: MockStorageAdapter;
  let engine: ConversationLifecycleEngine;

  const message = (senderId: string, messageTimestamp: number, contactName?: string) => ({
    senderId,
    messageTimestamp,
    contactName,
  });

  beforeEach(async () => {
    store = new MockStorageAdapter();
    await store.initialize();
    engine = new ConversationLifecycleEngine(store, {
      now: () => 1700000000000,
    });
  });

  describe('Rule table', () => {
    it('should cover every (state, trigger) pair', () => {
      for (const state of Object.values(LifecycleState)) {
        for (const trigger of Object.values(TriggerType)) {
          expect(() => engine.getRule(state, trigger)).not.toThrow();
        }
      }
      expect(engine.getAllRules()).toHaveLength(6);
    });

    it('should throw when a custom rule table leaves a pair uncovered', () => {
      const partial = new ConversationLifecycleEngine(store, {
        rules: engine
          .getAllRules()
          .filter((r) => r.trigger !== TriggerType.ADMIN_CLOSE),
      });

      expect(() =>
        partial.getRule(LifecycleState.OPEN, TriggerType.ADMIN_CLOSE),
      ).toThrow(TransitionRuleMissingError);
    });

    it('should keep the new and open deltas equal on every rule', () => {
      for (const rule of engine.getAllRules()) {
        expect(rule.counterDeltas[CounterName.NEW_CONVERSATIONS] ?? 0).toBe(
          rule.counterDeltas[CounterName.OPEN_CONVERSATIONS] ?? 0,
        );
      }
    });

    it('should describe the rule table as a state diagram', () => {
      const diagram = engine.describe().split('\n');

      expect(diagram[0]).toBe('stateDiagram-v2');
      expect(diagram).toContain('    absent --> open : message (opened)');
      expect(diagram).toContain('    open --> closed : admin_close (closed)');
    });
  });

  describe('Inbound messages', () => {
    it('should open a conversation for an unseen sender', async () => {
      const result = await engine.handleMessage(message('5511999', 100, 'Maria'));

      expect(result.outcome).toBe(TransitionOutcome.OPENED);
      expect(result.fromState).toBe(LifecycleState.ABSENT);
      expect(result.toState).toBe(LifecycleState.OPEN);
      expect(result.conversation?.toStatusRecord()).toEqual({
        status: ConversationStatus.OPEN,
        creation_timestamp: 100,
        closed_timestamp: null,
        last_message_timestamp: 100,
        contact_name: 'Maria',
      });
      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: 1,
        [CounterName.OPEN_CONVERSATIONS]: 1,
        [CounterName.CLOSED_CONVERSATIONS]: 0,
      });
    });

    it('should continue an open conversation without counter changes', async () => {
      await engine.handleMessage(message('5511999', 100));
      const result = await engine.handleMessage(message('5511999', 150, 'Maria'));

      expect(result.outcome).toBe(TransitionOutcome.CONTINUED);
      expect(result.conversation?.creationTimestamp).toBe(100);
      expect(result.conversation?.lastMessageTimestamp).toBe(150);
      expect(result.conversation?.contactName).toBe('Maria');
      expect((await store.readCounters())[CounterName.OPEN_CONVERSATIONS]).toBe(1);
    });

    it('should keep the stored contact name when a message carries none', async () => {
      await engine.handleMessage(message('5511999', 100, 'Maria'));
      await engine.handleMessage(message('5511999', 110));

      expect((await store.getConversation('5511999'))?.contactName).toBe('Maria');
    });

    it('should be idempotent for a redelivered message', async () => {
      await engine.handleMessage(message('5511999', 100));
      await engine.handleMessage(message('5511999', 100));
      await engine.handleMessage(message('5511999', 100));

      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: 1,
        [CounterName.OPEN_CONVERSATIONS]: 1,
        [CounterName.CLOSED_CONVERSATIONS]: 0,
      });
    });

    it('should reopen a closed conversation with a new creation timestamp', async () => {
      await engine.handleMessage(message('5511999', 100));
      await engine.close('5511999', 150);
      const result = await engine.handleMessage(message('5511999', 200));

      expect(result.outcome).toBe(TransitionOutcome.REOPENED);
      expect(result.conversation?.toStatusRecord()).toMatchObject({
        status: ConversationStatus.OPEN,
        creation_timestamp: 200,
        closed_timestamp: null,
      });
      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: 1,
        [CounterName.OPEN_CONVERSATIONS]: 1,
        [CounterName.CLOSED_CONVERSATIONS]: 0,
      });
    });
  });

  describe('Administrative close', () => {
    it('should close an open conversation', async () => {
      await engine.handleMessage(message('5511999', 100));
      const result = await engine.close('5511999', 150);

      expect(result.outcome).toBe(TransitionOutcome.CLOSED);
      expect(result.conversation?.closedTimestamp).toBe(150);
      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: 0,
        [CounterName.OPEN_CONVERSATIONS]: 0,
        [CounterName.CLOSED_CONVERSATIONS]: 1,
      });
    });

    it('should default the close time to the engine clock in seconds', async () => {
      await engine.handleMessage(message('5511999', 100));
      const result = await engine.close('5511999');

      expect(result.timestamp).toBe(1700000000);
      expect(result.conversation?.closedTimestamp).toBe(1700000000);
    });

    it('should report already_closed without counter changes', async () => {
      await engine.handleMessage(message('5511999', 100));
      await engine.close('5511999', 150);
      const result = await engine.close('5511999', 160);

      expect(result.outcome).toBe(TransitionOutcome.ALREADY_CLOSED);
      expect(result.conversation?.closedTimestamp).toBe(150);
      expect((await store.readCounters())[CounterName.CLOSED_CONVERSATIONS]).toBe(1);
    });

    it('should report not_found for an unknown sender', async () => {
      const result = await engine.close('unknown', 150);

      expect(result.outcome).toBe(TransitionOutcome.NOT_FOUND);
      expect(result.conversation).toBeNull();
      expect(await store.getConversation('unknown')).toBeNull();
    });

    it('should drive new_conversation_count negative for rows that predate counting', async () => {
      store.seedConversation(Conversation.open('legacy', 50));

      await engine.close('legacy', 60);

      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: -1,
        [CounterName.OPEN_CONVERSATIONS]: -1,
        [CounterName.CLOSED_CONVERSATIONS]: 1,
      });

      const recalculated = await store.recalculateCounters();
      expect(recalculated).toEqual({ open: 0, closed: 1, new: 0 });
    });
  });

  describe('Scenario', () => {
    it('should track open, close and reopen for one sender', async () => {
      await engine.handleMessage(message('5511999', 100));

      expect((await store.getConversation('5511999'))?.toStatusRecord()).toMatchObject({
        status: ConversationStatus.OPEN,
        creation_timestamp: 100,
        closed_timestamp: null,
      });
      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: 1,
        [CounterName.OPEN_CONVERSATIONS]: 1,
        [CounterName.CLOSED_CONVERSATIONS]: 0,
      });

      await engine.close('5511999');
      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: 0,
        [CounterName.OPEN_CONVERSATIONS]: 0,
        [CounterName.CLOSED_CONVERSATIONS]: 1,
      });

      await engine.handleMessage(message('5511999', 200));
      expect((await store.getConversation('5511999'))?.toStatusRecord()).toMatchObject({
        status: ConversationStatus.OPEN,
        creation_timestamp: 200,
      });
      expect(await store.readCounters()).toEqual({
        [CounterName.NEW_CONVERSATIONS]: 1,
        [CounterName.OPEN_CONVERSATIONS]: 1,
        [CounterName.CLOSED_CONVERSATIONS]: 0,
      });
    });
  });

  describe('Concurrency', () => {
    it('should create one row for concurrent first messages from one sender', async () => {
      const slowStore = new MockStorageAdapter({ simulateLatency: true, latencyMs: 5 });
      await slowStore.initialize();
      const slowEngine = new ConversationLifecycleEngine(slowStore);

      const results = await Promise.all(
        Array.from({ length: 5 }, () =>
          slowEngine.handleMessage(message('5511999', 100)),
        ),
      );

      expect(results.map((r) => r.outcome).sort()).toEqual([
        TransitionOutcome.CONTINUED,
        TransitionOutcome.CONTINUED,
        TransitionOutcome.CONTINUED,
        TransitionOutcome.CONTINUED,
        TransitionOutcome.OPENED,
      ]);
      expect(await slowStore.listConversations()).toHaveLength(1);
      expect((await slowStore.readCounters())[CounterName.OPEN_CONVERSATIONS]).toBe(1);
    });

    it('should keep counters equal to row counts under interleaved senders', async () => {
      const slowStore = new MockStorageAdapter({ simulateLatency: true, latencyMs: 1 });
      await slowStore.initialize();
      const slowEngine = new ConversationLifecycleEngine(slowStore);

      await Promise.all([
        slowEngine.handleMessage(message('1', 10)),
        slowEngine.handleMessage(message('2', 10)),
        slowEngine.handleMessage(message('1', 11)),
        slowEngine.handleMessage(message('3', 12)),
      ]);
      await Promise.all([slowEngine.close('2', 20), slowEngine.close('2', 21)]);

      const stats = await slowStore.getStatistics();
      const counters = await slowStore.readCounters();
      expect(stats).toEqual({ conversationCount: 3, openCount: 2, closedCount: 1 });
      expect(counters[CounterName.OPEN_CONVERSATIONS]).toBe(stats.openCount);
      expect(counters[CounterName.CLOSED_CONVERSATIONS]).toBe(stats.closedCount);
    });

    it('should let reads issued mid-transition see the committed state', async () => {
      const slowStore = new MockStorageAdapter({ simulateLatency: true, latencyMs: 20 });
      await slowStore.initialize();
      const slowEngine = new ConversationLifecycleEngine(slowStore);

      const pending = slowEngine.handleMessage(message('5511999', 100));
      const [row, rows, counters, stats] = await Promise.all([
        slowStore.getConversation('5511999'),
        slowStore.listConversations(),
        slowStore.readCounters(),
        slowStore.getStatistics(),
      ]);

      expect(row?.status).toBe(ConversationStatus.OPEN);
      expect(rows).toHaveLength(1);
      expect(counters[CounterName.OPEN_CONVERSATIONS]).toBe(1);
      expect(stats.openCount).toBe(1);
      expect((await pending).outcome).toBe(TransitionOutcome.OPENED);
    });
  });

  describe('Failures', () => {
    it('should roll back the row when a counter update fails', async () => {
      store.injectFailure('incrementCounter', new Error('disk full'));

      await expect(engine.handleMessage(message('5511999', 100))).rejects.toThrow(
        StorageError,
      );

      store.clearFailures();
      expect(await store.getConversation('5511999')).toBeNull();
      expect((await store.readCounters())[CounterName.OPEN_CONVERSATIONS]).toBe(0);
    });
  });

  describe('Hooks', () => {
    it('should report committed transitions', async () => {
      const events: TransitionEvent[] = [];
      const observed = new ConversationLifecycleEngine(store, {
        hooks: { onTransition: (event) => void events.push(event) },
      });

      await observed.handleMessage(message('5511999', 100));
      await observed.close('5511999', 120);

      expect(events).toEqual([
        {
          senderId: '5511999',
          triggerType: TriggerType.MESSAGE,
          outcome: TransitionOutcome.OPENED,
          timestamp: 100,
        },
        {
          senderId: '5511999',
          triggerType: TriggerType.ADMIN_CLOSE,
          outcome: TransitionOutcome.CLOSED,
          timestamp: 120,
        },
      ]);
    });

    it('should not fail the transition when the hook throws', async () => {
      const observed = new ConversationLifecycleEngine(store, {
        hooks: {
          onTransition: () => {
            throw new Error('observer down');
          },
        },
      });

      const result = await observed.handleMessage(message('5511999', 100));

      expect(result.outcome).toBe(TransitionOutcome.OPENED);
      expect(await store.getConversation('5511999')).not.toBeNull();
    });
  });
});
