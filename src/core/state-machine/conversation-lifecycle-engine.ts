import { Logger } from '@nestjs/common';
import { CounterName, TriggerType } from '../domain/enums';
import { Conversation } from '../domain/models';
import {
  ConversationStore,
  ConversationTransaction,
  CounterDeltas,
  DecodedMessageEvent,
  LifecycleHooks,
} from '../interfaces';
import {
  LifecycleRule,
  LifecycleState,
  TransitionResult,
  TransitionRuleMissingError,
} from './types';
import { LIFECYCLE_RULES, findLifecycleRule, stateOf } from './transition-rules';

export interface LifecycleEngineOptions {
  rules?: LifecycleRule[];
  hooks?: LifecycleHooks;
  /** Milliseconds since epoch; used for close timestamps */
  now?: () => number;
}

/**
 * Conversation lifecycle engine - decides and applies one transition per
 * trigger.
 *
 * The read of the current row, the rule lookup, the row write and the counter
 * updates all run inside a single store transaction, so two concurrent
 * first messages from the same sender cannot both observe ABSENT.
 */
export class ConversationLifecycleEngine {
  private readonly logger = new Logger(ConversationLifecycleEngine.name);
  private readonly rules: LifecycleRule[];
  private readonly hooks?: LifecycleHooks;
  private readonly now: () => number;

  constructor(
    private readonly store: ConversationStore,
    options: LifecycleEngineOptions = {},
  ) {
    this.rules = options.rules ?? LIFECYCLE_RULES;
    this.hooks = options.hooks;
    this.now = options.now ?? Date.now;
  }

  /**
   * Apply an inbound message: open, reopen or continue
   */
  async handleMessage(event: DecodedMessageEvent): Promise<TransitionResult> {
    const result = await this.store.withTransaction((txn) =>
      this.applyRule(
        txn,
        event.senderId,
        TriggerType.MESSAGE,
        event.messageTimestamp,
        event.contactName,
      ),
    );

    await this.notify(result);
    return result;
  }

  /**
   * Administrative close; reports ALREADY_CLOSED and NOT_FOUND without
   * touching counters
   */
  async close(senderId: string, timestamp?: number): Promise<TransitionResult> {
    const closedAt = timestamp ?? Math.floor(this.now() / 1000);

    const result = await this.store.withTransaction((txn) =>
      this.applyRule(txn, senderId, TriggerType.ADMIN_CLOSE, closedAt),
    );

    await this.notify(result);
    return result;
  }

  /**
   * Rule for a (state, trigger) pair; every pair is covered by default
   */
  getRule(from: LifecycleState, trigger: TriggerType): LifecycleRule {
    const rule = findLifecycleRule(from, trigger, this.rules);
    if (!rule) {
      throw new TransitionRuleMissingError(from, trigger);
    }
    return rule;
  }

  getAllRules(): LifecycleRule[] {
    return [...this.rules];
  }

  /**
   * Mermaid state diagram of the rule table
   */
  describe(): string {
    const lines = ['stateDiagram-v2'];

    for (const state of Object.values(LifecycleState)) {
      lines.push(`    ${state} : ${state}`);
    }

    for (const rule of this.rules) {
      lines.push(
        `    ${rule.from} --> ${rule.to} : ${rule.trigger} (${rule.outcome})`,
      );
    }

    return lines.join('\n');
  }

  private async applyRule(
    txn: ConversationTransaction,
    senderId: string,
    trigger: TriggerType,
    timestamp: number,
    contactName?: string,
  ): Promise<TransitionResult> {
    const current = await txn.get(senderId);
    const fromState = stateOf(current);
    const rule = this.getRule(fromState, trigger);

    let conversation: Conversation | null = current;

    switch (rule.action) {
      case 'open':
        conversation = await txn.upsertOpen(senderId, timestamp, contactName);
        break;

      case 'touch':
        await txn.touch(senderId, timestamp, contactName);
        conversation = await txn.get(senderId);
        break;

      case 'close': {
        const closeResult = await txn.close(senderId, timestamp);
        if (closeResult !== rule.outcome) {
          // Rolls the transaction back; the row changed under the rule
          throw new Error(
            `Close of ${senderId} returned ${closeResult}, expected ${rule.outcome}`,
          );
        }
        conversation = await txn.get(senderId);
        break;
      }

      case 'none':
        break;
    }

    await this.applyCounterDeltas(txn, rule.counterDeltas);

    return {
      senderId,
      triggerType: trigger,
      outcome: rule.outcome,
      fromState,
      toState: rule.to,
      timestamp,
      conversation,
    };
  }

  private async applyCounterDeltas(
    txn: ConversationTransaction,
    deltas: CounterDeltas,
  ): Promise<void> {
    for (const name of Object.values(CounterName)) {
      const delta = deltas[name];
      if (delta) {
        await txn.incrementCounter(name, delta);
      }
    }
  }

  private async notify(result: TransitionResult): Promise<void> {
    this.logger.debug(
      `${result.senderId}: ${result.fromState} --${result.triggerType}--> ${result.toState} (${result.outcome})`,
    );

    if (!this.hooks?.onTransition) {
      return;
    }

    try {
      await this.hooks.onTransition({
        senderId: result.senderId,
        triggerType: result.triggerType,
        outcome: result.outcome,
        timestamp: result.timestamp,
      });
    } catch (error) {
      // The transition is committed; a failing observer must not undo it
      this.logger.error(
        `onTransition hook failed for ${result.senderId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
