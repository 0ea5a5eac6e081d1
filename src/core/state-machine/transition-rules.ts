import { CounterName, TransitionOutcome, TriggerType } from '../domain/enums';
import { Conversation } from '../domain/models';
import { LifecycleRule, LifecycleState } from './types';

/**
 * Conversation lifecycle transition rules
 *
 * - ABSENT is only ever the pre-row condition
 * - OPEN and CLOSED cycle indefinitely; there is no terminal state
 * - NEW_CONVERSATIONS moves with OPEN_CONVERSATIONS on every transition
 */
export const LIFECYCLE_RULES: LifecycleRule[] = [
  // ============ Inbound messages ============

  {
    from: LifecycleState.ABSENT,
    trigger: TriggerType.MESSAGE,
    to: LifecycleState.OPEN,
    outcome: TransitionOutcome.OPENED,
    action: 'open',
    counterDeltas: {
      [CounterName.NEW_CONVERSATIONS]: 1,
      [CounterName.OPEN_CONVERSATIONS]: 1,
    },
    description: 'First message from an unseen sender',
  },
  {
    from: LifecycleState.OPEN,
    trigger: TriggerType.MESSAGE,
    to: LifecycleState.OPEN,
    outcome: TransitionOutcome.CONTINUED,
    action: 'touch',
    counterDeltas: {},
    description: 'Message on an open conversation',
  },
  {
    from: LifecycleState.CLOSED,
    trigger: TriggerType.MESSAGE,
    to: LifecycleState.OPEN,
    outcome: TransitionOutcome.REOPENED,
    action: 'open',
    counterDeltas: {
      [CounterName.NEW_CONVERSATIONS]: 1,
      [CounterName.OPEN_CONVERSATIONS]: 1,
      [CounterName.CLOSED_CONVERSATIONS]: -1,
    },
    description: 'Message after an administrative close',
  },

  // ============ Administrative closes ============

  {
    from: LifecycleState.OPEN,
    trigger: TriggerType.ADMIN_CLOSE,
    to: LifecycleState.CLOSED,
    outcome: TransitionOutcome.CLOSED,
    action: 'close',
    counterDeltas: {
      [CounterName.NEW_CONVERSATIONS]: -1,
      [CounterName.OPEN_CONVERSATIONS]: -1,
      [CounterName.CLOSED_CONVERSATIONS]: 1,
    },
  },
  {
    from: LifecycleState.CLOSED,
    trigger: TriggerType.ADMIN_CLOSE,
    to: LifecycleState.CLOSED,
    outcome: TransitionOutcome.ALREADY_CLOSED,
    action: 'none',
    counterDeltas: {},
  },
  {
    from: LifecycleState.ABSENT,
    trigger: TriggerType.ADMIN_CLOSE,
    to: LifecycleState.ABSENT,
    outcome: TransitionOutcome.NOT_FOUND,
    action: 'none',
    counterDeltas: {},
  },
];

export function stateOf(conversation: Conversation | null): LifecycleState {
  if (!conversation) {
    return LifecycleState.ABSENT;
  }
  return conversation.isOpen() ? LifecycleState.OPEN : LifecycleState.CLOSED;
}

export function findLifecycleRule(
  from: LifecycleState,
  trigger: TriggerType,
  rules: LifecycleRule[] = LIFECYCLE_RULES,
): LifecycleRule | undefined {
  return rules.find((rule) => rule.from === from && rule.trigger === trigger);
}
