import { Conversation } from '../domain/models';
import { TransitionOutcome, TriggerType } from '../domain/enums';
import { CounterDeltas } from '../interfaces';

/**
 * Lifecycle state of a sender; ABSENT means no row exists yet
 */
export enum LifecycleState {
  ABSENT = 'absent',
  OPEN = 'open',
  CLOSED = 'closed',
}

/**
 * Row mutation performed by a rule inside the store transaction
 */
export type LifecycleAction = 'open' | 'touch' | 'close' | 'none';

/**
 * One row of the lifecycle transition table
 */
export interface LifecycleRule {
  from: LifecycleState;
  trigger: TriggerType;
  to: LifecycleState;
  outcome: TransitionOutcome;
  action: LifecycleAction;
  counterDeltas: CounterDeltas;
  description?: string;
}

/**
 * Committed result of one trigger applied to one sender
 */
export interface TransitionResult {
  senderId: string;
  triggerType: TriggerType;
  outcome: TransitionOutcome;
  fromState: LifecycleState;
  toState: LifecycleState;
  timestamp: number;
  conversation: Conversation | null;
}

/**
 * No rule covers the (state, trigger) pair
 */
export class TransitionRuleMissingError extends Error {
  constructor(
    public readonly fromState: LifecycleState,
    public readonly trigger: TriggerType,
  ) {
    super(`No lifecycle rule for ${trigger} in state ${fromState}`);
    this.name = 'TransitionRuleMissingError';
  }
}
