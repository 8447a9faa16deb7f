import { PaymentStatus, SubscriptionStatus } from '../domain/enums';
import {
  StateTransition,
  TransitionResult,
  StateMachineConfig,
  InvalidStateTransitionError,
} from './types';
import {
  PAYMENT_STATE_MACHINE_CONFIG,
  SUBSCRIPTION_STATE_MACHINE_CONFIG,
} from './transition-rules';

/**
 * Status state machine - enforces valid transitions for one record type
 * Only explicitly defined transitions are allowed
 */
export class StateMachine<S extends string> {
  private readonly transitions: Map<string, StateTransition<S>>;

  constructor(private readonly config: StateMachineConfig<S>) {
    this.transitions = new Map();

    for (const transition of config.transitions) {
      this.transitions.set(
        this.getTransitionKey(transition.from, transition.to),
        transition,
      );
    }
  }

  get name(): string {
    return this.config.name;
  }

  get initialState(): S {
    return this.config.initialState;
  }

  /**
   * Validate a state transition
   */
  validateTransition(from: S, to: S): TransitionResult<S> {
    if (this.isTerminal(from)) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Cannot transition from terminal state: ${from}`,
      };
    }

    if (!this.transitions.has(this.getTransitionKey(from, to))) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Transition from ${from} to ${to} is not defined`,
      };
    }

    return { success: true, fromStatus: from, toStatus: to };
  }

  /**
   * Throw unless the transition is defined
   */
  assertTransition(from: S, to: S): void {
    const result = this.validateTransition(from, to);
    if (!result.success) {
      throw new InvalidStateTransitionError(
        `Invalid ${this.config.name} transition: ${result.reason}`,
        this.config.name,
        from,
        to,
      );
    }
  }

  canTransition(from: S, to: S): boolean {
    return this.validateTransition(from, to).success;
  }

  isTerminal(status: S): boolean {
    return this.config.terminalStates.includes(status);
  }

  /**
   * Get all possible next states from current state
   */
  getNextStates(currentStatus: S): S[] {
    if (this.isTerminal(currentStatus)) {
      return [];
    }

    return this.config.transitions
      .filter((transition) => transition.from === currentStatus)
      .map((transition) => transition.to);
  }

  getAllTransitions(): StateTransition<S>[] {
    return Array.from(this.transitions.values());
  }

  /**
   * Create a visualization-friendly representation of the state machine
   */
  toMermaidDiagram(): string {
    const lines = ['stateDiagram-v2'];

    for (const status of this.config.states) {
      if (this.isTerminal(status)) {
        lines.push(`    ${status} : ${status} [Terminal]`);
      } else {
        lines.push(`    ${status} : ${status}`);
      }
    }

    for (const transition of this.transitions.values()) {
      lines.push(`    ${transition.from} --> ${transition.to}`);
    }

    return lines.join('\n');
  }

  private getTransitionKey(from: S, to: S): string {
    return `${from}->${to}`;
  }
}

export const paymentStateMachine = new StateMachine<PaymentStatus>(
  PAYMENT_STATE_MACHINE_CONFIG,
);

export const subscriptionStateMachine = new StateMachine<SubscriptionStatus>(
  SUBSCRIPTION_STATE_MACHINE_CONFIG,
);
