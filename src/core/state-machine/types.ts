import { ErrorCode, PaymentEngineError } from '../errors';

/**
 * State transition definition
 */
export interface StateTransition<S extends string> {
  from: S;
  to: S;
  metadata?: {
    description: string;
    [key: string]: unknown;
  };
}

/**
 * Transition result
 */
export interface TransitionResult<S extends string> {
  success: boolean;
  fromStatus: S;
  toStatus: S;
  reason?: string;
}

/**
 * State machine configuration
 */
export interface StateMachineConfig<S extends string> {
  name: string;
  states: readonly S[];
  initialState: S;
  terminalStates: readonly S[];
  transitions: StateTransition<S>[];
}

/**
 * Raised when a record is asked to move along an undefined edge
 * (e.g. resuming a cancelled subscription)
 */
export class InvalidStateTransitionError extends PaymentEngineError {
  constructor(
    message: string,
    public readonly machine: string,
    public readonly fromStatus: string,
    public readonly toStatus: string,
  ) {
    super(message, ErrorCode.INVALID_STATE_TRANSITION, {
      machine,
      fromStatus,
      toStatus,
    });
    this.name = 'InvalidStateTransitionError';
  }
}
