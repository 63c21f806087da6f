import { ApiError } from '../../middlewares';
import { ErrorCode } from '../../types/errors';

export enum IssuanceState {
  START = 'START',
  TRUSTLINE_BUILDING = 'TRUSTLINE_BUILDING',
  TRUSTLINE_SUBMITTED = 'TRUSTLINE_SUBMITTED',
  PAYMENT_BUILDING = 'PAYMENT_BUILDING',
  PAYMENT_SUBMITTED = 'PAYMENT_SUBMITTED',
  FAILED = 'FAILED',
}

export enum FailureStage {
  VALIDATION = 'VALIDATION',
  TRUSTLINE = 'TRUSTLINE',
  PAYMENT = 'PAYMENT',
}

/**
 * Valid state transitions for an issuance run
 *
 * State Machine:
 * START ──► TRUSTLINE_BUILDING ──► TRUSTLINE_SUBMITTED ──► PAYMENT_BUILDING ──► PAYMENT_SUBMITTED
 *   │               │                       │                      │
 *   └───────────────┴───────────┬───────────┴──────────────────────┘
 *                               ▼
 *                            FAILED
 *
 * PAYMENT_BUILDING is only reachable through TRUSTLINE_SUBMITTED, which is
 * only entered once the trustline transaction has been accepted.
 */
const validTransitions: Record<IssuanceState, IssuanceState[]> = {
  [IssuanceState.START]: [IssuanceState.TRUSTLINE_BUILDING, IssuanceState.FAILED],
  [IssuanceState.TRUSTLINE_BUILDING]: [IssuanceState.TRUSTLINE_SUBMITTED, IssuanceState.FAILED],
  [IssuanceState.TRUSTLINE_SUBMITTED]: [IssuanceState.PAYMENT_BUILDING, IssuanceState.FAILED],
  [IssuanceState.PAYMENT_BUILDING]: [IssuanceState.PAYMENT_SUBMITTED, IssuanceState.FAILED],
  [IssuanceState.PAYMENT_SUBMITTED]: [], // Terminal state
  [IssuanceState.FAILED]: [], // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(current: IssuanceState, next: IssuanceState): boolean {
  return validTransitions[current].includes(next);
}

/**
 * Validate a state transition
 * Throws ApiError if transition is invalid
 */
export function validateTransition(
  current: IssuanceState,
  next: IssuanceState,
  runId: string
): void {
  if (!isValidTransition(current, next)) {
    throw new ApiError(
      ErrorCode.INTERNAL_ERROR,
      `Invalid issuance state transition from ${current} to ${next} for run ${runId}`,
      { isOperational: false }
    );
  }
}

/**
 * Check if an issuance run is in a terminal state
 */
export function isTerminalState(state: IssuanceState): boolean {
  return validTransitions[state].length === 0;
}

/**
 * Get allowed next states for a given state
 */
export function getAllowedTransitions(state: IssuanceState): IssuanceState[] {
  return validTransitions[state];
}

/**
 * The stage a run fails in when it leaves `state` for FAILED
 */
export function stageForState(state: IssuanceState): FailureStage {
  switch (state) {
    case IssuanceState.TRUSTLINE_BUILDING:
    case IssuanceState.TRUSTLINE_SUBMITTED:
      return FailureStage.TRUSTLINE;
    case IssuanceState.PAYMENT_BUILDING:
    case IssuanceState.PAYMENT_SUBMITTED:
      return FailureStage.PAYMENT;
    default:
      return FailureStage.VALIDATION;
  }
}
