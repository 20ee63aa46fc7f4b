/**
 * Execution and sandbox state machines.
 *
 * Enforces valid state transitions for execution records and sandbox runs,
 * producing typed errors on invalid transitions.
 */

import { ExecutionStatus, VALID_EXECUTION_TRANSITIONS } from '../domain/execution';
import { SandboxState, VALID_SANDBOX_TRANSITIONS } from '../domain/sandbox-run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt an execution record transition. Terminal records reject every target. */
export function transitionExecutionStatus(
  current: ExecutionStatus,
  target: ExecutionStatus,
): TransitionResult<ExecutionStatus> {
  const validTargets = VALID_EXECUTION_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'EXECUTION.INVALID_TRANSITION',
        message: `Invalid execution state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a sandbox run transition. */
export function transitionSandboxState(
  current: SandboxState,
  target: SandboxState,
): TransitionResult<SandboxState> {
  const validTargets = VALID_SANDBOX_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SANDBOX.INVALID_TRANSITION',
        message: `Invalid sandbox state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a sandbox state is terminal. */
export function isTerminalSandboxState(state: SandboxState): boolean {
  return (
    state === SandboxState.Completed ||
    state === SandboxState.Failed ||
    state === SandboxState.TimedOut
  );
}
