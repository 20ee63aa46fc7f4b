/**
 * Sandboxed run model.
 *
 * One run of generated code: compiled once, executed once, never retried.
 * The outcome is a discriminated union; failures carry the generated code's
 * error name, message and a truncated trace.
 */

import { ExecutionLogs } from './execution';

/** Sandbox run lifecycle states. */
export enum SandboxState {
  Pending = 'pending',
  Compiling = 'compiling',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
  TimedOut = 'timed_out',
}

/** Valid state transitions for sandbox runs. */
export const VALID_SANDBOX_TRANSITIONS: Record<SandboxState, SandboxState[]> = {
  [SandboxState.Pending]: [SandboxState.Compiling],
  [SandboxState.Compiling]: [SandboxState.Running, SandboxState.Failed],
  [SandboxState.Running]: [SandboxState.Completed, SandboxState.Failed, SandboxState.TimedOut],
  [SandboxState.Completed]: [],
  [SandboxState.Failed]: [],
  [SandboxState.TimedOut]: [],
};

/** Description of a failed or timed-out run. */
export interface SandboxFailure {
  /** Typed error code, e.g. "SANDBOX.RUNTIME" or "DOCUMENT_API.POLL_TIMEOUT". */
  code: string;
  /** Error name as seen by generated code, e.g. "RangeError". */
  name: string;
  message: string;
  /** Stack trace, truncated. */
  trace?: string;
}

interface SandboxOutcomeBase {
  logs: ExecutionLogs;
  elapsedMs: number;
}

export type SandboxOutcome =
  | (SandboxOutcomeBase & { state: SandboxState.Completed; result: string })
  | (SandboxOutcomeBase & { state: SandboxState.Failed; failure: SandboxFailure })
  | (SandboxOutcomeBase & { state: SandboxState.TimedOut; failure: SandboxFailure });

/** Render a failure as the single-line description stored on records. */
export function describeSandboxFailure(failure: SandboxFailure): string {
  return failure.message ? `${failure.name}: ${failure.message}` : failure.name;
}
