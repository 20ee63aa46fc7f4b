/**
 * Execution domain model.
 *
 * One run of a workflow's generated code against specific inputs. A record
 * is created `running` and finalized exactly once into a terminal status;
 * after that `result` and `error` are mutually exclusive and exactly one is set.
 */

import { v4 as uuid } from 'uuid';

/** Identifier the document service assigned to an uploaded file. */
export type FileId = number | string;

/** Execution lifecycle states. */
export enum ExecutionStatus {
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
  Timeout = 'timeout',
}

/** Valid state transitions for execution records. */
export const VALID_EXECUTION_TRANSITIONS: Record<ExecutionStatus, ExecutionStatus[]> = {
  [ExecutionStatus.Running]: [ExecutionStatus.Completed, ExecutionStatus.Failed, ExecutionStatus.Timeout],
  [ExecutionStatus.Completed]: [],
  [ExecutionStatus.Failed]: [],
  [ExecutionStatus.Timeout]: [],
};

/** Inputs for one execution. */
export interface ExecutionRequest {
  /** Free text from the user; may be empty. */
  userInput: string;
  /** Ordered file ids; order may encode document roles and is preserved. */
  attachedFileIds: FileId[];
}

/** Console output captured from generated code. */
export interface ExecutionLogs {
  stdout: string;
  stderr: string;
}

/** A single execution instance of a workflow. */
export interface ExecutionRecord {
  executionId: string;
  workflowId: string;
  status: ExecutionStatus;
  /** Report text; present iff status is `completed`. */
  result?: string;
  /** Failure description; present iff status is `failed` or `timeout`. */
  error?: string;
  /** Typed error code accompanying `error`. */
  errorCode?: string;
  executionTimeSeconds: number;
  startedAt: string;
  finishedAt?: string;
  userInput: string;
  attachedFileIds: FileId[];
  logs?: ExecutionLogs;
}

/** Create the running record for a new execution. */
export function startExecutionRecord(
  workflowId: string,
  request: ExecutionRequest,
  now: Date = new Date(),
): ExecutionRecord {
  return {
    executionId: `exec_${uuid()}`,
    workflowId,
    status: ExecutionStatus.Running,
    executionTimeSeconds: 0,
    startedAt: now.toISOString(),
    userInput: request.userInput,
    attachedFileIds: [...request.attachedFileIds],
  };
}

/** Check if an execution status is terminal. */
export function isTerminalExecutionStatus(status: ExecutionStatus): boolean {
  return VALID_EXECUTION_TRANSITIONS[status].length === 0;
}

/** True for the id shapes the document service hands out. */
export function isFileId(value: unknown): value is FileId {
  return (
    (typeof value === 'number' && Number.isInteger(value) && value >= 0) ||
    (typeof value === 'string' && value.trim().length > 0)
  );
}

const EXECUTION_STATUSES: readonly string[] = Object.values(ExecutionStatus);

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

/** Structural check for execution records read back from storage. */
export function isExecutionRecord(value: unknown): value is ExecutionRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const record: Record<string, unknown> = { ...value };
  const logs = record.logs;
  return (
    typeof record.executionId === 'string' &&
    typeof record.workflowId === 'string' &&
    typeof record.status === 'string' &&
    EXECUTION_STATUSES.includes(record.status) &&
    typeof record.executionTimeSeconds === 'number' &&
    typeof record.startedAt === 'string' &&
    typeof record.userInput === 'string' &&
    Array.isArray(record.attachedFileIds) &&
    record.attachedFileIds.every(isFileId) &&
    isOptionalString(record.result) &&
    isOptionalString(record.error) &&
    isOptionalString(record.errorCode) &&
    isOptionalString(record.finishedAt) &&
    (logs === undefined ||
      (typeof logs === 'object' &&
        logs !== null &&
        'stdout' in logs &&
        'stderr' in logs &&
        typeof logs.stdout === 'string' &&
        typeof logs.stderr === 'string'))
  );
}
