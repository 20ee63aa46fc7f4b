/**
 * Workflow domain model.
 *
 * A workflow is a natural-language description plus the code generated for
 * it. Only `ready` workflows execute; regeneration replaces the code and
 * moves the status again. The executor never mutates a workflow.
 */

import { v4 as uuid } from 'uuid';

/** Workflow status lifecycle. */
export enum WorkflowStatus {
  Draft = 'draft',
  Ready = 'ready',
  Failed = 'failed',
}

/** A described task and its generated code. */
export interface Workflow {
  id: string;
  name: string;
  description: string;
  /** Generated source text; present once generation succeeded. */
  generatedCode?: string;
  status: WorkflowStatus;
  createdAt: string;
  updatedAt: string;
  /** Generation failure message when status is `failed`. */
  error?: string;
  /** Extra hints handed to the code generator. */
  context?: Record<string, unknown>;
}

/** Input for creating a workflow from a description. */
export interface CreateWorkflowInput {
  description: string;
  name?: string;
  context?: Record<string, unknown>;
}

/** Derive a display name from the first words of the description. */
function defaultName(description: string): string {
  const words = description.trim().split(/\s+/).slice(0, 6).join(' ');
  return words.length > 0 ? words : 'Untitled workflow';
}

/** Create a draft workflow awaiting code generation. */
export function createDraftWorkflow(input: CreateWorkflowInput, now: Date = new Date()): Workflow {
  const timestamp = now.toISOString();
  return {
    id: `wf_${uuid()}`,
    name: input.name?.trim() || defaultName(input.description),
    description: input.description,
    status: WorkflowStatus.Draft,
    createdAt: timestamp,
    updatedAt: timestamp,
    context: input.context,
  };
}

/** Attach freshly generated code; the workflow becomes executable. */
export function markWorkflowReady(workflow: Workflow, code: string, now: Date = new Date()): Workflow {
  return {
    ...workflow,
    generatedCode: code,
    status: WorkflowStatus.Ready,
    error: undefined,
    updatedAt: now.toISOString(),
  };
}

/** Record a generation failure. Previously generated code is dropped. */
export function markWorkflowFailed(workflow: Workflow, error: string, now: Date = new Date()): Workflow {
  return {
    ...workflow,
    generatedCode: undefined,
    status: WorkflowStatus.Failed,
    error,
    updatedAt: now.toISOString(),
  };
}

/**
 * Record a failed regeneration of a ready workflow. The previous description
 * and code stay in place, so the workflow remains executable.
 */
export function markRegenerationFailed(workflow: Workflow, error: string, now: Date = new Date()): Workflow {
  return {
    ...workflow,
    error,
    updatedAt: now.toISOString(),
  };
}

const WORKFLOW_STATUSES: readonly string[] = Object.values(WorkflowStatus);

function isRecordValue(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Structural check for workflows read back from storage. */
export function isWorkflow(value: unknown): value is Workflow {
  if (!isRecordValue(value)) return false;
  return (
    typeof value.id === 'string' &&
    typeof value.name === 'string' &&
    typeof value.description === 'string' &&
    typeof value.status === 'string' &&
    WORKFLOW_STATUSES.includes(value.status) &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string' &&
    (value.generatedCode === undefined || typeof value.generatedCode === 'string') &&
    (value.error === undefined || typeof value.error === 'string') &&
    (value.context === undefined || isRecordValue(value.context))
  );
}
