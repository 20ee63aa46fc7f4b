/**
 * Execution lifecycle coordinator.
 *
 * Glue between an execution request and the sandbox. It is the only place a
 * document service client is constructed for generated code (one per
 * execution, bound to that execution's AbortController) and the only owner
 * of execution record finalization.
 *
 * `execute()` rejects only when the workflow is not ready. Every other
 * outcome, including generated-code failures and timeouts, resolves to a
 * finalized record.
 */

import { AppConfig } from '../config';
import { Clock } from '../domain/async-polling';
import { AppError, NotReadyError, WorkflowNotFoundError } from '../domain/errors';
import {
  ExecutionRecord,
  ExecutionRequest,
  ExecutionStatus,
  startExecutionRecord,
} from '../domain/execution';
import { SandboxOutcome, SandboxState, describeSandboxFailure } from '../domain/sandbox-run';
import { Workflow, WorkflowStatus } from '../domain/workflow';
import { DocumentApiClient, FetchLike } from '../documents/client';
import { Logger, logger as rootLogger } from '../logger';
import { SandboxExecutor } from '../sandbox/executor';
import { Store } from '../storage/store';
import { transitionExecutionStatus } from './state-machine';

/** Builds the client for one execution. */
export type ClientFactory = (options: { signal?: AbortSignal; logger?: Logger }) => DocumentApiClient;

/** Client factory reading API key, base URL and polling schedules from configuration. */
export function createClientFactory(
  config: Pick<AppConfig, 'documentApiKey' | 'documentApiBaseUrl' | 'ingestionPolling' | 'analysisPolling' | 'chatModel'>,
  overrides: { fetch?: FetchLike; clock?: Clock } = {},
): ClientFactory {
  return ({ signal, logger }) =>
    new DocumentApiClient({
      apiKey: config.documentApiKey,
      baseUrl: config.documentApiBaseUrl,
      ingestionPolling: config.ingestionPolling,
      analysisPolling: config.analysisPolling,
      chatModel: config.chatModel,
      signal,
      logger,
      fetch: overrides.fetch,
      clock: overrides.clock,
    });
}

export interface CoordinatorOptions {
  store: Store;
  executor: SandboxExecutor;
  clientFactory: ClientFactory;
  logger?: Logger;
}

function terminalStatusFor(state: SandboxState): ExecutionStatus {
  switch (state) {
    case SandboxState.Completed:
      return ExecutionStatus.Completed;
    case SandboxState.TimedOut:
      return ExecutionStatus.Timeout;
    default:
      return ExecutionStatus.Failed;
  }
}

/** Close a running record with a sandbox outcome. A record can only be finalized once. */
export function finalizeExecutionRecord(
  record: ExecutionRecord,
  outcome: SandboxOutcome,
  elapsedMs: number,
  now: Date = new Date(),
): ExecutionRecord {
  const target = terminalStatusFor(outcome.state);
  const transition = transitionExecutionStatus(record.status, target);
  if (!transition.success || transition.newStatus === undefined) {
    throw new AppError(
      transition.error ?? {
        code: 'EXECUTION.INVALID_TRANSITION',
        message: `Execution ${record.executionId} cannot move to ${target}`,
        retryable: false,
        suggestedFixes: [],
      },
    );
  }

  const finalized: ExecutionRecord = {
    ...record,
    attachedFileIds: [...record.attachedFileIds],
    status: transition.newStatus,
    executionTimeSeconds: elapsedMs / 1000,
    finishedAt: now.toISOString(),
    logs: outcome.logs,
  };
  if (outcome.state === SandboxState.Completed) {
    finalized.result = outcome.result;
  } else {
    finalized.error = describeSandboxFailure(outcome.failure);
    finalized.errorCode = outcome.failure.code;
  }
  return finalized;
}

export class ExecutionCoordinator {
  private readonly store: Store;
  private readonly executor: SandboxExecutor;
  private readonly clientFactory: ClientFactory;
  private readonly logger: Logger;

  constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.executor = options.executor;
    this.clientFactory = options.clientFactory;
    this.logger = (options.logger ?? rootLogger).child({ component: 'coordinator' });
  }

  /** Run a ready workflow against the request's inputs and persist the record. */
  async execute(workflow: Workflow, request: ExecutionRequest): Promise<ExecutionRecord> {
    if (workflow.status !== WorkflowStatus.Ready || workflow.generatedCode === undefined) {
      throw new NotReadyError(workflow.id, workflow.status);
    }

    const running = startExecutionRecord(workflow.id, {
      userInput: request.userInput,
      attachedFileIds: [...request.attachedFileIds],
    });
    const log = this.logger.child({ executionId: running.executionId, workflowId: workflow.id });
    await this.store.executions.save(running);
    log.info('Execution started', { attachedFiles: running.attachedFileIds.length });

    const controller = new AbortController();
    const client = this.clientFactory({ signal: controller.signal, logger: log });

    const startedAt = Date.now();
    const outcome = await this.executor.run({
      code: workflow.generatedCode,
      userInput: running.userInput,
      attachedFileIds: [...running.attachedFileIds],
      client,
      controller,
    });
    const elapsedMs = Date.now() - startedAt;

    const finalized = finalizeExecutionRecord(running, outcome, elapsedMs);
    await this.store.executions.save(finalized);
    log.info('Execution finished', {
      status: finalized.status,
      executionTimeSeconds: finalized.executionTimeSeconds,
      errorCode: finalized.errorCode,
    });
    return finalized;
  }

  /** Look up a workflow and execute it. */
  async executeById(workflowId: string, request: ExecutionRequest): Promise<ExecutionRecord> {
    const workflow = await this.store.workflows.getById(workflowId);
    if (!workflow) throw new WorkflowNotFoundError(workflowId);
    return this.execute(workflow, request);
  }

  async getExecution(executionId: string): Promise<ExecutionRecord | null> {
    return this.store.executions.getById(executionId);
  }
}
