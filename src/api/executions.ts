/**
 * Execution API routes.
 *
 * POST /workflows/:workflowId/execute — Run a ready workflow
 * GET /workflows/:workflowId/executions/:executionId — Fetch an execution record
 */

import { Router } from 'express';
import { PollingSchedule } from '../domain/async-polling';
import { AppError, NotReadyError, WorkflowNotFoundError, notFoundError, validationError } from '../domain/errors';
import { ExecutionRecord, FileId, isFileId } from '../domain/execution';
import { WorkflowStatus } from '../domain/workflow';
import { awaitAttachmentsReady, cleanupRemoteFiles } from '../engine/attachments';
import { ClientFactory, ExecutionCoordinator } from '../engine/coordinator';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { requireObjectBody, sendError } from './middleware';

interface ExecuteBody {
  userInput: string;
  attachedFileIds: FileId[];
  cleanupFiles: boolean;
}

function parseExecuteBody(body: Record<string, unknown>): ExecuteBody {
  const { userInput, attachedFileIds, cleanupFiles } = body;
  if (userInput !== undefined && userInput !== null && typeof userInput !== 'string') {
    throw new AppError(validationError('userInput must be a string'));
  }
  if (attachedFileIds !== undefined && attachedFileIds !== null) {
    if (!Array.isArray(attachedFileIds) || !attachedFileIds.every(isFileId)) {
      throw new AppError(validationError('attachedFileIds must be an array of file ids'));
    }
  }
  if (cleanupFiles !== undefined && typeof cleanupFiles !== 'boolean') {
    throw new AppError(validationError('cleanupFiles must be a boolean'));
  }
  return {
    userInput: typeof userInput === 'string' ? userInput : '',
    attachedFileIds: Array.isArray(attachedFileIds) ? attachedFileIds.filter(isFileId) : [],
    cleanupFiles: cleanupFiles === true,
  };
}

export interface ExecutionRouteOptions {
  store: Store;
  coordinator: ExecutionCoordinator;
  /** Builds the client used for readiness checks and cleanup around a run. */
  clientFactory: ClientFactory;
  attachmentPolling?: Partial<PollingSchedule>;
  logger?: Logger;
}

export function createExecutionRoutes(options: ExecutionRouteOptions): Router {
  const router = Router();
  const log = (options.logger ?? rootLogger).child({ component: 'executions-api' });

  /**
   * POST /workflows/:workflowId/execute
   * Waits (best effort) for attachments, runs the workflow and, when
   * `cleanupFiles` is set, deletes the attachments before responding.
   */
  router.post('/:workflowId/execute', async (req, res) => {
    try {
      const body = parseExecuteBody(requireObjectBody(req));
      const workflow = await options.store.workflows.getById(req.params.workflowId);
      if (!workflow) throw new WorkflowNotFoundError(req.params.workflowId);
      if (workflow.status !== WorkflowStatus.Ready) {
        throw new NotReadyError(workflow.id, workflow.status);
      }

      const requestLog = log.child({ workflowId: workflow.id });
      const client = options.clientFactory({ logger: requestLog });
      let execution: ExecutionRecord;
      try {
        if (body.attachedFileIds.length > 0) {
          await awaitAttachmentsReady(client, body.attachedFileIds, {
            schedule: options.attachmentPolling,
            logger: requestLog,
          });
        }
        execution = await options.coordinator.execute(workflow, {
          userInput: body.userInput,
          attachedFileIds: body.attachedFileIds,
        });
      } finally {
        if (body.cleanupFiles && body.attachedFileIds.length > 0) {
          await cleanupRemoteFiles(client, body.attachedFileIds, requestLog);
        }
      }
      res.json({ execution });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:workflowId/executions/:executionId', async (req, res) => {
    try {
      const execution = await options.coordinator.getExecution(req.params.executionId);
      if (!execution || execution.workflowId !== req.params.workflowId) {
        throw new AppError(notFoundError('Execution', req.params.executionId));
      }
      res.json({ execution });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
