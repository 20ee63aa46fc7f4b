/**
 * Workflow API routes.
 *
 * POST /workflows — Create a workflow from a description and generate its code
 * GET /workflows/:workflowId — Fetch a workflow
 * POST /workflows/:workflowId/regenerate — Replace the generated code
 */

import { Router } from 'express';
import { AppError, notFoundError, validationError } from '../domain/errors';
import { CreateWorkflowInput } from '../domain/workflow';
import { isRecord } from '../documents/wire';
import { RegenerateWorkflowInput, WorkflowService } from '../engine/workflow-service';
import { requireObjectBody, sendError } from './middleware';

function optionalContext(body: Record<string, unknown>): Record<string, unknown> | undefined {
  if (body.context === undefined || body.context === null) return undefined;
  if (!isRecord(body.context)) {
    throw new AppError(validationError('context must be an object'));
  }
  return body.context;
}

function parseCreateInput(body: Record<string, unknown>): CreateWorkflowInput {
  if (typeof body.description !== 'string' || body.description.trim() === '') {
    throw new AppError(validationError('description is required'));
  }
  if (body.name !== undefined && typeof body.name !== 'string') {
    throw new AppError(validationError('name must be a string'));
  }
  return { description: body.description, name: body.name, context: optionalContext(body) };
}

function parseRegenerateInput(body: Record<string, unknown>): RegenerateWorkflowInput {
  const input: RegenerateWorkflowInput = { context: optionalContext(body) };
  if (body.description !== undefined) {
    if (typeof body.description !== 'string' || body.description.trim() === '') {
      throw new AppError(validationError('description must be a non-empty string'));
    }
    input.description = body.description;
  }
  return input;
}

export function createWorkflowRoutes(workflows: WorkflowService): Router {
  const router = Router();

  /**
   * POST /workflows
   * Responds 201 whether generation succeeded (`ready`) or not (`failed`).
   */
  router.post('/', async (req, res) => {
    try {
      const workflow = await workflows.create(parseCreateInput(requireObjectBody(req)));
      res.status(201).json({ workflow });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:workflowId', async (req, res) => {
    try {
      const workflow = await workflows.get(req.params.workflowId);
      if (!workflow) {
        throw new AppError(notFoundError('Workflow', req.params.workflowId));
      }
      res.json({ workflow });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/:workflowId/regenerate', async (req, res) => {
    try {
      const input = parseRegenerateInput(requireObjectBody(req));
      const workflow = await workflows.regenerate(req.params.workflowId, input);
      res.json({ workflow });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
