/**
 * File API routes, proxied to the document service.
 *
 * POST /files?filename=&visibility= — Upload the raw request body
 * GET /files/:fileId — File metadata (`?includeContent=true` for text)
 * POST /files/:fileId/ask — Ask a question about one file
 * DELETE /files/:fileId — Delete a file
 */

import express, { Router } from 'express';
import { AppError, validationError } from '../domain/errors';
import { isFileVisibility } from '../domain/remote-file';
import { ClientFactory } from '../engine/coordinator';
import { Logger, logger as rootLogger } from '../logger';
import { requireObjectBody, sendError } from './middleware';

const MAX_UPLOAD_SIZE = '50mb';

export function createFileRoutes(clientFactory: ClientFactory, logger: Logger = rootLogger): Router {
  const router = Router();
  const log = logger.child({ component: 'files-api' });

  router.post('/', express.raw({ type: () => true, limit: MAX_UPLOAD_SIZE }), async (req, res) => {
    try {
      const { filename, visibility } = req.query;
      if (typeof filename !== 'string' || filename.trim() === '') {
        throw new AppError(validationError('filename query parameter is required'));
      }
      if (visibility !== undefined && (typeof visibility !== 'string' || !isFileVisibility(visibility))) {
        throw new AppError(validationError('visibility must be one of private, company, workspace'));
      }
      const content: unknown = req.body;
      if (!Buffer.isBuffer(content) || content.length === 0) {
        throw new AppError(validationError('Request body must contain the file bytes'));
      }

      const file = await clientFactory({ logger: log }).upload(content, filename.trim(), {
        visibility: typeof visibility === 'string' && isFileVisibility(visibility) ? visibility : undefined,
      });
      res.status(201).json({ file });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:fileId', async (req, res) => {
    try {
      const file = await clientFactory({ logger: log }).getFile(req.params.fileId, {
        includeContent: req.query.includeContent === 'true',
      });
      res.json({ file });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/:fileId/ask', async (req, res) => {
    try {
      const { question } = requireObjectBody(req);
      if (typeof question !== 'string' || question.trim() === '') {
        throw new AppError(validationError('question is required'));
      }
      const answer = await clientFactory({ logger: log }).askQuestion(req.params.fileId, question);
      res.json(answer);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete('/:fileId', async (req, res) => {
    try {
      const deleted = await clientFactory({ logger: log }).deleteFile(req.params.fileId);
      res.json({ deleted });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
