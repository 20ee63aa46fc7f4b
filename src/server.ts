/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { AppConfig } from './config';
import { Clock, PollingSchedule } from './domain/async-polling';
import { FetchLike } from './documents/client';
import { errorHandler } from './api/middleware';
import { createWorkflowRoutes } from './api/workflows';
import { createExecutionRoutes } from './api/executions';
import { createFileRoutes } from './api/files';
import { ClientFactory, ExecutionCoordinator, createClientFactory } from './engine/coordinator';
import { WorkflowService } from './engine/workflow-service';
import { ChatCodeGenerator, CodeGenerator } from './llm/code-generator';
import { SandboxExecutor } from './sandbox/executor';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { Logger, logger as rootLogger } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  clientFactory: ClientFactory;
  workflows: WorkflowService;
  coordinator: ExecutionCoordinator;
  attachmentPolling?: Partial<PollingSchedule>;
  logger: Logger;
}

export interface AppContextOptions {
  store?: Store;
  /** Replaces the chat-backed generator. */
  generator?: CodeGenerator;
  executor?: SandboxExecutor;
  /** Transport and clock for every document service client. */
  fetch?: FetchLike;
  clock?: Clock;
  attachmentPolling?: Partial<PollingSchedule>;
  logger?: Logger;
}

/** Create the application context with all services. */
export function createAppContext(config: AppConfig, options: AppContextOptions = {}): AppContext {
  const logger = options.logger ?? rootLogger;
  const store = options.store ?? createMemoryStore({ ttlMs: config.workflowTtlMs });
  const clientFactory = createClientFactory(config, { fetch: options.fetch, clock: options.clock });
  const generator =
    options.generator ??
    new ChatCodeGenerator(clientFactory({ logger }), { model: config.chatModel, logger });
  const executor =
    options.executor ??
    new SandboxExecutor({ timeoutMs: config.executionTimeoutMs, clock: options.clock, logger });

  return {
    store,
    clientFactory,
    workflows: new WorkflowService(store.workflows, generator, logger),
    coordinator: new ExecutionCoordinator({ store, executor, clientFactory, logger }),
    attachmentPolling: options.attachmentPolling,
    logger,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: ctx.store.backend,
    });
  });

  app.use('/api/workflows', createWorkflowRoutes(ctx.workflows));
  app.use(
    '/api/workflows',
    createExecutionRoutes({
      store: ctx.store,
      coordinator: ctx.coordinator,
      clientFactory: ctx.clientFactory,
      attachmentPolling: ctx.attachmentPolling,
      logger: ctx.logger,
    }),
  );
  app.use('/api/files', createFileRoutes(ctx.clientFactory, ctx.logger));

  // Error handler
  app.use(errorHandler);

  return app;
}
