/**
 * docflow: run generated document-processing workflows in a sandbox.
 *
 * Public exports for programmatic use. The HTTP entry point is `main.ts`.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export * from './domain';
export { DocumentApiClient, searchNeedsFallback, DEFAULT_SEARCH_TOOL, DEFAULT_FALLBACK_TOOL } from './documents/client';
export type { DocumentApiClientOptions, FetchLike } from './documents/client';
export { SandboxExecutor, DEFAULT_EXECUTION_TIMEOUT_MS } from './sandbox/executor';
export { ExecutionCoordinator, createClientFactory, finalizeExecutionRecord } from './engine/coordinator';
export type { ClientFactory } from './engine/coordinator';
export { awaitAttachmentsReady, cleanupRemoteFiles } from './engine/attachments';
export { WorkflowService } from './engine/workflow-service';
export { ChatCodeGenerator, extractCode, validateGeneratedCode } from './llm/code-generator';
export type { CodeGenerator } from './llm/code-generator';
export { createKeyValueStore } from './storage/store';
export type { KeyValueStore, Store } from './storage/store';
export { createMemoryStore, MemoryKeyValueStore } from './storage/memory-store';
export { createLogger, logger, setLogHandler, setLogLevel, LogLevel } from './logger';
