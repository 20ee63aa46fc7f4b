/**
 * Host side of the capabilities injected into generated code.
 *
 * Generated code calls `client.<method>(...)` and `sleep(ms)`; the sandbox
 * runtime serializes each call to `(op, argsJson)` and hands it to the
 * dispatcher built here. Arguments are validated before they reach the
 * client, and every outcome travels back as a JSON reply so no host object
 * ever enters the sandbox. JSON turns `undefined` into `null`, so null
 * arguments and null option fields are treated as absent.
 */

import { Clock } from '../domain/async-polling';
import { AppError, CancelledError } from '../domain/errors';
import { FileId, isFileId } from '../domain/execution';
import { FileVisibility, isFileVisibility } from '../domain/remote-file';
import { DocumentApiClient } from '../documents/client';
import { isRecord } from '../documents/wire';
import { Logger } from '../logger';

/** Client methods generated code can call. */
export const CLIENT_METHODS = [
  'upload',
  'getFile',
  'getFileStatus',
  'waitUntilReady',
  'search',
  'askQuestion',
  'startAnalysis',
  'getAnalysisResult',
  'analyzeWithPolling',
  'chatCompletion',
  'getFileChunks',
  'filterChunks',
  'queryChunks',
  'deleteFile',
] as const;

export type ClientMethod = (typeof CLIENT_METHODS)[number];

export type CapabilityHandler = (args: unknown[]) => Promise<unknown>;

/** JSON reply delivered back into the sandbox. */
export type CapabilityReply =
  | { ok: true; value?: unknown }
  | { ok: false; name: string; message: string; code?: string };

/** Host function the sandbox runtime calls for every capability. */
export type Dispatch = (op: unknown, argsJson: unknown, done: unknown) => void;

// ── Argument readers ────────────────────────────────────────────────────────

function argumentError(method: string, message: string): TypeError {
  return new TypeError(`${method}: ${message}`);
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function requireString(method: string, args: unknown[], index: number, name: string): string {
  const value = args[index];
  if (typeof value !== 'string') throw argumentError(method, `${name} must be a string`);
  return value;
}

function requireFileId(method: string, args: unknown[], index: number, name = 'fileId'): FileId {
  const value = args[index];
  if (!isFileId(value)) throw argumentError(method, `${name} must be a file id (number or string)`);
  return value;
}

function requireFileIds(method: string, value: unknown, name: string): FileId[] {
  if (!Array.isArray(value) || !value.every(isFileId)) {
    throw argumentError(method, `${name} must be an array of file ids`);
  }
  return [...value];
}

function requireStrings(method: string, value: unknown, name: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw argumentError(method, `${name} must be an array of strings`);
  }
  return [...value];
}

function optionsArg(method: string, args: unknown[], index: number): Record<string, unknown> {
  const value = args[index];
  if (!present(value)) return {};
  if (!isRecord(value)) throw argumentError(method, 'options must be an object');
  return value;
}

function optionalString(method: string, options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  if (!present(value)) return undefined;
  if (typeof value !== 'string') throw argumentError(method, `${key} must be a string`);
  return value;
}

function optionalNumber(method: string, options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  if (!present(value)) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw argumentError(method, `${key} must be a non-negative number`);
  }
  return value;
}

function optionalNumbers(method: string, options: Record<string, unknown>, key: string): number[] | undefined {
  const value = options[key];
  if (!present(value)) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is number => typeof item === 'number')) {
    throw argumentError(method, `${key} must be an array of numbers`);
  }
  return [...value];
}

function optionalVisibility(options: Record<string, unknown>): FileVisibility | undefined {
  const value = optionalString('upload', options, 'visibility');
  if (value === undefined) return undefined;
  if (!isFileVisibility(value)) throw argumentError('upload', 'visibility must be private, company or workspace');
  return value;
}

function schedule(method: string, options: Record<string, unknown>): { maxWaitMs?: number; pollIntervalMs?: number } {
  const result: { maxWaitMs?: number; pollIntervalMs?: number } = {};
  const maxWaitMs = optionalNumber(method, options, 'maxWaitMs');
  if (maxWaitMs !== undefined) result.maxWaitMs = maxWaitMs;
  const pollIntervalMs = optionalNumber(method, options, 'pollIntervalMs');
  if (pollIntervalMs === 0) throw argumentError(method, 'pollIntervalMs must be greater than 0');
  if (pollIntervalMs !== undefined) result.pollIntervalMs = pollIntervalMs;
  return result;
}

// ── Capability table ────────────────────────────────────────────────────────

/** Bind every client method and `sleep` to argument-checked handlers. */
export function createCapabilities(
  client: DocumentApiClient,
  clock: Clock,
  signal?: AbortSignal,
): Record<string, CapabilityHandler> {
  const clientHandlers: Record<ClientMethod, CapabilityHandler> = {
    upload: async (args) => {
      const content = requireString('upload', args, 0, 'content');
      const filename = requireString('upload', args, 1, 'filename');
      const options = optionsArg('upload', args, 2);
      return client.upload(content, filename, {
        visibility: optionalVisibility(options),
        workspaceId: optionalNumber('upload', options, 'workspaceId'),
      });
    },
    getFile: async (args) => {
      const options = optionsArg('getFile', args, 1);
      return client.getFile(requireFileId('getFile', args, 0), { includeContent: options.includeContent === true });
    },
    getFileStatus: async (args) => client.getFileStatus(requireFileId('getFileStatus', args, 0)),
    waitUntilReady: async (args) =>
      client.waitUntilReady(requireFileId('waitUntilReady', args, 0), schedule('waitUntilReady', optionsArg('waitUntilReady', args, 1))),
    search: async (args) => {
      const query = requireString('search', args, 0, 'query');
      const options = optionsArg('search', args, 1);
      return client.search(query, {
        fileIds: present(options.fileIds) ? requireFileIds('search', options.fileIds, 'fileIds') : undefined,
        workspaceIds: optionalNumbers('search', options, 'workspaceIds'),
        tool: optionalString('search', options, 'tool'),
        model: optionalString('search', options, 'model'),
        chatSessionId: optionalString('search', options, 'chatSessionId'),
      });
    },
    askQuestion: async (args) =>
      client.askQuestion(requireFileId('askQuestion', args, 0), requireString('askQuestion', args, 1, 'question')),
    startAnalysis: async (args) => {
      const options = optionsArg('startAnalysis', args, 2);
      return client.startAnalysis(
        requireString('startAnalysis', args, 0, 'query'),
        requireFileIds('startAnalysis', args[1], 'documentIds'),
        { model: optionalString('startAnalysis', options, 'model') },
      );
    },
    getAnalysisResult: async (args) => {
      const jobId = args[0];
      if (typeof jobId === 'number' && Number.isFinite(jobId)) return client.getAnalysisResult(String(jobId));
      return client.getAnalysisResult(requireString('getAnalysisResult', args, 0, 'jobId'));
    },
    analyzeWithPolling: async (args) => {
      const options = optionsArg('analyzeWithPolling', args, 2);
      return client.analyzeWithPolling(
        requireString('analyzeWithPolling', args, 0, 'query'),
        requireFileIds('analyzeWithPolling', args[1], 'documentIds'),
        { ...schedule('analyzeWithPolling', options), model: optionalString('analyzeWithPolling', options, 'model') },
      );
    },
    chatCompletion: async (args) => {
      const options = optionsArg('chatCompletion', args, 1);
      return client.chatCompletion(requireString('chatCompletion', args, 0, 'prompt'), {
        model: optionalString('chatCompletion', options, 'model'),
        systemPrompt: optionalString('chatCompletion', options, 'systemPrompt'),
      });
    },
    getFileChunks: async (args) => client.getFileChunks(requireFileId('getFileChunks', args, 0)),
    filterChunks: async (args) => {
      const options = optionsArg('filterChunks', args, 2);
      return client.filterChunks(
        requireString('filterChunks', args, 0, 'query'),
        requireStrings('filterChunks', args[1], 'chunkIds'),
        { n: optionalNumber('filterChunks', options, 'n'), model: optionalString('filterChunks', options, 'model') },
      );
    },
    queryChunks: async (args) => {
      const options = optionsArg('queryChunks', args, 1);
      return client.queryChunks(requireString('queryChunks', args, 0, 'query'), {
        collection: optionalString('queryChunks', options, 'collection'),
        n: optionalNumber('queryChunks', options, 'n'),
      });
    },
    deleteFile: async (args) => client.deleteFile(requireFileId('deleteFile', args, 0)),
  };

  const table: Record<string, CapabilityHandler> = {
    sleep: async (args) => {
      const ms = args[0];
      if (typeof ms !== 'number' || !Number.isFinite(ms) || ms < 0) {
        throw argumentError('sleep', 'ms must be a non-negative number');
      }
      await clock.sleep(ms, signal);
      return undefined;
    },
  };
  for (const method of CLIENT_METHODS) {
    table[`client.${method}`] = clientHandlers[method];
  }
  return table;
}

/** Describe a failure for the sandbox. Only names, messages and codes cross. */
export function toCapabilityReply(err: unknown): CapabilityReply {
  if (err instanceof AppError) {
    return { ok: false, name: err.name, message: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return { ok: false, name: err.name, message: err.message };
  }
  return { ok: false, name: 'Error', message: String(err) };
}

/**
 * Build the host dispatch function. It never throws into the sandbox: every
 * call ends in exactly one `done(replyJson)`.
 */
export function createDispatcher(
  table: Record<string, CapabilityHandler>,
  options: { signal?: AbortSignal; logger: Logger },
): Dispatch {
  const { signal, logger } = options;

  const handle = async (op: string, argsJson: string): Promise<CapabilityReply> => {
    if (signal?.aborted) {
      return toCapabilityReply(new CancelledError(`${op} refused: execution is no longer running`));
    }
    const handler = Object.prototype.hasOwnProperty.call(table, op) ? table[op] : undefined;
    if (!handler) {
      return toCapabilityReply(new TypeError(`Unknown capability: ${op}`));
    }
    try {
      const parsed: unknown = JSON.parse(argsJson);
      const args = Array.isArray(parsed) ? parsed : [];
      const value = await handler(args);
      return { ok: true, value };
    } catch (err) {
      logger.debug('Capability call failed', { op, error: err instanceof Error ? err.message : String(err) });
      return toCapabilityReply(err);
    }
  };

  return (op, argsJson, done) => {
    if (typeof done !== 'function') return;
    const deliver = (reply: CapabilityReply): void => {
      let json: string;
      try {
        json = JSON.stringify(reply);
      } catch (err) {
        json = JSON.stringify(toCapabilityReply(new TypeError('Capability result is not serializable')));
      }
      try {
        done(json);
      } catch (err) {
        logger.warn('Sandbox rejected a capability reply', { op: String(op) });
      }
    };

    if (typeof op !== 'string' || typeof argsJson !== 'string') {
      deliver(toCapabilityReply(new TypeError('Malformed capability call')));
      return;
    }
    handle(op, argsJson)
      .then(deliver)
      .catch((err: unknown) => {
        logger.error('Capability dispatch failed', { op, error: err instanceof Error ? err.message : String(err) });
      });
  };
}
