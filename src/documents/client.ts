/**
 * Document service client.
 *
 * Typed async wrapper over the document-intelligence HTTP API: file upload
 * and lifecycle, document search with a single fallback retry, long-running
 * analysis jobs observed by polling, chat completion and chunk retrieval.
 *
 * One instance is built per execution. Its AbortSignal ties every request
 * and every poll sleep to that execution, so a timed-out run stops issuing
 * calls instead of leaking them.
 *
 * Usage:
 *   const client = new DocumentApiClient({ apiKey: config.documentApiKey });
 *   const file = await client.upload(bytes, 'invoice.pdf');
 *   await client.waitUntilReady(file.id);
 *   const report = await client.analyzeWithPolling('Summarize', [file.id]);
 */

import {
  Clock,
  DEFAULT_ANALYSIS_POLLING,
  DEFAULT_INGESTION_POLLING,
  PollingProgress,
  PollingProgressCallback,
  PollingSchedule,
  mergePollingSchedule,
  systemClock,
} from '../domain/async-polling';
import {
  AnalysisError,
  CancelledError,
  NotFoundError,
  PollingTimeoutError,
  ProcessingError,
  TransportError,
  maskSecretsInMessage,
} from '../domain/errors';
import { FileId } from '../domain/execution';
import { FileVisibility, RemoteFile, classifyAnalysisStatus, classifyFileStatus } from '../domain/remote-file';
import { Logger, logger as rootLogger } from '../logger';
import {
  AnalysisJobStatus,
  AskQuestionResult,
  ChunkQueryResult,
  FileChunksResult,
  SearchResult,
  parseAnalysisJobId,
  parseAnalysisJobStatus,
  parseAskQuestionResult,
  parseChatContent,
  parseChunkQueryResult,
  parseFileChunks,
  parseRemoteFile,
  parseSearchResult,
} from './wire';

export const DEFAULT_SEARCH_TOOL = 'DocumentSearch';
export const DEFAULT_FALLBACK_TOOL = 'VisionDocumentSearch';

/** Answers containing any of these read as "nothing found". */
const SEARCH_FAILURE_INDICATORS = ['not found', 'no information', 'cannot find', 'unable to', 'n/a'];

/** The subset of `fetch` the client relies on. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DocumentApiClientOptions {
  apiKey: string;
  /** Defaults to the production endpoint. */
  baseUrl?: string;
  fetch?: FetchLike;
  clock?: Clock;
  /** Aborting cancels in-flight requests and poll sleeps. */
  signal?: AbortSignal;
  ingestionPolling?: Partial<PollingSchedule>;
  analysisPolling?: Partial<PollingSchedule>;
  /** Tool retried once when a search comes back empty. `null` disables the retry. */
  fallbackTool?: string | null;
  chatModel?: string;
  logger?: Logger;
  onPollProgress?: PollingProgressCallback;
}

export interface UploadOptions {
  visibility?: FileVisibility;
  workspaceId?: number;
}

export interface SearchOptions {
  fileIds?: FileId[];
  workspaceIds?: number[];
  tool?: string;
  model?: string;
  chatSessionId?: string;
}

export interface AnalysisOptions extends Partial<PollingSchedule> {
  model?: string;
}

export interface ChatCompletionOptions {
  model?: string;
  systemPrompt?: string;
}

export interface FilterChunksOptions {
  n?: number;
  model?: string;
}

export interface QueryChunksOptions {
  collection?: string;
  n?: number;
}

interface RequestSpec {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  json?: unknown;
  form?: FormData;
}

/** True when a search result should be retried with the fallback tool. */
export function searchNeedsFallback(result: SearchResult): boolean {
  const answer = result.answer.trim().toLowerCase();
  if (answer === '' || result.documents.length === 0) return true;
  return SEARCH_FAILURE_INDICATORS.some((indicator) => answer.includes(indicator));
}

export class DocumentApiClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly signal?: AbortSignal;
  private readonly ingestionPolling: PollingSchedule;
  private readonly analysisPolling: PollingSchedule;
  private readonly fallbackTool: string | null;
  private readonly chatModel?: string;
  private readonly logger: Logger;
  private readonly onPollProgress?: PollingProgressCallback;

  constructor(options: DocumentApiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://paradigm.lighton.ai').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal;
    this.ingestionPolling = mergePollingSchedule(DEFAULT_INGESTION_POLLING, options.ingestionPolling);
    this.analysisPolling = mergePollingSchedule(DEFAULT_ANALYSIS_POLLING, options.analysisPolling);
    this.fallbackTool = options.fallbackTool === undefined ? DEFAULT_FALLBACK_TOOL : options.fallbackTool;
    this.chatModel = options.chatModel;
    this.logger = (options.logger ?? rootLogger).child({ component: 'document-api' });
    this.onPollProgress = options.onPollProgress;
  }

  // ── Files ─────────────────────────────────────────────────────────────────

  /** Upload a file. Not retried: a repeated upload would create a second file. */
  async upload(content: Uint8Array | string, filename: string, options: UploadOptions = {}): Promise<RemoteFile> {
    const form = new FormData();
    form.append('file', new Blob([content]), filename);
    form.append('collection_type', options.visibility ?? 'private');
    if (options.workspaceId !== undefined) {
      form.append('workspace_id', String(options.workspaceId));
    }

    const size = typeof content === 'string' ? Buffer.byteLength(content) : content.byteLength;
    this.logger.info('Uploading file', { filename, bytes: size });
    const res = await this.send({ method: 'POST', path: '/api/v2/files', form }, 'File upload');
    await this.expectStatus(res, [200, 201], 'File upload');

    const file = parseRemoteFile(await this.readJson(res, 'File upload'), { status: 'uploading' });
    if (!file) {
      throw new TransportError('File upload response did not include a file id', res.status);
    }
    this.logger.info('File uploaded', { fileId: file.id, status: file.status });
    return file;
  }

  /** Fetch file metadata, optionally with its extracted text. */
  async getFile(fileId: FileId, options: { includeContent?: boolean } = {}): Promise<RemoteFile> {
    const query = options.includeContent ? '?include_content=true' : '';
    const res = await this.send({ method: 'GET', path: `/api/v2/files/${encodeURIComponent(String(fileId))}${query}` }, 'Get file');
    if (res.status === 404) throw new NotFoundError('File', String(fileId));
    await this.expectStatus(res, [200], 'Get file');

    const file = parseRemoteFile(await this.readJson(res, 'Get file'), { id: fileId, status: 'unknown' });
    if (!file) throw new TransportError(`Get file returned an unreadable body for ${fileId}`, res.status);
    return file;
  }

  /** Current ingestion status. Read-only; never cached. */
  async getFileStatus(fileId: FileId): Promise<string> {
    const file = await this.getFile(fileId);
    return file.status;
  }

  /**
   * Poll a file's status until ingestion finishes.
   * Returns the ready status, or throws ProcessingError / PollingTimeoutError.
   */
  async waitUntilReady(fileId: FileId, schedule: Partial<PollingSchedule> = {}): Promise<string> {
    const { maxWaitMs, pollIntervalMs } = mergePollingSchedule(this.ingestionPolling, schedule);
    const startedAt = this.clock.now();
    const deadline = startedAt + maxWaitMs;
    let polls = 0;

    for (;;) {
      const status = await this.getFileStatus(fileId);
      polls++;
      this.reportProgress({ subject: `file ${fileId}`, status, pollCount: polls, elapsedMs: this.clock.now() - startedAt });

      const outcome = classifyFileStatus(status);
      if (outcome === 'ready') return status;
      if (outcome === 'failed') throw new ProcessingError(String(fileId), status);

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        throw new PollingTimeoutError(`file ${fileId} to become ready`, maxWaitMs, polls);
      }
      await this.clock.sleep(Math.min(pollIntervalMs, remaining), this.signal);
    }
  }

  /** Delete a file. Returns false when the service no longer knows it. */
  async deleteFile(fileId: FileId): Promise<boolean> {
    const res = await this.send(
      { method: 'DELETE', path: `/api/v2/files/${encodeURIComponent(String(fileId))}` },
      'Delete file',
    );
    if (res.status === 404) {
      this.logger.warn('File already gone', { fileId });
      return false;
    }
    await this.expectStatus(res, [200, 204], 'Delete file');
    return true;
  }

  // ── Search and questions ──────────────────────────────────────────────────

  /**
   * Search documents. When the answer is empty, signals "not found" or cites
   * no documents, the search is repeated once with the fallback tool and that
   * result is returned as is.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult> {
    const tool = options.tool ?? DEFAULT_SEARCH_TOOL;
    const primary = await this.documentSearch(query, options, tool);

    if (this.fallbackTool === null || this.fallbackTool === tool || !searchNeedsFallback(primary)) {
      return primary;
    }
    this.logger.info('Search result unclear, retrying with fallback tool', { tool, fallbackTool: this.fallbackTool });
    return this.documentSearch(query, options, this.fallbackTool);
  }

  async askQuestion(fileId: FileId, question: string): Promise<AskQuestionResult> {
    const res = await this.send(
      { method: 'POST', path: `/api/v2/files/${encodeURIComponent(String(fileId))}/ask-question`, json: { question } },
      'Ask question',
    );
    if (res.status === 404) throw new NotFoundError('File', String(fileId));
    await this.expectStatus(res, [200], 'Ask question');
    return parseAskQuestionResult(await this.readJson(res, 'Ask question'));
  }

  // ── Analysis jobs ─────────────────────────────────────────────────────────

  /** Start an analysis job and return its id. */
  async startAnalysis(query: string, documentIds: FileId[], options: { model?: string } = {}): Promise<string> {
    const payload: Record<string, unknown> = { query, document_ids: documentIds, private: true };
    if (options.model) payload.model = options.model;

    const res = await this.send({ method: 'POST', path: '/api/v2/chat/document-analysis', json: payload }, 'Start analysis');
    await this.expectStatus(res, [200, 201, 202], 'Start analysis');

    const jobId = parseAnalysisJobId(await this.readJson(res, 'Start analysis'));
    if (jobId === undefined) {
      throw new AnalysisError('Analysis start response did not include a job id', { documentIds });
    }
    this.logger.info('Analysis started', { jobId, documents: documentIds.length });
    return jobId;
  }

  /** One poll of an analysis job. The service answers 404 while the job is still being set up. */
  async getAnalysisResult(jobId: string): Promise<AnalysisJobStatus> {
    const res = await this.send(
      { method: 'GET', path: `/api/v2/chat/document-analysis/${encodeURIComponent(jobId)}` },
      'Get analysis result',
    );
    if (res.status === 404) return { status: 'processing' };
    await this.expectStatus(res, [200], 'Get analysis result');
    return parseAnalysisJobStatus(await this.readJson(res, 'Get analysis result'));
  }

  /** Start an analysis and poll until it completes; returns the report text. */
  async analyzeWithPolling(query: string, documentIds: FileId[], options: AnalysisOptions = {}): Promise<string> {
    const { maxWaitMs, pollIntervalMs } = mergePollingSchedule(this.analysisPolling, options);
    const jobId = await this.startAnalysis(query, documentIds, { model: options.model });
    const startedAt = this.clock.now();
    const deadline = startedAt + maxWaitMs;
    let polls = 0;

    for (;;) {
      const job = await this.getAnalysisResult(jobId);
      polls++;
      this.reportProgress({ subject: `analysis ${jobId}`, status: job.status, pollCount: polls, elapsedMs: this.clock.now() - startedAt });

      const outcome = classifyAnalysisStatus(job.status);
      if (outcome === 'ready') return job.result ?? '';
      if (outcome === 'failed') {
        throw new AnalysisError(`Analysis ${jobId} failed with status "${job.status}"`, { jobId, status: job.status });
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        throw new PollingTimeoutError(`analysis ${jobId}`, maxWaitMs, polls);
      }
      await this.clock.sleep(Math.min(pollIntervalMs, remaining), this.signal);
    }
  }

  // ── Chat and chunks ───────────────────────────────────────────────────────

  async chatCompletion(prompt: string, options: ChatCompletionOptions = {}): Promise<string> {
    const messages: Array<{ role: string; content: string }> = [];
    if (options.systemPrompt) messages.push({ role: 'system', content: options.systemPrompt });
    messages.push({ role: 'user', content: prompt });

    const res = await this.send(
      {
        method: 'POST',
        path: '/api/v2/chat/completions',
        json: { model: options.model ?? this.chatModel ?? 'alfred-4.2', messages },
      },
      'Chat completion',
    );
    await this.expectStatus(res, [200], 'Chat completion');

    const content = parseChatContent(await this.readJson(res, 'Chat completion'));
    if (content === undefined) {
      throw new TransportError('Chat completion response had no message content', res.status);
    }
    return content;
  }

  async getFileChunks(fileId: FileId): Promise<FileChunksResult> {
    const res = await this.send(
      { method: 'GET', path: `/api/v2/files/${encodeURIComponent(String(fileId))}/chunks` },
      'Get file chunks',
    );
    if (res.status === 404) throw new NotFoundError('File', String(fileId));
    await this.expectStatus(res, [200], 'Get file chunks');
    return parseFileChunks(await this.readJson(res, 'Get file chunks'));
  }

  /** Rank the given chunks by relevance to the query. */
  async filterChunks(query: string, chunkIds: string[], options: FilterChunksOptions = {}): Promise<ChunkQueryResult> {
    const payload: Record<string, unknown> = { query, chunk_ids: chunkIds };
    if (options.n !== undefined) payload.n = options.n;
    if (options.model !== undefined) payload.model = options.model;

    const res = await this.send({ method: 'POST', path: '/api/v2/filter/chunks', json: payload }, 'Filter chunks');
    await this.expectStatus(res, [200], 'Filter chunks');
    return parseChunkQueryResult(await this.readJson(res, 'Filter chunks'), query);
  }

  /** Retrieve relevant chunks without a generated answer. */
  async queryChunks(query: string, options: QueryChunksOptions = {}): Promise<ChunkQueryResult> {
    const payload: Record<string, unknown> = { query };
    if (options.collection !== undefined) payload.collection = options.collection;
    if (options.n !== undefined) payload.n = options.n;

    const res = await this.send({ method: 'POST', path: '/api/v2/query', json: payload }, 'Query chunks');
    await this.expectStatus(res, [200], 'Query chunks');
    return parseChunkQueryResult(await this.readJson(res, 'Query chunks'), query);
  }

  // ── Transport ─────────────────────────────────────────────────────────────

  private async documentSearch(query: string, options: SearchOptions, tool: string): Promise<SearchResult> {
    const payload: Record<string, unknown> = {
      query,
      tool,
      company_scope: false,
      private_scope: true,
      private: true,
    };
    if (options.fileIds && options.fileIds.length > 0) payload.file_ids = options.fileIds;
    if (options.workspaceIds && options.workspaceIds.length > 0) payload.workspace_ids = options.workspaceIds;
    if (options.chatSessionId) payload.chat_session_id = options.chatSessionId;
    if (options.model) payload.model = options.model;

    this.logger.info('Document search', { tool, query: query.slice(0, 50) });
    const res = await this.send({ method: 'POST', path: '/api/v2/chat/document-search', json: payload }, 'Document search');
    await this.expectStatus(res, [200], 'Document search');
    return parseSearchResult(await this.readJson(res, 'Document search'), tool);
  }

  private async send(request: RequestSpec, operation: string): Promise<Response> {
    if (this.signal?.aborted) {
      throw new CancelledError(`${operation} cancelled: execution is no longer running`);
    }

    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    let body: string | FormData | undefined;
    if (request.form) {
      body = request.form;
    } else if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    }

    try {
      return await this.fetchImpl(`${this.baseUrl}${request.path}`, {
        method: request.method,
        headers,
        body,
        signal: this.signal,
      });
    } catch (err) {
      if (this.signal?.aborted) {
        throw new CancelledError(`${operation} cancelled: execution is no longer running`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(this.mask(`${operation} failed: ${reason}`));
    }
  }

  private async expectStatus(res: Response, accepted: number[], operation: string): Promise<void> {
    if (accepted.includes(res.status)) return;
    const text = await res.text().catch(() => '');
    const message = this.mask(`${operation} failed: HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`);
    this.logger.error(message, { status: res.status });
    throw new TransportError(message, res.status);
  }

  private async readJson(res: Response, operation: string): Promise<unknown> {
    const text = await this.readText(res, operation);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new TransportError(
        this.mask(`${operation} returned a non-JSON response (HTTP ${res.status}): ${text.slice(0, 200)}`),
        res.status,
      );
    }
  }

  private async readText(res: Response, operation: string): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      if (this.signal?.aborted) {
        throw new CancelledError(`${operation} cancelled: execution is no longer running`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(this.mask(`${operation} failed while reading the response: ${reason}`), res.status);
    }
  }

  private reportProgress(progress: PollingProgress): void {
    this.logger.debug('Poll', { ...progress });
    this.onPollProgress?.(progress);
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.apiKey]);
  }
}
