/**
 * Response shapes of the document service and the guards that read them.
 *
 * Bodies arrive as `unknown`; every field is checked before use so a
 * malformed response degrades to defaults instead of leaking `undefined`
 * into reports.
 */

import { FileId, isFileId } from '../domain/execution';
import { RemoteFile } from '../domain/remote-file';

/** A JSON object as returned by the service (chunks, documents). */
export type JsonObject = Record<string, unknown>;

/** Result of a document search, after any fallback. */
export interface SearchResult {
  answer: string;
  documents: JsonObject[];
  chunks: JsonObject[];
  /** Search tool that produced this result. */
  tool: string;
}

/** One poll of an analysis job. */
export interface AnalysisJobStatus {
  status: string;
  result?: string;
}

export interface AskQuestionResult {
  response: string;
  chunks: JsonObject[];
}

export interface FileChunksResult {
  chunks: JsonObject[];
}

export interface ChunkQueryResult {
  query: string;
  chunks: JsonObject[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readObjects(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** Read file metadata. Upload responses may use `file_id` instead of `id`. */
export function parseRemoteFile(body: unknown, fallback: { id?: FileId; status: string }): RemoteFile | undefined {
  if (!isRecord(body)) return undefined;
  const rawId = body.id ?? body.file_id ?? fallback.id;
  if (!isFileId(rawId)) return undefined;

  const file: RemoteFile = {
    id: rawId,
    status: readString(body.status) ?? fallback.status,
  };
  const filename = readString(body.filename);
  if (filename !== undefined) file.filename = filename;
  const bytes = readNumber(body.bytes);
  if (bytes !== undefined) file.bytes = bytes;
  const createdAt = readNumber(body.created_at);
  if (createdAt !== undefined) file.createdAt = createdAt;
  const content = readString(body.content);
  if (content !== undefined) file.content = content;
  return file;
}

export function parseSearchResult(body: unknown, tool: string): SearchResult {
  const record = isRecord(body) ? body : {};
  return {
    answer: readString(record.answer) ?? '',
    documents: readObjects(record.documents),
    chunks: readObjects(record.chunks),
    tool,
  };
}

/** Analysis jobs are identified by `job_id`, older deployments by `chat_response_id`. */
export function parseAnalysisJobId(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const raw = body.job_id ?? body.chat_response_id;
  if (typeof raw === 'string' && raw.trim() !== '') return raw;
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
  return undefined;
}

export function parseAnalysisJobStatus(body: unknown): AnalysisJobStatus {
  const record = isRecord(body) ? body : {};
  const status: AnalysisJobStatus = { status: readString(record.status) ?? '' };
  const result = readString(record.result) ?? readString(record.detailed_analysis);
  if (result !== undefined) status.result = result;
  return status;
}

/** `choices[0].message.content`, or undefined when absent. */
export function parseChatContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  return readString(first.message.content);
}

export function parseAskQuestionResult(body: unknown): AskQuestionResult {
  const record = isRecord(body) ? body : {};
  return {
    response: readString(record.response) ?? '',
    chunks: readObjects(record.chunks),
  };
}

export function parseFileChunks(body: unknown): FileChunksResult {
  const record = isRecord(body) ? body : {};
  return { chunks: readObjects(record.chunks) };
}

export function parseChunkQueryResult(body: unknown, query: string): ChunkQueryResult {
  const record = isRecord(body) ? body : {};
  return {
    query: readString(record.query) ?? query,
    chunks: readObjects(record.chunks),
  };
}
