/**
 * Remote file and analysis job vocabularies.
 *
 * Files and analysis jobs live in the document service; these types only
 * describe what it reports. Ingestion and analysis use different status
 * words, so each gets its own classifier.
 */

import { FileId } from './execution';

/** File metadata as reported by the document service. */
export interface RemoteFile {
  id: FileId;
  filename?: string;
  status: string;
  bytes?: number;
  createdAt?: number;
  /** File text, only when requested. */
  content?: string;
}

/** Who can see an uploaded file. */
export type FileVisibility = 'private' | 'company' | 'workspace';

/** Outcome class of a polled status value. */
export type PollClassification = 'ready' | 'failed' | 'pending';

const FILE_READY_STATUSES = new Set(['embedded', 'ready']);
const FILE_FAILED_STATUSES = new Set(['error', 'failed']);

/**
 * Classify a file ingestion status. `uploading`, `processing`, `embedding`
 * and any unknown word are pending.
 */
export function classifyFileStatus(status: string): PollClassification {
  const normalized = status.trim().toLowerCase();
  if (FILE_READY_STATUSES.has(normalized)) return 'ready';
  if (FILE_FAILED_STATUSES.has(normalized)) return 'failed';
  return 'pending';
}

const ANALYSIS_SUCCESS_STATUSES = new Set(['completed', 'complete', 'finished', 'success']);
const ANALYSIS_FAILURE_STATUSES = new Set(['failed', 'error']);

/**
 * Classify an analysis job status, case-insensitively. Unrecognized values
 * are treated as still running: the service's in-progress vocabulary is open.
 */
export function classifyAnalysisStatus(status: string): PollClassification {
  const normalized = status.trim().toLowerCase();
  if (ANALYSIS_SUCCESS_STATUSES.has(normalized)) return 'ready';
  if (ANALYSIS_FAILURE_STATUSES.has(normalized)) return 'failed';
  return 'pending';
}

export function isFileVisibility(value: string): value is FileVisibility {
  return value === 'private' || value === 'company' || value === 'workspace';
}
