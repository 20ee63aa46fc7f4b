/**
 * Attachment lifecycle around an execution.
 *
 * Before a run, attached files get a bounded chance to finish ingesting.
 * After the record is finalized, files created for the run are deleted.
 * Neither step fails the execution: problems are logged and reported.
 */

import { DEFAULT_ATTACHMENT_READINESS_POLLING, PollingSchedule, mergePollingSchedule } from '../domain/async-polling';
import { FileId } from '../domain/execution';
import { DocumentApiClient } from '../documents/client';
import { Logger, logger as rootLogger } from '../logger';

export interface AttachmentReadiness {
  fileId: FileId;
  ready: boolean;
  /** Final status, when one was read. */
  status?: string;
  error?: string;
}

export interface CleanupReport {
  deleted: FileId[];
  /** Already gone on the service side. */
  missing: FileId[];
  failed: Array<{ fileId: FileId; error: string }>;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wait for every attached file to be ingested, each within the schedule
 * (60s / 3s by default). Files that fail or time out are reported, not thrown.
 */
export async function awaitAttachmentsReady(
  client: DocumentApiClient,
  fileIds: FileId[],
  options: { schedule?: Partial<PollingSchedule>; logger?: Logger } = {},
): Promise<AttachmentReadiness[]> {
  const schedule = mergePollingSchedule(DEFAULT_ATTACHMENT_READINESS_POLLING, options.schedule);
  const log = options.logger ?? rootLogger;

  return Promise.all(
    fileIds.map(async (fileId): Promise<AttachmentReadiness> => {
      try {
        const status = await client.waitUntilReady(fileId, schedule);
        return { fileId, ready: true, status };
      } catch (err) {
        log.warn('Attachment not ready, continuing with execution', { fileId, error: messageOf(err) });
        return { fileId, ready: false, error: messageOf(err) };
      }
    }),
  );
}

/** Delete every listed file. Never throws; failures are logged and collected. */
export async function cleanupRemoteFiles(
  client: DocumentApiClient,
  fileIds: FileId[],
  logger: Logger = rootLogger,
): Promise<CleanupReport> {
  const report: CleanupReport = { deleted: [], missing: [], failed: [] };
  for (const fileId of fileIds) {
    try {
      if (await client.deleteFile(fileId)) {
        report.deleted.push(fileId);
      } else {
        report.missing.push(fileId);
      }
    } catch (err) {
      logger.error('Failed to delete remote file', { fileId, error: messageOf(err) });
      report.failed.push({ fileId, error: messageOf(err) });
    }
  }
  logger.info('Remote file cleanup finished', {
    deleted: report.deleted.length,
    missing: report.missing.length,
    failed: report.failed.length,
  });
  return report;
}
