/**
 * Upload Orchestrator
 * 
 * Runs the upload batch over a single connection:
 * connect once, upload tasks in order, close once.
 * The first failing task aborts the batch.
 */

import type { UploadTask } from '@sftp-writer/core';
import { createLogger, formatDuration, safeFileSizeBytes, type Logger } from '@sftp-writer/utils';
import { resolveDestination, type DestinationOptions } from './destination.js';
import type { RetryingUploader, UploadSession } from './uploader.js';

export interface ManagedSession extends UploadSession {
  close(): void;
}

export interface UploadedFile {
  name: string;
  kind: UploadTask['kind'];
  source: string;
  destination: string;
}

export interface UploadSummary {
  files: UploadedFile[];
  total: number;
}

export interface UploadOrchestratorOptions {
  connect: () => Promise<ManagedSession>;
  uploader: RetryingUploader;
  destination: DestinationOptions;
  clock?: () => Date;
  logger?: Logger;
}

export class UploadOrchestrator {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: UploadOrchestratorOptions) {
    this.logger = options.logger ?? createLogger({ component: 'orchestrator' });
    this.clock = options.clock ?? (() => new Date());
  }

  async run(tasks: readonly UploadTask[]): Promise<UploadSummary> {
    const startedAt = Date.now();
    const session = await this.options.connect();
    const files: UploadedFile[] = [];

    try {
      for (const task of tasks) {
        files.push(await this.uploadTask(session, task));
      }
    } finally {
      session.close();
    }

    this.logger.info({ total: files.length, duration: formatDuration(Date.now() - startedAt) }, 'Upload finished');
    return { files, total: files.length };
  }

  private async uploadTask(session: ManagedSession, task: UploadTask): Promise<UploadedFile> {
    const destination = resolveDestination(task.name, this.options.destination, this.clock());
    // A missing source still goes through the uploader, which reports it
    const size = await safeFileSizeBytes(task.sourcePath);

    this.logger.info({ source: task.sourcePath, destination, kind: task.kind, size }, 'Uploading file');
    await this.options.uploader.upload(session, task.sourcePath, destination);
    this.logger.info({ destination }, 'File uploaded');

    return { name: task.name, kind: task.kind, source: task.sourcePath, destination };
  }
}
