import { createWriteStream, WriteStream } from 'fs';
import { rename, rm, stat, unlink } from 'fs/promises';
import { join } from 'path';
import { ArtifactNamingService } from '../config/naming.js';
import { ProvisionLogger } from '../reporting/logger.js';
import { FetchError, Outcome, ProvisionerConfig, WorkItem, errorMessage } from '../types/index.js';
import { StoreInspector, isMissing } from './store-inspector.js';
import { ArtifactFetcher, FetchResult, ProgressPosition } from './types.js';

export interface ArtifactWorkerOptions {
  config: ProvisionerConfig;
  fetcher: ArtifactFetcher;
  logger: ProvisionLogger;
  /** Distinguishes partial files of concurrent runs */
  runId: string;
  inspector?: StoreInspector;
}

/**
 * Transient log location for an instance. Fixed per id so operators can find it,
 * and truncated by every attempt.
 */
export function failureLogPath(logDirectory: string, instanceId: string): string {
  return join(logDirectory, `pull_${instanceId}.log`);
}

const FAILURE_LOG_NAME = /^pull_[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?\.log$/;

/**
 * Whether a file name is one `failureLogPath` produces. Only ids the resolver
 * accepts ever get a log, so other tools' `pull_*` files in a shared directory do not match.
 */
export function isFailureLogName(fileName: string): boolean {
  return FAILURE_LOG_NAME.test(fileName);
}

export function partialArtifactPath(localPath: string, runId: string): string {
  return `${localPath}.partial-${runId}`;
}

/**
 * Provisions a single work item. Never throws: every failure becomes a `failed` outcome.
 */
export class ArtifactWorker {
  private readonly naming = new ArtifactNamingService();
  private readonly inspector: StoreInspector;

  constructor(private readonly options: ArtifactWorkerOptions) {
    this.inspector = options.inspector ?? new StoreInspector(options.config.store.integrity_check);
  }

  async provision(item: WorkItem, position?: ProgressPosition): Promise<Outcome> {
    const { logger } = this.options;
    const progress = position ? `[${position.index + 1}/${position.total}] ` : '';
    logger.info(`${progress}${item.instanceId}`);

    try {
      if (await this.inspector.exists(item.localPath)) {
        logger.info(`  already present: ${item.fileName}`);
        return { status: 'skipped', instanceId: item.instanceId };
      }
    } catch (error) {
      return this.fail(item, new FetchError(item.instanceId, `Cannot inspect ${item.localPath}: ${errorMessage(error)}`));
    }

    const logPath = failureLogPath(this.options.config.store.log_directory, item.instanceId);
    const partialPath = partialArtifactPath(item.localPath, this.options.runId);
    let log: WriteStream;
    try {
      log = await openLog(logPath);
    } catch (error) {
      return this.fail(item, new FetchError(item.instanceId, `Cannot open log ${logPath}: ${errorMessage(error)}`));
    }

    let failure: FetchError | undefined;
    try {
      const result = await this.options.fetcher.fetch({
        instanceId: item.instanceId,
        source: this.naming.toPullUri(item.reference),
        targetPath: partialPath,
        log
      });
      failure = await this.checkResult(item, result, partialPath);
    } catch (error) {
      failure = new FetchError(item.instanceId, `Fetch for ${item.instanceId} could not run: ${errorMessage(error)}`);
    }

    if (failure) {
      log.write(`\n${failure.message}\n`);
      await this.finishLog(log, logPath);
      await this.discardPartial(partialPath);
      return this.fail(item, failure, logPath);
    }

    await this.finishLog(log, logPath);
    try {
      await rename(partialPath, item.localPath);
    } catch (error) {
      await this.discardPartial(partialPath);
      const renameFailure = new FetchError(item.instanceId, `Cannot move artifact into place: ${errorMessage(error)}`);
      await appendToLog(logPath, renameFailure.message).catch((logError: unknown) => {
        logger.warn(`  could not write ${logPath}: ${errorMessage(logError)}`);
      });
      return this.fail(item, renameFailure, logPath);
    }

    await unlink(logPath).catch((error: unknown) => {
      if (!isMissing(error)) {
        logger.warn(`  could not remove ${logPath}: ${errorMessage(error)}`);
      }
    });
    logger.success(`  provisioned ${item.fileName}`);
    return { status: 'succeeded', instanceId: item.instanceId, localPath: item.localPath };
  }

  private async checkResult(item: WorkItem, result: FetchResult, partialPath: string): Promise<FetchError | undefined> {
    if (result.exitCode !== 0) {
      const reason = result.exitCode === null ? `was killed by ${result.signal ?? 'a signal'}` : `exited with status ${result.exitCode}`;
      return new FetchError(item.instanceId, `Pull of ${item.instanceId} ${reason}`, result.exitCode);
    }

    try {
      const stats = await stat(partialPath);
      if (stats.size > 0) {
        return undefined;
      }
    } catch (error) {
      if (!isMissing(error)) {
        return new FetchError(item.instanceId, `Cannot read pulled artifact: ${errorMessage(error)}`, 0);
      }
    }
    return new FetchError(item.instanceId, `Pull of ${item.instanceId} reported success but wrote no artifact`, 0);
  }

  private async discardPartial(partialPath: string): Promise<void> {
    try {
      await rm(partialPath, { force: true });
    } catch (error) {
      this.options.logger.warn(`  could not remove partial artifact ${partialPath}: ${errorMessage(error)}`);
    }
  }

  private async finishLog(log: WriteStream, logPath: string): Promise<void> {
    try {
      await closeStream(log);
    } catch (error) {
      this.options.logger.warn(`  could not write ${logPath}: ${errorMessage(error)}`);
    }
  }

  private fail(item: WorkItem, error: FetchError, logPath?: string): Outcome {
    const where = logPath ? ` (log: ${logPath})` : '';
    this.options.logger.error(`  failed ${item.instanceId}: ${error.message}${where}`);
    return { status: 'failed', instanceId: item.instanceId, logPath, error };
  }
}

function openLog(path: string, flags: string = 'w'): Promise<WriteStream> {
  return new Promise((resolve, reject) => {
    const stream = createWriteStream(path, { flags });
    // Stays attached: later write errors surface through `errored` when the log is closed
    stream.once('error', reject);
    stream.once('open', () => resolve(stream));
  });
}

function closeStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.end(() => {
      if (stream.errored) {
        reject(stream.errored);
      } else {
        resolve();
      }
    });
  });
}

async function appendToLog(path: string, message: string): Promise<void> {
  const stream = await openLog(path, 'a');
  stream.write(`${message}\n`);
  await closeStream(stream);
}
