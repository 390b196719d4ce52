import { mkdir } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { dedupeInstanceIds } from '../config/manifest.js';
import { ArtifactNamingService } from '../config/naming.js';
import { ArtifactWorker } from '../provisioning/artifact-worker.js';
import { StoreAggregator } from '../reporting/aggregator.js';
import { ConsoleLogger, ProvisionLogger } from '../reporting/logger.js';
import {
  ConfigurationError,
  Outcome,
  ProvisionerConfig,
  ProvisioningMetadata,
  ProvisioningRunResult,
  ResolutionError,
  WorkItem,
  errorMessage
} from '../types/index.js';
import { createDispatcher } from './dispatcher.js';
import { OrchestratorDependencies } from './types.js';

/** Highest value a process exit status can carry */
const MAX_EXIT_CODE = 255;

interface ResolvedBatch {
  items: WorkItem[];
  rejected: Outcome[];
}

export class ProvisioningOrchestrator {
  private readonly naming = new ArtifactNamingService();
  private readonly logger: ProvisionLogger;

  constructor(
    private readonly config: ProvisionerConfig,
    private readonly dependencies: OrchestratorDependencies
  ) {
    this.logger = dependencies.logger ?? new ConsoleLogger();
  }

  /**
   * Resolve, fetch and convert every instance, then summarize from the store.
   * Per-instance failures are reported in the result; only configuration and
   * store read errors reject.
   */
  async provision(instanceIds: readonly string[]): Promise<ProvisioningRunResult> {
    const startTime = Date.now();
    const metadata: ProvisioningMetadata = {
      runId: this.dependencies.runId ?? uuidv4(),
      timestamp: new Date(startTime),
      storeDirectory: this.config.store.directory
    };

    const requested = dedupeInstanceIds(instanceIds);
    if (requested.length === 0) {
      throw new ConfigurationError('No instances to provision');
    }

    await this.prepareDirectories();

    const { items, rejected } = this.resolveWorkItems(requested);
    const outcomes = new Map<string, Outcome>(rejected.map(outcome => [outcome.instanceId, outcome]));

    const worker = new ArtifactWorker({
      config: this.config,
      fetcher: this.dependencies.fetcher,
      logger: this.logger,
      runId: metadata.runId
    });
    const dispatcher = this.dependencies.dispatcher ?? createDispatcher(this.config.dispatch);

    this.logger.info(
      `Provisioning ${items.length} instance(s) into ${this.config.store.directory} (concurrency ${dispatcher.concurrency})`
    );

    await dispatcher.run(items, async (item, index) => {
      const outcome = await worker.provision(item, { index, total: items.length });
      outcomes.set(item.instanceId, outcome);
    });

    const summary = await new StoreAggregator(this.config).summarize(requested);

    const ordered = requested
      .map(instanceId => outcomes.get(instanceId))
      .filter((outcome): outcome is Outcome => outcome !== undefined);
    const failedThisRun = ordered.filter(outcome => outcome.status === 'failed').length;

    metadata.duration = Date.now() - startTime;

    return {
      outcomes: ordered,
      summary,
      exitCode: Math.min(failedThisRun, MAX_EXIT_CODE),
      metadata
    };
  }

  /**
   * Resolve ids to work items. Unresolvable ids and ids that would share an
   * artifact with an earlier one become failed outcomes without a log.
   */
  resolveWorkItems(instanceIds: readonly string[]): ResolvedBatch {
    const resolved: WorkItem[] = [];
    const rejected: Outcome[] = [];

    for (const instanceId of instanceIds) {
      try {
        resolved.push(this.naming.resolve(instanceId, this.config));
      } catch (error) {
        if (!(error instanceof ResolutionError)) {
          throw error;
        }
        this.logger.error(`Skipping ${instanceId || '(empty id)'}: ${error.message}`);
        rejected.push({ status: 'failed', instanceId, error });
      }
    }

    const conflicts = this.naming.checkNamingConflicts(resolved);
    const conflicting = new Set(conflicts.map(conflict => conflict.instanceId));
    for (const conflict of conflicts) {
      const error = new ResolutionError(
        conflict.instanceId,
        `"${conflict.instanceId}" would share ${conflict.fileName} with "${conflict.conflictsWith}"`
      );
      this.logger.error(`Skipping ${conflict.instanceId}: ${error.message}`);
      rejected.push({ status: 'failed', instanceId: conflict.instanceId, error });
    }

    return {
      items: resolved.filter(item => !conflicting.has(item.instanceId)),
      rejected
    };
  }

  private async prepareDirectories(): Promise<void> {
    const { store } = this.config;
    for (const directory of [store.directory, store.cache_directory, store.tmp_directory, store.log_directory]) {
      try {
        await mkdir(directory, { recursive: true });
      } catch (error) {
        throw new ConfigurationError(
          `Cannot create directory ${directory}: ${errorMessage(error)}`,
          'Point the store, cache and log directories at writable locations'
        );
      }
    }
  }
}

/**
 * Run the provisioning pipeline once
 */
export function provision(
  config: ProvisionerConfig,
  instanceIds: readonly string[],
  dependencies: OrchestratorDependencies
): Promise<ProvisioningRunResult> {
  return new ProvisioningOrchestrator(config, dependencies).provision(instanceIds);
}
