// Orchestration-specific types
import type { ArtifactFetcher } from '../provisioning/types.js';
import type { ProvisionLogger } from '../reporting/logger.js';
import type { Dispatcher } from './dispatcher.js';

export interface OrchestratorDependencies {
  fetcher: ArtifactFetcher;
  logger?: ProvisionLogger;
  /** Defaults to one built from the dispatch section of the configuration */
  dispatcher?: Dispatcher;
  /** Defaults to a random UUID */
  runId?: string;
}
