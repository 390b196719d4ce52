import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { ArtifactNamingService } from '../config/naming.js';
import { StoreInspector, isMissing } from '../provisioning/store-inspector.js';
import { AggregationError, ArtifactFile, ProvisionerConfig, Summary, errorMessage } from '../types/index.js';

/**
 * Derives run totals from what is on disk. The store directory is the only
 * record of what has been provisioned, whichever run produced it.
 */
export class StoreAggregator {
  private readonly naming = new ArtifactNamingService();
  private readonly inspector: StoreInspector;

  constructor(private readonly config: ProvisionerConfig) {
    this.inspector = new StoreInspector(config.store.integrity_check);
  }

  /**
   * Every artifact file in the store, sorted by name
   * @throws AggregationError when the directory cannot be read
   */
  async listArtifacts(storeDirectory: string = this.config.store.directory): Promise<ArtifactFile[]> {
    let entries: string[];
    try {
      entries = await readdir(storeDirectory);
    } catch (error) {
      throw new AggregationError(`Cannot read store directory ${storeDirectory}: ${errorMessage(error)}`);
    }

    const pattern = this.naming.artifactPattern(this.config.registry.arch);
    const artifacts: ArtifactFile[] = [];

    for (const fileName of entries.filter(entry => pattern.test(entry)).sort()) {
      const path = join(storeDirectory, fileName);
      try {
        const stats = await stat(path);
        if (stats.isFile()) {
          artifacts.push({ fileName, path, size: stats.size });
        }
      } catch (error) {
        // Removed between readdir and stat
        if (!isMissing(error)) {
          throw new AggregationError(`Cannot stat ${path}: ${errorMessage(error)}`);
        }
      }
    }

    return artifacts;
  }

  /**
   * Count how many of the requested instances have a valid artifact in the store
   */
  async summarize(instanceIds: readonly string[], storeDirectory: string = this.config.store.directory): Promise<Summary> {
    const artifacts = await this.listArtifacts(storeDirectory);
    const present = new Set(artifacts.map(artifact => artifact.fileName));
    const requested = [...new Set(instanceIds)];

    let successful = 0;
    for (const instanceId of requested) {
      let fileName: string;
      try {
        fileName = this.naming.resolve(instanceId, this.config).fileName;
      } catch {
        // Unresolvable ids can never have an artifact
        continue;
      }

      if (!present.has(fileName)) {
        continue;
      }

      try {
        if (await this.inspector.exists(join(storeDirectory, fileName))) {
          successful++;
        }
      } catch (error) {
        throw new AggregationError(`Cannot inspect ${fileName}: ${errorMessage(error)}`);
      }
    }

    return {
      total: requested.length,
      successful,
      failed: requested.length - successful,
      artifacts
    };
  }
}

/**
 * Summarize the store for an instance list
 */
export function summarize(
  storeDirectory: string,
  instanceIds: readonly string[],
  config: ProvisionerConfig
): Promise<Summary> {
  return new StoreAggregator(config).summarize(instanceIds, storeDirectory);
}
