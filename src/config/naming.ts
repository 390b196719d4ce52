import { join } from 'path';
import { ArtifactReference, ProvisionerConfig, ResolutionError, WorkItem } from '../types/index.js';

/** Prefix shared by every evaluation image, followed by `.<arch>.<escaped-id>` */
export const ARTIFACT_PREFIX = 'sweb.eval';
export const ARTIFACT_EXTENSION = '.sif';

const NAMESPACE_SEPARATOR = /__/g;
const ESCAPED_SEPARATOR = /_s_/g;
const INSTANCE_ID_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;
const MAX_REPOSITORY_LENGTH = 255;

/**
 * Two distinct instance ids that would share a local artifact
 */
export interface NamingConflict {
  instanceId: string;
  conflictsWith: string;
  fileName: string;
}

/**
 * Maps instance ids to registry references and store paths.
 * All methods are pure; nothing here touches the filesystem.
 */
export class ArtifactNamingService {
  /**
   * Rewrite every `__` as `_s_` so the namespace separator cannot be
   * confused with the single underscores of the naming scheme
   */
  escapeInstanceId(instanceId: string): string {
    return instanceId.replace(NAMESPACE_SEPARATOR, '_s_');
  }

  unescapeInstanceId(escaped: string): string {
    return escaped.replace(ESCAPED_SEPARATOR, '__');
  }

  /**
   * Image name without registry, namespace or tag, e.g. `sweb.eval.x86_64.django_s_django-11099`
   */
  imageName(instanceId: string, arch: string): string {
    return `${ARTIFACT_PREFIX}.${arch}.${this.escapeInstanceId(instanceId)}`;
  }

  artifactFileName(instanceId: string, arch: string): string {
    return `${this.imageName(instanceId, arch)}${ARTIFACT_EXTENSION}`;
  }

  /**
   * Resolve an instance id into its registry reference and local artifact path
   * @throws ResolutionError for ids the naming scheme cannot represent unambiguously
   */
  resolve(instanceId: string, config: ProvisionerConfig): WorkItem {
    this.assertResolvable(instanceId);

    const { registry } = config;
    const reference: ArtifactReference = {
      host: registry.host,
      namespace: registry.namespace,
      repository: this.imageName(instanceId, registry.arch).toLowerCase(),
      tag: registry.tag,
      scheme: registry.scheme
    };

    if (reference.repository.length > MAX_REPOSITORY_LENGTH) {
      throw new ResolutionError(instanceId, `Image name for ${instanceId} exceeds ${MAX_REPOSITORY_LENGTH} characters`);
    }

    const fileName = this.artifactFileName(instanceId, registry.arch);
    return {
      instanceId,
      reference,
      fileName,
      localPath: join(config.store.directory, fileName)
    };
  }

  /**
   * `[host/]namespace/repository:tag`
   */
  formatReference(reference: ArtifactReference): string {
    const path = `${reference.namespace}/${reference.repository}:${reference.tag}`;
    return reference.host ? `${reference.host}/${path}` : path;
  }

  toPullUri(reference: ArtifactReference): string {
    return `${reference.scheme}://${this.formatReference(reference)}`;
  }

  /**
   * Matches store file names produced by `artifactFileName` for the given architecture
   */
  artifactPattern(arch: string): RegExp {
    const escapedArch = arch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`^sweb\\.eval\\.${escapedArch}\\.[A-Za-z0-9._-]+\\.sif$`);
  }

  /**
   * Check a batch of resolved items for ids that would share an artifact.
   * File names are compared case-insensitively since registry references are lower-cased
   * and some filesystems fold case.
   */
  checkNamingConflicts(items: readonly WorkItem[]): NamingConflict[] {
    const conflicts: NamingConflict[] = [];
    const owners = new Map<string, string>();

    for (const item of items) {
      const key = item.fileName.toLowerCase();
      const owner = owners.get(key);
      if (owner === undefined) {
        owners.set(key, item.instanceId);
      } else if (owner !== item.instanceId) {
        conflicts.push({ instanceId: item.instanceId, conflictsWith: owner, fileName: item.fileName });
      }
    }

    return conflicts;
  }

  /**
   * Normalize an image reference the way the container runtime expects it:
   * URIs and local image paths are kept, `namespace/repository` references get `docker://`
   */
  normalizeImageReference(image: string): string {
    if (!image) {
      return '';
    }
    if (/^(docker|library|oras):\/\//.test(image)) {
      return image;
    }
    if (image.endsWith(ARTIFACT_EXTENSION) || image.startsWith('/') || image.startsWith('.')) {
      return image;
    }
    if (!image.includes('://') && image.includes('/')) {
      return `docker://${image}`;
    }
    return image;
  }

  private assertResolvable(instanceId: string): void {
    if (!instanceId) {
      throw new ResolutionError(instanceId, 'Instance id must not be empty');
    }

    if (!INSTANCE_ID_PATTERN.test(instanceId)) {
      throw new ResolutionError(
        instanceId,
        `Instance id "${instanceId}" must start and end with a letter or digit and contain only letters, digits, ".", "_" and "-"`
      );
    }

    // Ids that already contain the escape marker would collide with an escaped `__`
    if (this.unescapeInstanceId(this.escapeInstanceId(instanceId)) !== instanceId) {
      throw new ResolutionError(
        instanceId,
        `Instance id "${instanceId}" contains "_s_", which is reserved for escaping "__"`
      );
    }
  }
}

/**
 * Convenience function to create a new artifact naming service
 */
export function createNamingService(): ArtifactNamingService {
  return new ArtifactNamingService();
}
