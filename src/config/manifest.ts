import { readFile } from 'fs/promises';
import { ConfigurationError, ProvisionerConfig, errorMessage } from '../types/index.js';

/**
 * Split a comma separated instance list, dropping empty entries
 */
export function parseInstanceList(value: string): string[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/**
 * Parse a manifest file body: one instance id per line, blank lines and `#` comments ignored
 */
export function parseManifest(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.replace(/#.*$/, '').trim())
    .filter(line => line.length > 0);
}

/**
 * Keep the first occurrence of every id, preserving order
 */
export function dedupeInstanceIds(instanceIds: readonly string[]): string[] {
  return [...new Set(instanceIds)];
}

export async function readManifestFile(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read manifest file ${path}: ${errorMessage(error)}`);
  }
  return parseManifest(content);
}

/**
 * Resolve the ordered instance list named by the configuration's manifest section
 * @throws ConfigurationError when no manifest is configured or it lists nothing
 */
export async function resolveManifest(config: ProvisionerConfig): Promise<string[]> {
  const manifest = config.manifest;
  let instanceIds: string[];

  if (manifest?.instances !== undefined) {
    instanceIds = manifest.instances.map(id => id.trim()).filter(id => id.length > 0);
  } else if (manifest?.file !== undefined) {
    instanceIds = await readManifestFile(manifest.file);
  } else {
    throw new ConfigurationError(
      'No instances to provision',
      'Pass --instances id1,id2 or --manifest <file>, or add a manifest section to the configuration'
    );
  }

  if (instanceIds.length === 0) {
    throw new ConfigurationError('The manifest does not list any instance ids');
  }

  return dedupeInstanceIds(instanceIds);
}
