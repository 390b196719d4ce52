import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { validateAndNormalizeConfig } from '../config/validator.js';
import { ArtifactFetcher, FetchRequest, FetchResult } from '../provisioning/types.js';
import { ProvisionLogger } from '../reporting/logger.js';
import { ProvisionerConfig } from '../types/index.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'sif-provision-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Configuration rooted in a temporary directory: store in `<root>/images`, logs in `<root>/logs`
 */
export function makeConfig(root: string, overrides: Record<string, unknown> = {}): ProvisionerConfig {
  return validateAndNormalizeConfig(
    {
      registry: { namespace: 'test-ns' },
      store: {
        directory: join(root, 'images'),
        log_directory: join(root, 'logs')
      },
      ...overrides
    },
    root
  );
}

/** Writes a minimal file with a SIF header: 32 byte launch script, then the magic */
export async function writeSifFile(path: string, payload: string = 'payload'): Promise<void> {
  const launch = '#!/usr/bin/env run-singularity\n'.padEnd(32, ' ');
  await writeFile(path, `${launch}SIF_MAGIC${payload}`);
}

export interface FakeBehavior {
  exitCode?: number | null;
  /** Written to the target path before resolving; omit to write nothing */
  content?: string;
  output?: string;
  delayMs?: number;
  error?: Error;
}

/**
 * In-process stand-in for the container runtime
 */
export class FakeFetcher implements ArtifactFetcher {
  readonly requests: FetchRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly behaviors: Record<string, FakeBehavior> = {}) {}

  async fetch(request: FetchRequest): Promise<FetchResult> {
    this.requests.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const behavior = this.behaviors[request.instanceId] ?? { exitCode: 0, content: `image:${request.instanceId}` };
      if (behavior.delayMs) {
        await new Promise(resolve => setTimeout(resolve, behavior.delayMs));
      }
      if (behavior.error) {
        throw behavior.error;
      }
      request.log.write(behavior.output ?? `pulling ${request.source}\n`);
      if (behavior.content !== undefined) {
        await writeFile(request.targetPath, behavior.content);
      }
      return { exitCode: behavior.exitCode ?? 0 };
    } finally {
      this.inFlight--;
    }
  }
}

export function createRecordingLogger(): ProvisionLogger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: message => lines.push(`info ${message}`),
    success: message => lines.push(`success ${message}`),
    warn: message => lines.push(`warn ${message}`),
    error: message => lines.push(`error ${message}`)
  };
}
