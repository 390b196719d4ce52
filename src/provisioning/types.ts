// Provisioning-specific types
import type { Writable } from 'stream';

export interface FetchRequest {
  instanceId: string;
  /** Pull URI or local image path, e.g. `docker://docker.io/team/sweb.eval.x86_64.a_s_b:latest` */
  source: string;
  /** Where the converted archive must be written */
  targetPath: string;
  /** Receives the combined stdout and stderr of the conversion */
  log: Writable;
}

export interface FetchResult {
  /** Process exit status; null when the process was killed by a signal */
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
}

/**
 * Pulls one image and converts it into a local archive. Rejects only when the
 * conversion could not be started at all.
 */
export interface ArtifactFetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

export interface ProgressPosition {
  index: number;
  total: number;
}
