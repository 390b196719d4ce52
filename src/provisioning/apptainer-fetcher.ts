import { spawn } from 'child_process';
import { constants } from 'fs';
import { access } from 'fs/promises';
import { delimiter, join } from 'path';
import { ArtifactNamingService } from '../config/naming.js';
import { ProvisionerConfig } from '../types/index.js';
import { ArtifactFetcher, FetchRequest, FetchResult } from './types.js';

const DEFAULT_EXECUTABLES = ['apptainer', 'singularity'];

/**
 * Locate an executable by name on a PATH string, or check an explicit path
 */
export async function findExecutable(name: string, searchPath: string = ''): Promise<string | undefined> {
  const candidates = name.includes('/')
    ? [name]
    : searchPath.split(delimiter).filter(Boolean).map(dir => join(dir, name));

  for (const candidate of candidates) {
    try {
      await access(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not here, keep looking
    }
  }
  return undefined;
}

/**
 * Pulls images with `apptainer pull` (or `singularity pull`), converting them
 * to SIF archives on the way
 */
export class ApptainerFetcher implements ArtifactFetcher {
  private executable?: Promise<string>;
  private readonly naming = new ArtifactNamingService();

  /**
   * @param env - Environment the child process inherits; the CLI passes the process environment
   */
  constructor(
    private readonly config: ProvisionerConfig,
    private readonly env: NodeJS.ProcessEnv
  ) {}

  async fetch(request: FetchRequest): Promise<FetchResult> {
    const executable = await this.resolveExecutable();
    const args = this.buildPullArgs(request);
    const { log } = request;

    // A broken log must not stall the child: its output is still drained, just dropped.
    // The stream's error surfaces when the worker closes the log.
    let logFailed = false;
    const onLogError = (): void => {
      logFailed = true;
    };
    log.on('error', onLogError);
    const forward = (chunk: Buffer): void => {
      if (!logFailed && !log.destroyed && !log.writableEnded) {
        log.write(chunk);
      }
    };

    forward(Buffer.from(`$ ${executable} ${args.join(' ')}\n`));

    return new Promise<FetchResult>((resolve, reject) => {
      const child = spawn(executable, args, {
        env: this.buildEnvironment(),
        stdio: ['ignore', 'pipe', 'pipe']
      });

      child.stdout?.on('data', forward);
      child.stderr?.on('data', forward);

      child.once('error', error => {
        log.off('error', onLogError);
        reject(error);
      });
      child.once('close', (exitCode, signal) => {
        log.off('error', onLogError);
        resolve({ exitCode, signal });
      });
    });
  }

  buildPullArgs(request: FetchRequest): string[] {
    return [
      'pull',
      ...this.config.runtime.extra_args,
      request.targetPath,
      this.naming.normalizeImageReference(request.source)
    ];
  }

  /**
   * Child environment: the inherited one plus cache, scratch and proxy settings
   * under every name apptainer and singularity look for
   */
  buildEnvironment(): NodeJS.ProcessEnv {
    const { store, runtime } = this.config;
    const env: NodeJS.ProcessEnv = {
      ...this.env,
      APPTAINER_CACHEDIR: store.cache_directory,
      APPTAINER_TMPDIR: store.tmp_directory,
      SINGULARITY_CACHEDIR: store.cache_directory,
      SINGULARITY_TMPDIR: store.tmp_directory
    };

    const proxy = runtime.proxy;
    if (proxy?.http) {
      env.http_proxy = proxy.http;
      env.HTTP_PROXY = proxy.http;
      env.APPTAINER_HTTP_PROXY = proxy.http;
      env.APPTAINERENV_http_proxy = proxy.http;
    }
    if (proxy?.https) {
      env.https_proxy = proxy.https;
      env.HTTPS_PROXY = proxy.https;
      env.APPTAINER_HTTPS_PROXY = proxy.https;
      env.APPTAINERENV_https_proxy = proxy.https;
    }
    if (proxy?.no_proxy) {
      env.no_proxy = proxy.no_proxy;
      env.NO_PROXY = proxy.no_proxy;
    }

    return env;
  }

  /**
   * The configured executable, else `apptainer`, else `singularity`. Looked up once per fetcher.
   */
  resolveExecutable(): Promise<string> {
    if (!this.executable) {
      this.executable = this.lookupExecutable();
    }
    return this.executable;
  }

  private async lookupExecutable(): Promise<string> {
    const configured = this.config.runtime.executable;
    const names = configured ? [configured] : DEFAULT_EXECUTABLES;

    for (const name of names) {
      const found = await findExecutable(name, this.env.PATH);
      if (found) {
        return found;
      }
    }

    throw new Error(
      configured
        ? `Configured container runtime "${configured}" was not found or is not executable`
        : 'Provisioning requires either "apptainer" or "singularity" on PATH'
    );
  }
}
