import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { ProvisioningOrchestrator, provision } from '../provisioning-orchestrator.js';
import { SequentialDispatcher } from '../dispatcher.js';
import { ArtifactNamingService } from '../../config/naming.js';
import { ConfigurationError, ProvisionerConfig, ResolutionError } from '../../types/index.js';
import {
  FakeFetcher,
  createRecordingLogger,
  makeConfig,
  makeTempDir,
  removeTempDir
} from '../../__tests__/fixtures.js';

describe('ProvisioningOrchestrator', () => {
  const naming = new ArtifactNamingService();
  let testDir: string;
  let config: ProvisionerConfig;

  beforeEach(async () => {
    testDir = await makeTempDir();
    config = makeConfig(testDir);
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  function orchestrator(fetcher: FakeFetcher, runConfig: ProvisionerConfig = config) {
    return new ProvisioningOrchestrator(runConfig, { fetcher, logger: createRecordingLogger(), runId: 'run-1' });
  }

  async function seed(instanceId: string, content = 'seeded'): Promise<string> {
    const { localPath } = naming.resolve(instanceId, config);
    await mkdir(config.store.directory, { recursive: true });
    await writeFile(localPath, content);
    return localPath;
  }

  it('should report partial failure from disk and keep only the failed log', async () => {
    const fetcher = new FakeFetcher({ 'beta__beta-2': { exitCode: 1, output: 'manifest unknown\n' } });

    const result = await orchestrator(fetcher).provision(['alpha__alpha-1', 'beta__beta-2', 'gamma__gamma-3']);

    expect(result.summary.total).toBe(3);
    expect(result.summary.successful).toBe(2);
    expect(result.summary.failed).toBe(1);
    expect(result.exitCode).toBe(1);
    expect(result.outcomes.map(outcome => outcome.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(await readdir(config.store.log_directory)).toEqual(['pull_beta__beta-2.log']);
    expect(result.summary.artifacts.map(artifact => artifact.fileName)).toEqual([
      'sweb.eval.x86_64.alpha_s_alpha-1.sif',
      'sweb.eval.x86_64.gamma_s_gamma-3.sif'
    ]);
  });

  it('should pull in submission order with the default bound of one', async () => {
    const fetcher = new FakeFetcher();

    await orchestrator(fetcher).provision(['c__c-1', 'a__a-1', 'b__b-1']);

    expect(fetcher.requests.map(request => request.instanceId)).toEqual(['c__c-1', 'a__a-1', 'b__b-1']);
    expect(fetcher.maxInFlight).toBe(1);
  });

  it('should count artifacts from earlier runs as successful', async () => {
    const ids = ['one__one-1', 'two__two-2', 'three__three-3', 'four__four-4', 'five__five-5'];
    await seed('one__one-1');
    await seed('two__two-2');
    await seed('three__three-3');
    const fetcher = new FakeFetcher({ 'five__five-5': { exitCode: 1 } });

    const result = await orchestrator(fetcher).provision(ids);

    expect(fetcher.requests.map(request => request.instanceId)).toEqual(['four__four-4', 'five__five-5']);
    expect(result.summary).toMatchObject({ total: 5, successful: 4, failed: 1 });
    expect(result.exitCode).toBe(1);
    expect(result.outcomes.filter(outcome => outcome.status === 'skipped')).toHaveLength(3);
  });

  it('should do no work on a second run and leave artifacts unchanged', async () => {
    const ids = ['alpha__alpha-1', 'beta__beta-2'];
    await orchestrator(new FakeFetcher()).provision(ids);
    const before = await readFile(naming.resolve('alpha__alpha-1', config).localPath, 'utf8');

    const secondFetcher = new FakeFetcher();
    const result = await orchestrator(secondFetcher).provision(ids);

    expect(secondFetcher.requests).toHaveLength(0);
    expect(result.outcomes.every(outcome => outcome.status === 'skipped')).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.summary).toMatchObject({ total: 2, successful: 2, failed: 0 });
    await expect(readFile(naming.resolve('alpha__alpha-1', config).localPath, 'utf8')).resolves.toBe(before);
  });

  it('should retry only what failed before', async () => {
    const ids = ['alpha__alpha-1', 'beta__beta-2'];
    await orchestrator(new FakeFetcher({ 'beta__beta-2': { exitCode: 1 } })).provision(ids);

    const retry = new FakeFetcher();
    const result = await orchestrator(retry).provision(ids);

    expect(retry.requests.map(request => request.instanceId)).toEqual(['beta__beta-2']);
    expect(result.exitCode).toBe(0);
    expect(result.summary.failed).toBe(0);
    expect(await readdir(config.store.log_directory)).toEqual([]);
  });

  it('should respect the concurrency bound', async () => {
    const pooled = makeConfig(testDir, { dispatch: { concurrency: 2 } });
    const ids = ['a__a-1', 'b__b-1', 'c__c-1', 'd__d-1', 'e__e-1'];
    const delay = 25;
    const fetcher = new FakeFetcher(
      Object.fromEntries(ids.map(id => [id, { exitCode: 0, content: id, delayMs: delay }]))
    );

    const start = Date.now();
    const result = await orchestrator(fetcher, pooled).provision(ids);
    const elapsed = Date.now() - start;

    expect(fetcher.maxInFlight).toBe(2);
    expect(elapsed).toBeGreaterThanOrEqual(3 * delay - 5);
    expect(result.summary.successful).toBe(5);
  });

  it('should fail unresolvable ids without stopping the run', async () => {
    const fetcher = new FakeFetcher();

    const result = await orchestrator(fetcher).provision(['bad id', 'alpha__alpha-1']);

    expect(result.outcomes[0].status).toBe('failed');
    if (result.outcomes[0].status === 'failed') {
      expect(result.outcomes[0].error).toBeInstanceOf(ResolutionError);
      expect(result.outcomes[0].logPath).toBeUndefined();
    }
    expect(result.outcomes[1].status).toBe('succeeded');
    expect(result.summary).toMatchObject({ total: 2, successful: 1, failed: 1 });
    expect(result.exitCode).toBe(1);
  });

  it('should fail later ids that would share an artifact with an earlier one', async () => {
    const fetcher = new FakeFetcher();

    const result = await orchestrator(fetcher).provision(['Foo__bar-1', 'foo__bar-1']);

    expect(fetcher.requests.map(request => request.instanceId)).toEqual(['Foo__bar-1']);
    expect(result.outcomes[1]).toMatchObject({ status: 'failed', instanceId: 'foo__bar-1' });
    if (result.outcomes[1].status === 'failed') {
      expect(result.outcomes[1].error.message).toBe(
        '"foo__bar-1" would share sweb.eval.x86_64.foo_s_bar-1.sif with "Foo__bar-1"'
      );
    }
  });

  it('should pull duplicate ids once', async () => {
    const fetcher = new FakeFetcher();

    const result = await orchestrator(fetcher).provision(['alpha__alpha-1', 'alpha__alpha-1']);

    expect(fetcher.requests).toHaveLength(1);
    expect(result.summary.total).toBe(1);
  });

  it('should create the store, cache and log directories', async () => {
    await orchestrator(new FakeFetcher()).provision(['alpha__alpha-1']);

    for (const directory of [config.store.directory, config.store.cache_directory, config.store.tmp_directory, config.store.log_directory]) {
      await expect(readdir(directory)).resolves.toBeDefined();
    }
  });

  it('should reject an empty instance list', async () => {
    await expect(orchestrator(new FakeFetcher()).provision([])).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should use an injected dispatcher', async () => {
    const dispatcher = new SequentialDispatcher();
    const fetcher = new FakeFetcher();

    const result = await new ProvisioningOrchestrator(config, {
      fetcher,
      dispatcher,
      logger: createRecordingLogger()
    }).provision(['alpha__alpha-1']);

    expect(result.summary.successful).toBe(1);
    expect(result.metadata.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should abort before any pull when the store cannot be created', async () => {
    await writeFile(join(testDir, 'blocker'), 'not a directory');
    const blocked = makeConfig(testDir, { store: { directory: join(testDir, 'blocker', 'images') } });
    const fetcher = new FakeFetcher();

    await expect(orchestrator(fetcher, blocked).provision(['alpha__alpha-1'])).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetcher.requests).toHaveLength(0);
  });

  describe('provision', () => {
    it('should run the pipeline once', async () => {
      const result = await provision(config, ['alpha__alpha-1'], {
        fetcher: new FakeFetcher(),
        logger: createRecordingLogger(),
        runId: 'run-2'
      });

      expect(result.metadata.runId).toBe('run-2');
      expect(result.metadata.storeDirectory).toBe(join(testDir, 'images'));
      expect(result.exitCode).toBe(0);
    });
  });
});
