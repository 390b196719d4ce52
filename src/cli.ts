#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { readdir, unlink } from 'fs/promises';
import { join, resolve } from 'path';
import { ConfigOverrides, createConfigLoader, loadDefaultConfig } from './config/loader.js';
import { parseInstanceList, resolveManifest } from './config/manifest.js';
import { ArtifactNamingService } from './config/naming.js';
import { ProvisioningOrchestrator } from './orchestration/index.js';
import { ApptainerFetcher } from './provisioning/apptainer-fetcher.js';
import { isFailureLogName } from './provisioning/artifact-worker.js';
import { StoreAggregator } from './reporting/aggregator.js';
import { ConsoleLogger } from './reporting/logger.js';
import { TemplateEngine, renderStarterConfig, renderSummaryReport } from './templates/index.js';
import { ProvisionerConfig, ProvisioningError, ResolutionError } from './types/index.js';

interface ConfigOptions {
  config?: string;
  namespace?: string;
  host?: string;
  tag?: string;
  store?: string;
  cache?: string;
  logDir?: string;
  instances?: string[];
  manifest?: string;
  verbose?: boolean;
}

interface PullOptions extends ConfigOptions {
  concurrency?: number;
  sequential?: boolean;
  executable?: string;
  format: string;
}

interface InitOptions {
  namespace: string;
  output: string;
  force?: boolean;
}

const packageJson: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseInstances(value: string): string[] {
  return parseInstanceList(value);
}

function withConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to configuration file (default: ./sif-provision.yml if present)')
    .option('--namespace <namespace>', 'Registry namespace to pull images from')
    .option('--host <host>', 'Registry host (e.g., docker.io)')
    .option('--tag <tag>', 'Image tag')
    .option('--store <dir>', 'Directory the .sif archives are written to')
    .option('--cache <dir>', 'Cache directory for the container runtime')
    .option('--log-dir <dir>', 'Directory for per-instance failure logs')
    .option('-i, --instances <ids>', 'Comma separated instance ids', parseInstances)
    .option('-m, --manifest <path>', 'File listing one instance id per line')
    .option('-v, --verbose', 'Enable verbose error output');
}

function toOverrides(options: ConfigOptions): ConfigOverrides {
  const absolute = (path?: string) => (path === undefined ? undefined : resolve(path));
  return {
    namespace: options.namespace,
    host: options.host,
    tag: options.tag,
    storeDirectory: absolute(options.store),
    cacheDirectory: absolute(options.cache),
    logDirectory: absolute(options.logDir),
    instances: options.instances,
    manifestFile: absolute(options.manifest)
  };
}

/**
 * The one place configuration is assembled: file, command line and process environment
 */
async function loadConfig(options: ConfigOptions, extra: ConfigOverrides = {}): Promise<ProvisionerConfig> {
  const overrides = { ...toOverrides(options), ...extra };

  if (options.config) {
    return createConfigLoader(process.env).load(resolve(options.config), overrides);
  }
  return loadDefaultConfig(overrides, process.env);
}

function reportError(spinner: Ora, title: string, error: unknown, verbose?: boolean): void {
  spinner.fail(title);
  if (error instanceof ProvisioningError) {
    console.error(chalk.red(`❌ ${error.code}: ${error.message}`));
    if (error.remediation) {
      console.error(chalk.yellow(`  💡 ${error.remediation}`));
    }
  } else {
    console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  }
  if (verbose) {
    console.error(error);
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('sif-provision')
  .description('Provision benchmark container images as local SIF archives')
  .version(version);

withConfigOptions(
  program
    .command('pull')
    .description('Pull and convert every instance in the manifest, skipping ones already in the store')
)
  .option('-j, --concurrency <n>', 'Number of pulls to run at once', parsePositiveInt)
  .option('--sequential', 'Run pulls strictly one at a time')
  .option('--executable <path>', 'apptainer or singularity binary to use')
  .option('-f, --format <format>', 'Format of the environment snippet (shell|dotenv)', 'shell')
  .action(async (options: PullOptions) => {
    const spinner = ora('Loading configuration...').start();

    let config: ProvisionerConfig;
    let instanceIds: string[];
    try {
      config = await loadConfig(options, {
        concurrency: options.concurrency,
        mode: options.sequential ? 'sequential' : undefined,
        executable: options.executable
      });
      instanceIds = await resolveManifest(config);
      spinner.succeed(`Loaded ${instanceIds.length} instance(s) from the manifest`);
    } catch (error) {
      reportError(spinner, 'Configuration failed', error, options.verbose);
      return;
    }

    try {
      const orchestrator = new ProvisioningOrchestrator(config, {
        fetcher: new ApptainerFetcher(config, process.env),
        logger: new ConsoleLogger()
      });
      const result = await orchestrator.provision(instanceIds);

      console.log('');
      const headline = `Provisioned ${result.summary.successful}/${result.summary.total} instance(s)`;
      console.log(result.summary.failed === 0 ? chalk.green(`✅ ${headline}`) : chalk.yellow(`⚠️  ${headline}`));
      for (const line of renderSummaryReport(result.summary, config.store.directory, result.outcomes)) {
        console.log(line);
      }

      console.log(chalk.blue('\n📋 Configuration for the benchmark runner:'));
      console.log(new TemplateEngine().generateSnippet(config, options.format));

      console.log(chalk.gray(`\n⏱️  Run took ${result.metadata.duration}ms`));
      console.log(chalk.gray(`🆔 Run ID: ${result.metadata.runId}`));
      process.exitCode = result.exitCode;
    } catch (error) {
      reportError(ora(), 'Provisioning failed', error, options.verbose);
    }
  });

withConfigOptions(
  program
    .command('status')
    .description('Summarize which instances already have an artifact in the store')
).action(async (options: ConfigOptions) => {
  const spinner = ora('Scanning store...').start();

  try {
    const config = await loadConfig(options);
    const instanceIds = await resolveManifest(config);
    const summary = await new StoreAggregator(config).summarize(instanceIds);
    spinner.succeed(`Store scanned: ${config.store.directory}`);

    for (const line of renderSummaryReport(summary, config.store.directory)) {
      console.log(line);
    }
  } catch (error) {
    reportError(spinner, 'Status check failed', error, options.verbose);
  }
});

withConfigOptions(
  program
    .command('resolve')
    .description('Show the registry reference and local path for each instance without pulling')
).action(async (options: ConfigOptions) => {
  try {
    const config = await loadConfig(options);
    const instanceIds = await resolveManifest(config);
    const naming = new ArtifactNamingService();

    for (const instanceId of instanceIds) {
      try {
        const item = naming.resolve(instanceId, config);
        console.log(`${chalk.cyan(instanceId)}`);
        console.log(`  reference: ${naming.toPullUri(item.reference)}`);
        console.log(`  artifact:  ${item.localPath}`);
      } catch (error) {
        if (!(error instanceof ResolutionError)) {
          throw error;
        }
        console.log(`${chalk.red(instanceId)}: ${error.message}`);
        process.exitCode = 1;
      }
    }
  } catch (error) {
    reportError(ora(), 'Resolution failed', error, options.verbose);
  }
});

program
  .command('clean-logs')
  .description('Delete retained failure logs')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--namespace <namespace>', 'Registry namespace (needed when no configuration file exists)')
  .option('--log-dir <dir>', 'Directory holding the failure logs')
  .action(async (options: ConfigOptions) => {
    const spinner = ora('Removing failure logs...').start();

    try {
      const config = await loadConfig(options);
      const logDirectory = config.store.log_directory;
      const logs = (await readdir(logDirectory)).filter(isFailureLogName);
      for (const log of logs) {
        await unlink(join(logDirectory, log));
      }
      spinner.succeed(`Removed ${logs.length} failure log(s) from ${logDirectory}`);
    } catch (error) {
      reportError(spinner, 'Cleanup failed', error, options.verbose);
    }
  });

program
  .command('init')
  .description('Initialize a new provisioning configuration')
  .option('-n, --namespace <namespace>', 'Registry namespace to pull images from', 'my-registry-namespace')
  .option('-o, --output <path>', 'Output configuration file path', 'sif-provision.yml')
  .option('--force', 'Overwrite an existing file')
  .action((options: InitOptions) => {
    const spinner = ora('Initializing provisioning configuration...').start();

    if (existsSync(options.output) && !options.force) {
      spinner.fail(`${options.output} already exists (use --force to overwrite)`);
      process.exitCode = 1;
      return;
    }

    const yamlContent = renderStarterConfig(options.namespace, new Date());

    try {
      writeFileSync(options.output, yamlContent);
    } catch (error) {
      reportError(spinner, 'Initialization failed', error);
      return;
    }

    spinner.succeed(`Configuration file created: ${options.output}`);
    console.log(chalk.green('\n✅ Next steps:'));
    console.log('1. Set the registry namespace and list instance ids in instances.txt');
    console.log('2. Make sure apptainer or singularity is on PATH');
    console.log(`3. Run: ${chalk.cyan('sif-provision pull')}`);
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exitCode = 1;
});

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync();
}
