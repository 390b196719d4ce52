// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { dirname, resolve } from 'path';
import { ConfigurationError, ProvisionerConfig, errorMessage } from '../types/index.js';
import { ConfigLoader, ConfigValidationResult } from './types.js';
import { validateAndNormalizeConfig, validateConfig } from './validator.js';

type PlainObject = Record<string, unknown>;

/**
 * Values given on the command line. They win over the configuration file.
 * Paths are taken as given; the CLI resolves them against the working directory.
 */
export interface ConfigOverrides {
  namespace?: string;
  host?: string;
  tag?: string;
  storeDirectory?: string;
  cacheDirectory?: string;
  logDirectory?: string;
  concurrency?: number;
  mode?: 'pool' | 'sequential';
  executable?: string;
  instances?: string[];
  manifestFile?: string;
}

export const DEFAULT_CONFIG_PATHS = [
  './sif-provision.yml',
  './sif-provision.yaml',
  './sif-provision.json'
];

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class ProvisionerConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   * @param overrides - Command line values applied on top of the file
   */
  async load(path: string, overrides: ConfigOverrides = {}): Promise<ProvisionerConfig> {
    if (!existsSync(path)) {
      throw new ConfigurationError(
        `Configuration file not found: ${path}`,
        'Run "sif-provision init" to create one, or pass --namespace and --instances'
      );
    }

    let rawConfig: unknown;
    try {
      const content = await readFile(path, 'utf-8');

      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration from ${path}: ${errorMessage(error)}`);
    }

    return this.fromObject(rawConfig ?? {}, overrides, dirname(resolve(path)), path);
  }

  /**
   * Build a configuration from an already parsed object
   * @param baseDir - Directory relative store and manifest paths are resolved against
   */
  fromObject(
    rawConfig: unknown,
    overrides: ConfigOverrides = {},
    baseDir: string = process.cwd(),
    source: string = 'command line'
  ): ProvisionerConfig {
    if (!isPlainObject(rawConfig)) {
      throw new ConfigurationError(`Configuration from ${source} must be a mapping of sections`);
    }

    const withEnvVars = this.resolveEnvironmentVariables(rawConfig);
    const withOverrides = this.applyOverrides(isPlainObject(withEnvVars) ? withEnvVars : {}, overrides);
    const withRuntimeEnv = this.applyRuntimeEnvironment(withOverrides);

    try {
      return validateAndNormalizeConfig(withRuntimeEnv, baseDir);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid configuration from ${source}: ${errorMessage(error)}`,
        'Fix the listed fields in the configuration file or on the command line'
      );
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load configuration from the first existing path
   * @returns undefined when none of the paths exist
   */
  async loadFromPaths(searchPaths: readonly string[], overrides: ConfigOverrides = {}): Promise<ProvisionerConfig | undefined> {
    for (const path of searchPaths) {
      if (existsSync(path)) {
        return this.load(path, overrides);
      }
    }
    return undefined;
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(obj: unknown): unknown {
    if (typeof obj === 'string') {
      return this.substituteEnvironmentVariables(obj);
    }

    if (Array.isArray(obj)) {
      return obj.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(obj)) {
      const result: PlainObject = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = this.resolveEnvironmentVariables(value);
      }
      return result;
    }

    return obj;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset with no default: keep the placeholder so validation reports it
      return match;
    });
  }

  private applyOverrides(config: PlainObject, overrides: ConfigOverrides): PlainObject {
    const patch: PlainObject = {
      registry: compact({ namespace: overrides.namespace, host: overrides.host, tag: overrides.tag }),
      store: compact({
        directory: overrides.storeDirectory,
        cache_directory: overrides.cacheDirectory,
        log_directory: overrides.logDirectory
      }),
      dispatch: compact({ concurrency: overrides.concurrency, mode: overrides.mode }),
      runtime: compact({ executable: overrides.executable })
    };

    const merged = this.deepMerge(config, patch);

    // A manifest given on the command line replaces the one in the file
    if (overrides.instances !== undefined) {
      merged.manifest = { instances: overrides.instances };
    } else if (overrides.manifestFile !== undefined) {
      merged.manifest = { file: overrides.manifestFile };
    }

    return this.pruneEmptySections(merged);
  }

  /**
   * Fill the runtime executable and proxy settings from the environment
   * when the configuration leaves them unset
   */
  private applyRuntimeEnvironment(config: PlainObject): PlainObject {
    const proxy = compact({
      http: this.env.http_proxy ?? this.env.HTTP_PROXY,
      https: this.env.https_proxy ?? this.env.HTTPS_PROXY,
      no_proxy: this.env.no_proxy ?? this.env.NO_PROXY
    });

    const fromEnv: PlainObject = compact({
      executable: this.env.APPTAINER_EXECUTABLE,
      proxy: Object.keys(proxy).length > 0 ? proxy : undefined
    });

    const runtime = isPlainObject(config.runtime) ? config.runtime : {};
    const merged = this.deepMerge(fromEnv, runtime);
    return Object.keys(merged).length > 0 ? { ...config, runtime: merged } : config;
  }

  private pruneEmptySections(config: PlainObject): PlainObject {
    const result: PlainObject = {};
    for (const [key, value] of Object.entries(config)) {
      if (isPlainObject(value) && Object.keys(value).length === 0) {
        continue;
      }
      result[key] = value;
    }
    return result;
  }

  /**
   * Deep merge two objects, with the second object taking precedence
   */
  private deepMerge(target: PlainObject, source: PlainObject): PlainObject {
    const result: PlainObject = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isPlainObject(value)) {
        result[key] = this.deepMerge(isPlainObject(existing) ? existing : {}, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

function compact(values: PlainObject): PlainObject {
  const result: PlainObject = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(env: NodeJS.ProcessEnv = process.env): ProvisionerConfigLoader {
  return new ProvisionerConfigLoader(env);
}

/**
 * Load configuration from standard locations, falling back to command line values alone
 */
export async function loadDefaultConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  paths: readonly string[] = DEFAULT_CONFIG_PATHS
): Promise<ProvisionerConfig> {
  const loader = createConfigLoader(env);
  const config = await loader.loadFromPaths(paths, overrides);
  return config ?? loader.fromObject({}, overrides);
}
