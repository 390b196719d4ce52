import Joi from 'joi';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { ProvisionerConfig, StoreConfig } from '../types/index.js';
import { ConfigValidationResult } from './types.js';

// Store paths that default relative to other store paths are filled in after validation
interface ValidatedStoreConfig extends Omit<StoreConfig, 'cache_directory' | 'tmp_directory' | 'log_directory'> {
  cache_directory?: string;
  tmp_directory?: string;
  log_directory?: string;
}

interface ValidatedConfig extends Omit<ProvisionerConfig, 'store'> {
  store: ValidatedStoreConfig;
}

/** A proxy URL or a bare host[:port] */
const PROXY_PATTERN = /^\S+$/;

// Joi schema for RegistryConfig
const registryConfigSchema = Joi.object({
  host: Joi.string()
    .pattern(/^[A-Za-z0-9]([A-Za-z0-9.-]*[A-Za-z0-9])?(:\d{1,5})?$/)
    .optional()
    .messages({
      'string.pattern.base': 'Registry host must be a host name with an optional port (e.g., docker.io or localhost:5000)'
    }),
  namespace: Joi.string()
    .required()
    .pattern(/^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/)
    .messages({
      'any.required': 'Registry namespace is required (the repository images are pulled from)',
      'string.empty': 'Registry namespace is required (the repository images are pulled from)',
      'string.pattern.base': 'Registry namespace must be lowercase alphanumerics separated by ".", "_", "-" or "/"'
    }),
  tag: Joi.string()
    .pattern(/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/)
    .default('latest')
    .messages({
      'string.pattern.base': 'Tag must be a valid image tag (e.g., latest)'
    }),
  arch: Joi.string()
    .pattern(/^[a-z0-9_]+$/)
    .default('x86_64')
    .messages({
      'string.pattern.base': 'Architecture must contain only lowercase alphanumerics and underscores (e.g., x86_64)'
    }),
  scheme: Joi.string()
    .valid('docker', 'oras', 'library')
    .default('docker')
    .messages({
      'any.only': 'Registry scheme must be one of: docker, oras, library'
    })
});

// Joi schema for StoreConfig
const storeConfigSchema = Joi.object({
  directory: Joi.string()
    .default('./images')
    .messages({
      'string.base': 'Store directory must be a string'
    }),
  cache_directory: Joi.string().optional(),
  tmp_directory: Joi.string().optional(),
  log_directory: Joi.string().optional(),
  integrity_check: Joi.string()
    .valid('exists', 'size', 'header')
    .default('size')
    .messages({
      'any.only': 'Integrity check must be one of: exists, size, header'
    })
});

// Joi schema for RuntimeConfig
const runtimeConfigSchema = Joi.object({
  executable: Joi.string().optional(),
  extra_args: Joi.array()
    .items(Joi.string())
    .default([])
    .messages({
      'array.base': 'Extra arguments must be a list of strings'
    }),
  // Schemeless values such as `10.0.0.1:3128` are valid for curl and apptainer
  proxy: Joi.object({
    http: Joi.string().pattern(PROXY_PATTERN).optional(),
    https: Joi.string().pattern(PROXY_PATTERN).optional(),
    no_proxy: Joi.string().optional()
  })
    .optional()
    .messages({
      'string.pattern.base': 'Proxy settings must be a host[:port] or URL without spaces (e.g., http://proxy.example.com:3128)'
    })
});

// Joi schema for DispatchConfig
const dispatchConfigSchema = Joi.object({
  concurrency: Joi.number()
    .integer()
    .min(1)
    .max(256)
    .default(1)
    .messages({
      'number.base': 'Concurrency must be a number',
      'number.integer': 'Concurrency must be a whole number',
      'number.min': 'Concurrency must be at least 1',
      'number.max': 'Concurrency must be no more than 256'
    }),
  mode: Joi.string()
    .valid('pool', 'sequential')
    .default('pool')
    .messages({
      'any.only': 'Dispatch mode must be one of: pool, sequential'
    })
});

// Joi schema for ManifestConfig
const manifestConfigSchema = Joi.object({
  instances: Joi.array()
    .items(Joi.string().min(1))
    .optional()
    .messages({
      'array.base': 'Manifest instances must be a list of instance ids'
    }),
  file: Joi.string().optional()
})
  .oxor('instances', 'file')
  .messages({
    'object.oxor': 'Manifest must name either instances or a file, not both'
  });

// Main ProvisionerConfig schema
const provisionerConfigSchema = Joi.object<ValidatedConfig>({
  registry: registryConfigSchema.required().messages({
    'any.required': 'Registry section is required'
  }),
  store: storeConfigSchema.default(),
  runtime: runtimeConfigSchema.default(),
  dispatch: dispatchConfigSchema.default(),
  manifest: manifestConfigSchema.optional()
}).unknown(false);

/**
 * Validates a provisioner configuration object against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = provisionerConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates and normalizes a provisioner configuration.
 * Store and manifest paths are resolved against `baseDir` and derived defaults are filled in.
 * @throws Error if validation fails
 */
export function validateAndNormalizeConfig(config: unknown, baseDir: string = process.cwd()): ProvisionerConfig {
  const result = provisionerConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (result.error) {
    const errors = result.error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return resolvePaths(result.value, baseDir);
}

function resolvePaths(config: ValidatedConfig, baseDir: string): ProvisionerConfig {
  const directory = resolve(baseDir, config.store.directory);
  const cacheDirectory = config.store.cache_directory
    ? resolve(baseDir, config.store.cache_directory)
    : join(directory, '.cache');
  const tmpDirectory = config.store.tmp_directory
    ? resolve(baseDir, config.store.tmp_directory)
    : join(cacheDirectory, 'tmp');
  const logDirectory = config.store.log_directory
    ? resolve(baseDir, config.store.log_directory)
    : tmpdir();

  const manifest = config.manifest?.file
    ? { ...config.manifest, file: resolve(baseDir, config.manifest.file) }
    : config.manifest;

  return {
    ...config,
    manifest,
    store: {
      ...config.store,
      directory,
      cache_directory: cacheDirectory,
      tmp_directory: tmpDirectory,
      log_directory: logDirectory
    }
  };
}

/**
 * Gets the Joi schema for provisioner configuration (useful for testing)
 */
export function getConfigSchema() {
  return provisionerConfigSchema;
}
