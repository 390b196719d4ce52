import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { getConfigSchema, validateAndNormalizeConfig, validateConfig } from '../validator.js';

describe('Configuration Validator', () => {
  describe('validateConfig', () => {
    it('should accept a minimal configuration', () => {
      const result = validateConfig({ registry: { namespace: 'team' } });

      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it('should accept a complete configuration', () => {
      const result = validateConfig({
        registry: { host: 'docker.io', namespace: 'team/sub', tag: 'latest', arch: 'x86_64', scheme: 'docker' },
        store: {
          directory: './images',
          cache_directory: './cache',
          tmp_directory: './cache/tmp',
          log_directory: './logs',
          integrity_check: 'header'
        },
        runtime: {
          executable: '/usr/bin/apptainer',
          extra_args: ['--disable-cache'],
          proxy: { http: 'http://proxy.example.com:3128', https: 'http://proxy.example.com:3128', no_proxy: 'localhost' }
        },
        dispatch: { concurrency: 4, mode: 'pool' },
        manifest: { instances: ['django__django-11099'] }
      });

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('should require a registry namespace', () => {
      const result = validateConfig({ registry: {} });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('Registry namespace is required (the repository images are pulled from)');
    });

    it('should require the registry section', () => {
      const result = validateConfig({});

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('Registry section is required');
    });

    it('should reject upper-case namespaces', () => {
      const result = validateConfig({ registry: { namespace: 'Team' } });

      expect(result.errors).toContain(
        'Registry namespace must be lowercase alphanumerics separated by ".", "_", "-" or "/"'
      );
    });

    it('should reject a concurrency below one', () => {
      const result = validateConfig({ registry: { namespace: 'team' }, dispatch: { concurrency: 0 } });

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('Concurrency must be at least 1');
    });

    it('should reject a fractional concurrency', () => {
      const result = validateConfig({ registry: { namespace: 'team' }, dispatch: { concurrency: 1.5 } });

      expect(result.errors).toContain('Concurrency must be a whole number');
    });

    it('should reject unknown integrity checks', () => {
      const result = validateConfig({ registry: { namespace: 'team' }, store: { integrity_check: 'sha256' } });

      expect(result.errors).toContain('Integrity check must be one of: exists, size, header');
    });

    it('should reject a manifest naming both instances and a file', () => {
      const result = validateConfig({
        registry: { namespace: 'team' },
        manifest: { instances: ['a'], file: './instances.txt' }
      });

      expect(result.errors).toContain('Manifest must name either instances or a file, not both');
    });

    it('should accept proxies given as a bare host and port', () => {
      const result = validateConfig({
        registry: { namespace: 'team' },
        runtime: { proxy: { http: '10.0.0.1:3128', https: 'proxy.internal:8443' } }
      });

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('should reject proxies containing spaces', () => {
      const result = validateConfig({ registry: { namespace: 'team' }, runtime: { proxy: { http: 'proxy host:3128' } } });

      expect(result.errors).toEqual([
        'Proxy settings must be a host[:port] or URL without spaces (e.g., http://proxy.example.com:3128)'
      ]);
    });

    it('should collect every error', () => {
      const result = validateConfig({
        registry: { namespace: 'team', scheme: 'ftp' },
        dispatch: { mode: 'parallel' }
      });

      expect(result.errors).toEqual([
        'Registry scheme must be one of: docker, oras, library',
        'Dispatch mode must be one of: pool, sequential'
      ]);
    });

    it('should reject unknown sections', () => {
      const result = validateConfig({ registry: { namespace: 'team' }, aws: { region: 'us-east-1' } });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['"aws" is not allowed']);
    });
  });

  describe('validateAndNormalizeConfig', () => {
    it('should apply defaults', () => {
      const config = validateAndNormalizeConfig({ registry: { namespace: 'team' } }, '/work');

      expect(config.registry).toEqual({ namespace: 'team', tag: 'latest', arch: 'x86_64', scheme: 'docker' });
      expect(config.dispatch).toEqual({ concurrency: 1, mode: 'pool' });
      expect(config.runtime).toEqual({ extra_args: [] });
      expect(config.store).toEqual({
        directory: '/work/images',
        cache_directory: '/work/images/.cache',
        tmp_directory: '/work/images/.cache/tmp',
        log_directory: tmpdir(),
        integrity_check: 'size'
      });
    });

    it('should resolve relative paths against the base directory', () => {
      const config = validateAndNormalizeConfig(
        {
          registry: { namespace: 'team' },
          store: { directory: 'out', cache_directory: 'cache', log_directory: '/var/log/pulls' },
          manifest: { file: 'lists/lite.txt' }
        },
        '/work'
      );

      expect(config.store.directory).toBe('/work/out');
      expect(config.store.cache_directory).toBe('/work/cache');
      expect(config.store.tmp_directory).toBe(join('/work/cache', 'tmp'));
      expect(config.store.log_directory).toBe('/var/log/pulls');
      expect(config.manifest).toEqual({ file: '/work/lists/lite.txt' });
    });

    it('should throw with all validation messages', () => {
      expect(() => validateAndNormalizeConfig({ registry: {}, dispatch: { concurrency: 0 } })).toThrow(
        'Configuration validation failed:\nRegistry namespace is required (the repository images are pulled from)\nConcurrency must be at least 1'
      );
    });
  });

  describe('getConfigSchema', () => {
    it('should expose the Joi schema', () => {
      expect(getConfigSchema().describe().type).toBe('object');
    });
  });
});
