import { ProvisionerConfig } from '../types/index.js';
import { DotenvGenerator, ShellExportGenerator } from './environment-generators.js';
import { EnvironmentVariables, TemplateGenerator } from './types.js';

/**
 * Variables that point a benchmark runner at the provisioned store
 */
export function storeEnvironment(config: ProvisionerConfig): EnvironmentVariables {
  return [
    ['RUNTIME', 'apptainer'],
    ['EVAL_CONTAINER_IMAGE_PREFIX', config.store.directory],
    ['APPTAINER_CACHEDIR', config.store.cache_directory],
    ['APPTAINER_TMPDIR', config.store.tmp_directory]
  ];
}

export class TemplateEngine {
  private generators: Map<string, TemplateGenerator> = new Map();

  constructor() {
    // Register built-in generators
    this.generators.set('shell', new ShellExportGenerator());
    this.generators.set('dotenv', new DotenvGenerator());
  }

  /**
   * Render the configuration snippet for a downstream consumer of the store
   */
  generateSnippet(config: ProvisionerConfig, format: string = 'shell'): string {
    const generator = this.generators.get(format);
    if (!generator) {
      throw new Error(`Unsupported snippet format: ${format}. Supported: ${this.getSupportedFormats().join(', ')}`);
    }
    return generator.generate(storeEnvironment(config));
  }

  registerGenerator(format: string, generator: TemplateGenerator): void {
    this.generators.set(format, generator);
  }

  getSupportedFormats(): string[] {
    return Array.from(this.generators.keys());
  }
}
