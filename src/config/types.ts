// Configuration-specific types
import type { ProvisionerConfig } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<ProvisionerConfig>;
  validate(config: unknown): ConfigValidationResult;
}
