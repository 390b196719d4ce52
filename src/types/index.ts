// Core type definitions for the SIF provisioner

export type RegistryScheme = 'docker' | 'oras' | 'library';

export type IntegrityCheck = 'exists' | 'size' | 'header';

export type DispatchMode = 'pool' | 'sequential';

export interface RegistryConfig {
  host?: string;
  namespace: string;
  tag: string;
  arch: string;
  scheme: RegistryScheme;
}

export interface StoreConfig {
  directory: string;
  cache_directory: string;
  tmp_directory: string;
  log_directory: string;
  integrity_check: IntegrityCheck;
}

export interface ProxyConfig {
  http?: string;
  https?: string;
  no_proxy?: string;
}

export interface RuntimeConfig {
  executable?: string;
  extra_args: string[];
  proxy?: ProxyConfig;
}

export interface DispatchConfig {
  concurrency: number;
  mode: DispatchMode;
}

export interface ManifestConfig {
  instances?: string[];
  file?: string;
}

export interface ProvisionerConfig {
  registry: RegistryConfig;
  store: StoreConfig;
  runtime: RuntimeConfig;
  dispatch: DispatchConfig;
  manifest?: ManifestConfig;
}

export interface ArtifactReference {
  host?: string;
  namespace: string;
  repository: string;
  tag: string;
  scheme: RegistryScheme;
}

export interface WorkItem {
  instanceId: string;
  reference: ArtifactReference;
  fileName: string;
  localPath: string;
}

export type Outcome =
  | { status: 'skipped'; instanceId: string }
  | { status: 'succeeded'; instanceId: string; localPath: string }
  | { status: 'failed'; instanceId: string; logPath?: string; error: Error };

export interface ArtifactFile {
  fileName: string;
  path: string;
  size: number;
}

export interface Summary {
  total: number;
  successful: number;
  failed: number;
  artifacts: ArtifactFile[];
}

export interface ProvisioningMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
  storeDirectory: string;
}

export interface ProvisioningRunResult {
  outcomes: Outcome[];
  summary: Summary;
  exitCode: number;
  metadata: ProvisioningMetadata;
}

export * from './errors.js';
