/**
 * Commented starter configuration written by `sif-provision init`.
 * The namespace is emitted as a JSON string, which YAML reads as a double-quoted scalar.
 */
export function renderStarterConfig(namespace: string, generatedAt: Date): string {
  return `# SIF provisioner configuration
# Generated on ${generatedAt.toISOString()}

registry:
  namespace: ${JSON.stringify(namespace)}
  # host: docker.io
  tag: latest
  arch: x86_64

store:
  directory: ./images
  # cache_directory: ./images/.cache
  # log_directory: /tmp
  integrity_check: size   # exists | size | header

runtime:
  extra_args: []
  # executable: /usr/bin/apptainer
  # proxy:
  #   http: \${http_proxy}
  #   https: \${https_proxy}

dispatch:
  concurrency: 1

manifest:
  file: ./instances.txt
  # instances:
  #   - django__django-11099
`;
}
