import { EnvironmentVariables, TemplateGenerator } from './types.js';

const SAFE_VALUE = /^[A-Za-z0-9_./:@%+=,-]+$/;

export function quoteShell(value: string): string {
  if (SAFE_VALUE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function quoteDotenv(value: string): string {
  if (SAFE_VALUE.test(value)) {
    return value;
  }
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * `export NAME=value` lines, for pasting into a shell or a job script
 */
export class ShellExportGenerator implements TemplateGenerator {
  generate(variables: EnvironmentVariables): string {
    return variables.map(([name, value]) => `export ${name}=${quoteShell(value)}`).join('\n');
  }
}

/**
 * `NAME=value` lines for .env files
 */
export class DotenvGenerator implements TemplateGenerator {
  generate(variables: EnvironmentVariables): string {
    return variables.map(([name, value]) => `${name}=${quoteDotenv(value)}`).join('\n');
  }
}
