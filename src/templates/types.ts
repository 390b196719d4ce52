// Template-specific types

/** Ordered variable assignments a downstream runner should set */
export type EnvironmentVariables = ReadonlyArray<readonly [name: string, value: string]>;

export interface TemplateGenerator {
  generate(variables: EnvironmentVariables): string;
}
