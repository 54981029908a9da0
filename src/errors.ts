/**
 * Raised when a filter unit cannot be rendered into a filter expression
 */
export class FilterFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterFormatError';
  }
}

/**
 * Raised when Makefile.config.json does not match the expected shape
 */
export class ConfigFormatError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigFormatError';
    this.issues = issues;
  }
}

/**
 * Raised when overlay settings in the environment are not usable
 */
export class EnvFormatError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment variables: ${issues.join('; ')}`);
    this.name = 'EnvFormatError';
    this.issues = issues;
  }
}

/**
 * Human-readable type name for error messages
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
