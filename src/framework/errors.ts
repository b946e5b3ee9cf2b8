/**
 * Error classes
 *
 * Configuration errors are global and fatal at setup time.
 * Input errors reject a whole input document or a single element.
 * Non-convergence is never an error (see solver diagnostics).
 */

export class ConfigurationError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`[${source}] Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigurationError';
    this.source = source;
    this.issues = issues;
  }
}

export class InputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message);
    this.name = 'InputError';
    this.issues = issues;
  }
}
