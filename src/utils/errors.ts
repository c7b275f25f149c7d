/**
 * Router Errors
 *
 * Only configuration and data-source problems are errors. A ZIP that no tier
 * owns is a normal routing outcome and is returned as a value.
 */

/** Tier configuration is invalid; the service must not start with it */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid tier configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** ZIP reference data could not be (re)loaded */
export class DataUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
