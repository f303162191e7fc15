/**
 * Error types for the jurisdiction registry
 *
 * Construction errors are fatal to startup. Lookup and date errors are
 * left to the caller, which may skip the jurisdiction in a batch run.
 */

export class JurisdictionConfigError extends Error {
  /** Jurisdiction name (or catalog file) the error is about */
  readonly jurisdiction: string;
  /** Whether startup must abort */
  readonly fatal: boolean;

  constructor(message: string, jurisdiction: string, fatal: boolean) {
    super(message);
    this.name = 'JurisdictionConfigError';
    this.jurisdiction = jurisdiction;
    this.fatal = fatal;
  }
}

export class InvalidRecordError extends JurisdictionConfigError {
  readonly reason: string;

  constructor(jurisdiction: string, reason: string) {
    super(`Invalid record for ${jurisdiction}: ${reason}`, jurisdiction, true);
    this.name = 'InvalidRecordError';
    this.reason = reason;
  }
}

export class DuplicateJurisdictionError extends JurisdictionConfigError {
  constructor(jurisdiction: string) {
    super(`Jurisdiction already registered: ${jurisdiction}`, jurisdiction, true);
    this.name = 'DuplicateJurisdictionError';
  }
}

export class UnknownJurisdictionError extends JurisdictionConfigError {
  /** Registered names that look like the requested one */
  readonly suggestions: string[];

  constructor(jurisdiction: string, suggestions: string[] = []) {
    super(`Unknown jurisdiction: ${jurisdiction}`, jurisdiction, false);
    this.name = 'UnknownJurisdictionError';
    this.suggestions = suggestions;
  }
}

export class PortalDateError extends JurisdictionConfigError {
  readonly text: string;

  constructor(jurisdiction: string, text: string, format: string) {
    super(`Cannot parse portal date "${text}" for ${jurisdiction} (expected ${format})`, jurisdiction, false);
    this.name = 'PortalDateError';
    this.text = text;
  }
}

/**
 * Determine if an error should abort startup
 *
 * @param error - Anything caught
 * @returns true for fatal registry errors and for errors from outside the registry
 */
export function isFatal(error: unknown): boolean {
  if (error instanceof JurisdictionConfigError) return error.fatal;
  return true;
}
