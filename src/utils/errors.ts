/**
 * Pipeline error classes
 *
 * Three kinds of failure, each handled differently:
 * - ConfigurationError: fail-fast at startup (bad taxonomy, missing credentials)
 * - ValidationError: one record is rejected, the batch continues
 * - StateLoadError: the persisted state could not be read, the run aborts
 */

/**
 * Base class of the pipeline's own errors
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/**
 * A single posting failed validation
 */
export class ValidationError extends PipelineError {
  /** External id of the rejected record, when it had one */
  public readonly externalId: string | null;
  /** Offending field */
  public readonly field: string;

  constructor(field: string, message: string, externalId: string | null) {
    super(
      `Invalid posting${externalId ? ` ${externalId}` : ""}: ${field} ${message}`,
    );
    this.name = "ValidationError";
    this.field = field;
    this.externalId = externalId;
  }
}

/**
 * Invalid or missing configuration (taxonomy, credentials, env)
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Configuration error: ${message}`, options);
    this.name = "ConfigurationError";
  }
}

/**
 * The set of already-seen posting ids could not be loaded
 */
export class StateLoadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`State load failed: ${message}`, options);
    this.name = "StateLoadError";
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
