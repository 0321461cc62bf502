/**
 * Exit code reserved for failures of the orchestrator itself. Test failures
 * exit with the failed-module count, which the catalogue limit keeps below it.
 */
export const INFRASTRUCTURE_EXIT_CODE = 255;

/** Failure of the orchestrator itself; ends the run with INFRASTRUCTURE_EXIT_CODE. */
export class OrchestratorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OrchestratorError';
  }
}

/** Invalid configuration file or module catalogue. */
export class ConfigError extends OrchestratorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** A log artifact could not be created or written. */
export class ArtifactError extends OrchestratorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ArtifactError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
