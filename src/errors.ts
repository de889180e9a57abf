/**
 * Invalid or unusable plugin configuration. Raised before the polling loop starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A GPIO line could not be exported or configured.
 */
export class HardwareAcquisitionError extends Error {
  public readonly pin: number;

  constructor(message: string, pin: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HardwareAcquisitionError';
    this.pin = pin;
  }
}

/**
 * Writing a camera's privacy state to disk failed. The running process keeps its in-memory
 * state; only the record on disk is stale.
 */
export class PersistenceError extends Error {
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
