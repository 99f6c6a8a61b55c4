/**
 * Caller mistake: bad options, wrong call order, unknown names. Thrown
 * synchronously and never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A rule or strategy produced something outside the game's domain. Always a bug.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
