/**
 * Error taxonomy for the engine and driver.
 *
 * Exhausted knowledge is not an error: the move selectors return null.
 */

/** A caller broke the contract of a call. Nothing was mutated. */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** The knowledge base contradicted itself. Indicates an inference bug or a lying oracle. */
export class ConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConsistencyError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
