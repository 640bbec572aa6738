/** Error thrown when retrieval options are malformed (bad sizes, ranges, top-k...). */
export class InvalidConfigurationError extends Error {
  /** Name of the offending option. */
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`);
    this.name = "InvalidConfigurationError";
    this.field = field;
  }
}

/** Error thrown when attempting to transform before the vectorizer was fitted. */
export class VectorizerNotFittedError extends Error {
  constructor() {
    super("Vectorizer not fitted. Call fit() first.");
    this.name = "VectorizerNotFittedError";
  }
}
