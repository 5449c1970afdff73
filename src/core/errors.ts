/**
 * Raised when the caller's input cannot be analyzed as given,
 * e.g. no main modules remain after exclusions
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
