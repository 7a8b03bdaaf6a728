/**
 * Error raised before a projection runs when parameters fail validation.
 * Mid-run depletion is not an error; the engine reports it as an outcome.
 */

export interface ValidationError {
  code: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(
      errors.length > 0
        ? errors.map((e) => e.message).join("; ")
        : "Invalid strategy parameters"
    );
    this.name = "ConfigurationError";
    this.errors = errors;
  }
}
