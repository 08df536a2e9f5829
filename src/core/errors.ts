/**
 * Raised for problems with the run's configuration: a missing root, an
 * unknown preset, a malformed size or an unsupported encoding. Nothing is
 * written when one of these is thrown.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidSizeError extends ConfigurationError {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid size value: '${input}'`);
    this.name = 'InvalidSizeError';
    this.input = input;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
