export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class NotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Config file not found: ${path}`);
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when a prompt is set up wrongly by the caller, never for bad user input.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class IOFailureError extends Error {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'IOFailureError';
  }
}

export class ConfigParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(`${source}: ${message}`);
    this.name = 'ConfigParseError';
  }
}

export class PromptClosedError extends Error {
  constructor(message = 'Input closed before an answer was given') {
    super(message);
    this.name = 'PromptClosedError';
  }
}
