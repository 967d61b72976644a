/**
 * Error kinds raised across the humanizer
 */
export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export class ModelInvocationError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ModelInvocationError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class TurnInProgressError extends Error {
  constructor(public readonly sessionId: string) {
    super(`A turn is already running for session ${sessionId}`);
    this.name = 'TurnInProgressError';
  }
}
