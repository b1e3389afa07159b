export class KilnError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'KilnError';
  }
}

export class ConfigurationError extends KilnError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ModelError extends KilnError {
  constructor(message: string, public modelName?: string, public status?: number) {
    super(message, 'MODEL_ERROR');
    this.name = 'ModelError';
  }
}

export class WorkspaceError extends KilnError {
  constructor(message: string) {
    super(message, 'WORKSPACE_ERROR');
    this.name = 'WorkspaceError';
  }
}

/**
 * Raised when the caller aborts a generation in flight.
 */
export class CancelledError extends KilnError {
  constructor(message: string = 'Request cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
