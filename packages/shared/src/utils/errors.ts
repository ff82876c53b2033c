export class SearchwiseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SearchwiseError';
  }
}

export class SchemaValidationError extends SearchwiseError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends SearchwiseError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class PersistenceError extends SearchwiseError {
  constructor(message: string, code = 'PERSISTENCE_ERROR', cause?: Error) {
    super(message, code, cause);
    this.name = 'PersistenceError';
  }
}
