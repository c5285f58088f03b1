export class TrendscribeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TrendscribeError';
  }
}

export class ConfigError extends TrendscribeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends TrendscribeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class InvalidRegionError extends TrendscribeError {
  constructor(public readonly regionCode: string) {
    super(`Invalid region code: ${regionCode}`, 'INVALID_REGION', { region: regionCode });
    this.name = 'InvalidRegionError';
  }
}

/**
 * A payload failed entity validation. `field` is the dotted path of the
 * first offending field.
 */
export class SchemaViolation extends TrendscribeError {
  constructor(
    public readonly entity: string,
    public readonly field: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(
      `${entity}.${field}: expected ${expected}, got ${actual}`,
      'SCHEMA_VIOLATION',
      { entity, field, expected, actual },
    );
    this.name = 'SchemaViolation';
  }
}

/** Missing credential or configuration; aborts a workflow run before any stage starts. */
export class StructuralError extends TrendscribeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STRUCTURAL_ERROR', details);
    this.name = 'StructuralError';
  }
}

export class CollaboratorError extends TrendscribeError {
  constructor(
    public readonly collaborator: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'COLLABORATOR_ERROR', { collaborator, ...details });
    this.name = 'CollaboratorError';
  }
}

export class DurationFormatError extends TrendscribeError {
  constructor(value: string) {
    super(`Invalid ISO-8601 duration: ${JSON.stringify(value)}`, 'DURATION_FORMAT', { value });
    this.name = 'DurationFormatError';
  }
}

export class LlmError extends TrendscribeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
