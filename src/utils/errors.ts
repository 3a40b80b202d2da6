export type TraceErrorCode = 'CONFIGURATION' | 'MISSING_COLUMN' | 'DATA_COERCION';

export class TraceError extends Error {
  public readonly code: TraceErrorCode;

  constructor(message: string, code: TraceErrorCode) {
    super(message);
    this.name = 'TraceError';
    this.code = code;
    Object.setPrototypeOf(this, TraceError.prototype);
  }
}

/**
 * Invalid or missing construction parameters (no identifiers, bad dates,
 * unknown time zone). Fatal to the invocation.
 */
export class ConfigurationError extends TraceError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class MissingColumnError extends TraceError {
  public readonly columns: string[];

  constructor(columns: string[], context: string) {
    super(`${context}: missing required column(s) ${columns.join(', ')}`, 'MISSING_COLUMN');
    this.name = 'MissingColumnError';
    this.columns = columns;
    Object.setPrototypeOf(this, MissingColumnError.prototype);
  }
}

/**
 * A single row value could not be coerced. Callers catch this per row and
 * record it as a dropped row.
 */
export class DataCoercionError extends TraceError {
  public readonly field: string;

  public readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`Cannot coerce ${field} value ${JSON.stringify(value) ?? String(value)}`, 'DATA_COERCION');
    this.name = 'DataCoercionError';
    this.field = field;
    this.value = value;
    Object.setPrototypeOf(this, DataCoercionError.prototype);
  }
}

export function requireColumns(record: object, columns: readonly string[], context: string): void {
  const missing = columns.filter((column) => !(column in record));
  if (missing.length > 0) {
    throw new MissingColumnError(missing, context);
  }
}
