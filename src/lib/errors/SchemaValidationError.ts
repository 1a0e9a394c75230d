import { AppError } from './AppError';

/**
 * Schema validation failure kinds.
 * Every kind is raised synchronously on the first violation and is never retried.
 */
export type SchemaErrorKind =
  | 'FieldCodeReserved'
  | 'FieldCodeInvalidCharacters'
  | 'FieldTypeMissing'
  | 'FieldConfigInvalid'
  | 'OptionsMissingOrMalformed'
  | 'CalcExpressionUnsupportedFunction'
  | 'CalcExpressionCrossTableReference'
  | 'CalcExpressionEmpty'
  | 'LinkProtocolInvalid'
  | 'ReferenceTableMisconfigured'
  | 'LookupMisconfigured'
  | 'NumericBoundsInvalid'
  | 'LayoutStructuralViolation'
  | 'LayoutNodeMissingRequiredCode'
  | 'LayoutPositionInvalid';

export interface SchemaErrorOptions {
  /** Corrected value or rewrite the caller can apply as-is. */
  readonly suggestion?: string;
  /** Location of the offending node, e.g. `layout[2].fields[0]` or `options.high`. */
  readonly path?: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/** `CalcExpressionEmpty` -> `SCHEMA_CALC_EXPRESSION_EMPTY` */
export function toSchemaErrorCode(kind: SchemaErrorKind): string {
  return `SCHEMA_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`;
}

export class SchemaValidationError extends AppError {
  public readonly kind: SchemaErrorKind;
  public readonly suggestion?: string;
  public readonly path?: string;
  public readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    kind: SchemaErrorKind,
    message: string,
    options: SchemaErrorOptions = {},
  ) {
    super(message, toSchemaErrorCode(kind));
    this.name = `${kind}Error`;
    this.kind = kind;
    this.suggestion = options.suggestion;
    this.path = options.path;
    this.details = options.details
      ? Object.freeze({ ...options.details })
      : undefined;
  }

  public override toJSON(): {
    name: string;
    code: string;
    message: string;
    kind: SchemaErrorKind;
    suggestion?: string;
    path?: string;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      kind: this.kind,
      ...(this.suggestion !== undefined ? { suggestion: this.suggestion } : {}),
      ...(this.path !== undefined ? { path: this.path } : {}),
    };
  }
}

/* =========================
 *     Field definitions
 * ========================= */

export class FieldCodeReservedError extends SchemaValidationError {
  constructor(
    readonly fieldCode: string,
    message: string,
    options?: SchemaErrorOptions,
  ) {
    super('FieldCodeReserved', message, options);
  }
}

export class FieldCodeInvalidCharactersError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('FieldCodeInvalidCharacters', message, options);
  }
}

export class FieldTypeMissingError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('FieldTypeMissing', message, options);
  }
}

export class FieldConfigInvalidError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('FieldConfigInvalid', message, options);
  }
}

export class OptionsMissingOrMalformedError extends SchemaValidationError {
  constructor(
    readonly optionKey: string | null,
    message: string,
    options?: SchemaErrorOptions,
  ) {
    super('OptionsMissingOrMalformed', message, options);
  }
}

export class CalcExpressionUnsupportedFunctionError extends SchemaValidationError {
  constructor(
    readonly functionName: string,
    message: string,
    options?: SchemaErrorOptions,
  ) {
    super('CalcExpressionUnsupportedFunction', message, options);
  }
}

export class CalcExpressionCrossTableReferenceError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('CalcExpressionCrossTableReference', message, options);
  }
}

export class CalcExpressionEmptyError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('CalcExpressionEmpty', message, options);
  }
}

export class LinkProtocolInvalidError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('LinkProtocolInvalid', message, options);
  }
}

export class ReferenceTableMisconfiguredError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('ReferenceTableMisconfigured', message, options);
  }
}

export class LookupMisconfiguredError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('LookupMisconfigured', message, options);
  }
}

export class NumericBoundsInvalidError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('NumericBoundsInvalid', message, options);
  }
}

/* =========================
 *        Layout trees
 * ========================= */

export class LayoutStructuralViolationError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('LayoutStructuralViolation', message, options);
  }
}

export class LayoutNodeMissingRequiredCodeError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('LayoutNodeMissingRequiredCode', message, options);
  }
}

export class LayoutPositionInvalidError extends SchemaValidationError {
  constructor(message: string, options?: SchemaErrorOptions) {
    super('LayoutPositionInvalid', message, options);
  }
}
