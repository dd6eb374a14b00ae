export type ValidationErrorCode =
  | "EmptyInput"
  | "EmptyItem"
  | "LengthExceeded"
  | "InvalidCharacters"
  | "InvalidNumber"
  | "BelowMinimum"
  | "PastDate"
  | "InvalidDate"
  | "InvalidPlacement"
  | "InvalidPercentageFormat"
  | "PercentageOutOfRange"
  | "TemplateLengthExceeded"
  | "MissingTemplatePlaceholder"
  | "InvalidTemplateCharacters";

export type FatalErrorCode = "UnsupportedExportFormat" | "MalformedOverrideFile";

export type ErrorCode = ValidationErrorCode | FatalErrorCode;

export type ValidationFailure = {
  ok: false;
  code: ValidationErrorCode;
  message: string;
};

export type ValidationResult = { ok: true } | ValidationFailure;

export const VALID: ValidationResult = { ok: true };

export function fail(code: ValidationErrorCode, message: string): ValidationFailure {
  return { ok: false, code, message };
}

const FATAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "UnsupportedExportFormat",
  "MalformedOverrideFile",
]);

export function isFatalErrorCode(code: ErrorCode): code is FatalErrorCode {
  return FATAL_CODES.has(code);
}

/**
 * Hard failure the caller cannot fix by re-entering a value, e.g. an override file
 * without its required columns. Rule violations are returned as `ValidationFailure`
 * instead of being thrown.
 */
export class BulkgenError extends Error {
  readonly code: FatalErrorCode;
  readonly fatal = true as const;
  readonly context?: Record<string, unknown>;

  constructor(code: FatalErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "BulkgenError";
    this.code = code;
    this.context = context;
  }
}
