/** Broad classification of a {@link StyleError}. */
export type StyleErrorCategory =
  | 'GENERAL'
  | 'FILE_IO'
  | 'XML_PARSING'
  | 'STYLE_SYSTEM'
  | 'VALIDATION'
  | 'ELEMENT_OPERATION';

/** Error codes used by {@link StyleError}, grouped by category. */
export const STYLE_ERROR_CATEGORIES = {
  INVALID_ARGUMENT: 'GENERAL',

  FILE_NOT_FOUND: 'FILE_IO',

  XML_PARSE_ERROR: 'XML_PARSING',
  XML_INVALID_STRUCTURE: 'XML_PARSING',
  XML_ATTRIBUTE_MISSING: 'XML_PARSING',
  XML_NAMESPACE_ERROR: 'XML_PARSING',
  UNSUPPORTED_VERSION: 'XML_PARSING',

  STYLE_NOT_FOUND: 'STYLE_SYSTEM',
  STYLE_ALREADY_EXISTS: 'STYLE_SYSTEM',
  STYLE_PROPERTY_INVALID: 'STYLE_SYSTEM',
  STYLE_INHERITANCE_CYCLE: 'STYLE_SYSTEM',
  STYLE_DEPENDENCY_MISSING: 'STYLE_SYSTEM',

  VALIDATION_FAILED: 'VALIDATION',
  INVALID_FONT_SIZE: 'VALIDATION',
  INVALID_COLOR_FORMAT: 'VALIDATION',
  INVALID_ALIGNMENT: 'VALIDATION',
  INVALID_SPACING: 'VALIDATION',
  INVALID_TABLE_DIMENSION: 'VALIDATION',
  INVALID_BORDER: 'VALIDATION',
  INVALID_MARGIN: 'VALIDATION',
  INVALID_WIDTH: 'VALIDATION',
  INVALID_HEIGHT: 'VALIDATION',

  ELEMENT_OPERATION_FAILED: 'ELEMENT_OPERATION',
} as const satisfies Record<string, StyleErrorCategory>;

export type StyleErrorCode = keyof typeof STYLE_ERROR_CATEGORIES;

/** Structured context attached to a failure. */
export interface StyleErrorDetails {
  operation?: string;
  style?: string;
  field?: string;
  value?: unknown;
  [key: string]: unknown;
}

/**
 * Failure value carried by every fallible style operation.
 *
 * Higher-level operations wrap lower-level failures through `causedBy` rather than
 * replacing them, so the full chain is available to callers and observers.
 *
 * @param code - Machine-readable error classification.
 * @param message - Human-readable description.
 * @param details - Optional operation/field context.
 * @param causedBy - The lower-level failure this one wraps.
 */
export class StyleError extends Error {
  readonly code: StyleErrorCode;
  readonly category: StyleErrorCategory;
  readonly details?: StyleErrorDetails;
  readonly causedBy?: StyleError;

  constructor(code: StyleErrorCode, message: string, details?: StyleErrorDetails, causedBy?: StyleError) {
    super(message);
    this.name = 'StyleError';
    this.code = code;
    this.category = STYLE_ERROR_CATEGORIES[code];
    this.details = details;
    this.causedBy = causedBy;
    Object.setPrototypeOf(this, StyleError.prototype);
  }

  /** Returns a copy of this error with `cause` appended at the end of the chain. */
  withCause(cause: StyleError): StyleError {
    const inner = this.causedBy ? this.causedBy.withCause(cause) : cause;
    return new StyleError(this.code, this.message, this.details, inner);
  }

  /** Walks the `causedBy` chain, outermost first. */
  chain(): StyleError[] {
    const errors: StyleError[] = [];
    let current: StyleError | undefined = this;
    while (current) {
      errors.push(current);
      current = current.causedBy;
    }
    return errors;
  }

  toString(): string {
    let text = `[${this.category}/${this.code}] ${this.message}`;
    if (this.details) {
      const context = Object.entries(this.details)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
      if (context.length) text += ` (${context.join(' ')})`;
    }
    if (this.causedBy) {
      text += `\n  Caused by: ${this.causedBy.toString()}`;
    }
    return text;
  }
}

/**
 * Type guard that narrows an unknown value to {@link StyleError}.
 */
export function isStyleError(error: unknown): error is StyleError {
  return error instanceof StyleError;
}
