/**
 * Error Handling: Custom error types for CSA decoding failures
 */

/**
 * Failure categories raised while decoding a CSA header
 */
export type CsaErrorKind =
  | 'OutOfBounds'
  | 'MalformedHeader'
  | 'InvalidCheckBit'
  | 'TruncatedStream'
  | 'SizeMismatch'
  | 'InvalidDicom';

/**
 * Location of a failure inside the tag stream
 */
export interface CsaErrorContext {
  tag?: string;
  tagIndex?: number;
  offset?: number;
}

/**
 * Custom error for CSA parsing failures
 */
export class CsaParseError extends Error {
  constructor(
    message: string,
    public readonly kind: CsaErrorKind,
    public readonly tag?: string,
    public readonly tagIndex?: number,
    public readonly offset?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CsaParseError';
  }
}

/**
 * Create a parse error with context
 */
export function createParseError(
  kind: CsaErrorKind,
  message: string,
  context: CsaErrorContext = {},
  cause?: Error
): CsaParseError {
  let fullMessage = message;
  if (context.tagIndex !== undefined) {
    fullMessage += ` (tag #${context.tagIndex})`;
  }
  if (context.tag) {
    fullMessage += ` (tag: ${context.tag})`;
  }
  if (context.offset !== undefined) {
    fullMessage += ` (offset: ${context.offset})`;
  }
  return new CsaParseError(fullMessage, kind, context.tag, context.tagIndex, context.offset, cause);
}

export function isCsaParseError(error: unknown, kind?: CsaErrorKind): error is CsaParseError {
  return error instanceof CsaParseError && (kind === undefined || error.kind === kind);
}
