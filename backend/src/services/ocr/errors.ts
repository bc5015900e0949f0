/**
 * Failure kinds raised inside the OCR pipeline. Each one is caught at a
 * pipeline boundary and turned into an entry of a result's error list.
 */

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Bad extension, MIME mismatch, oversize, empty file or wrong magic bytes */
export class InputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputValidationError';
    Object.setPrototypeOf(this, InputValidationError.prototype);
  }
}

/** A PDF or image that could not be rasterized or loaded */
export class DecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

export class RecognitionError extends Error {
  constructor(
    public readonly pageNumber: number,
    cause: unknown
  ) {
    super(describeCause(cause));
    this.name = 'RecognitionError';
    Object.setPrototypeOf(this, RecognitionError.prototype);
  }
}

export class ParseError extends Error {
  constructor(cause: unknown) {
    super(`Error parsing invoice: ${describeCause(cause)}`);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
