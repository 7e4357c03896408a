export type ValuationErrorCode =
  | "INPUT_NOT_FOUND"
  | "INPUT_UNREADABLE"
  | "MALFORMED_RECORD"
  | "UNKNOWN_RECORD_TYPE"
  | "OUTPUT_WRITE_FAILURE"
  | "INVALID_DISCOUNT";

export class ValuationError extends Error {
  constructor(
    message: string,
    public readonly code: ValuationErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ValuationError";
  }
}

export class InputNotFoundError extends ValuationError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`File not found: ${path}`, "INPUT_NOT_FOUND", { cause });
    this.name = "InputNotFoundError";
  }
}

export class InputReadError extends ValuationError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`Error reading file: ${path}`, "INPUT_UNREADABLE", { cause });
    this.name = "InputReadError";
  }
}

export class MalformedRecordError extends ValuationError {
  constructor(public readonly lineNumber: number, public readonly reason: string) {
    super(`Malformed record on line ${lineNumber}: ${reason}`, "MALFORMED_RECORD");
    this.name = "MalformedRecordError";
  }
}

export class UnknownRecordTypeError extends ValuationError {
  constructor(public readonly lineNumber: number, public readonly recordType: string) {
    super(
      `Unknown record type "${recordType}" on line ${lineNumber}`,
      "UNKNOWN_RECORD_TYPE"
    );
    this.name = "UnknownRecordTypeError";
  }
}

export class OutputWriteError extends ValuationError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`Error writing to output file: ${path}`, "OUTPUT_WRITE_FAILURE", { cause });
    this.name = "OutputWriteError";
  }
}

export class InvalidDiscountError extends ValuationError {
  constructor(public readonly percentage: number) {
    super(
      `Discount percentage must be between 0 and 100, got ${percentage}`,
      "INVALID_DISCOUNT"
    );
    this.name = "InvalidDiscountError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
