export type DeskErrorCode =
  | "VALIDATION_FAILED"
  | "IO_FAILED"
  | "PIPELINE_FAILED"
  | "HANDLER_CRASHED";

export class DeskError extends Error {
  readonly code: DeskErrorCode;

  constructor(code: DeskErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeskError";
    this.code = code;
  }
}

/** Bad input from the user: missing fields, bad dates, duplicate or unknown codes. */
export class ValidationError extends DeskError {
  constructor(message: string) {
    super("VALIDATION_FAILED", message);
    this.name = "ValidationError";
  }
}

/** The homework document could not be read or written. */
export class IoError extends DeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IO_FAILED", message, options);
    this.name = "IoError";
  }
}

/** A load pipeline stage gave up; load completion reports it as an IoError. */
export class PipelineError extends DeskError {
  readonly stage: "reader" | "normalizer" | "sink";

  constructor(stage: PipelineError["stage"], message: string) {
    super("PIPELINE_FAILED", message);
    this.name = "PipelineError";
    this.stage = stage;
  }
}

/** No document exists yet; the first save creates it. */
export class DocumentNotFoundError extends PipelineError {
  constructor(location: string) {
    super("reader", `Document not found: ${location}`);
    this.name = "DocumentNotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toDeskError(error: unknown): DeskError {
  if (error instanceof DeskError) {
    return error;
  }
  return new DeskError("HANDLER_CRASHED", errorMessage(error), { cause: error });
}
