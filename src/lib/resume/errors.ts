export type ResumeErrorKind = 'UnsupportedFormat' | 'ExtractionFailure' | 'InvalidInput';

export class ResumeError extends Error {
  readonly kind: ResumeErrorKind;

  constructor(kind: ResumeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

export class UnsupportedFormatError extends ResumeError {
  readonly format: string;

  constructor(format: string) {
    super('UnsupportedFormat', `Unsupported document format: ${format}`);
    this.format = format;
  }
}

export class ExtractionFailureError extends ResumeError {
  constructor(format: string, cause: unknown) {
    super('ExtractionFailure', `Could not read ${format} document`, { cause });
  }
}

export class InvalidInputError extends ResumeError {
  constructor(message: string) {
    super('InvalidInput', message);
  }
}

export function isResumeError(error: unknown): error is ResumeError {
  return error instanceof ResumeError;
}

// HTTP status a route should answer with for each failure kind
export const RESUME_ERROR_STATUS: Record<ResumeErrorKind, number> = {
  UnsupportedFormat: 415,
  ExtractionFailure: 422,
  InvalidInput: 400,
};
