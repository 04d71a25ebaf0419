// Error taxonomy for the photo-to-KMZ pipeline

export type ExtractionFailureReason =
  | 'no-metadata'
  | 'no-gps'
  | 'incomplete-gps'
  | 'malformed-coordinate'
  | 'unreadable-tags'

/**
 * Per-photo soft failure. Returned inside a Result, never thrown: the batch
 * assembler skips the photo and carries on.
 */
export interface ExtractionError {
  reason: ExtractionFailureReason
  message: string
  cause?: unknown
}

/** A coordinate component that cannot be turned into a number */
export class CoordinateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CoordinateError'
  }
}

export type BatchFailureCode =
  | 'no-usable-photos'
  | 'duplicate-filename'
  | 'marker-unavailable'
  | 'invalid-output-name'
  | 'invalid-config'

/**
 * Whole-batch failure with a user-facing message. No archive is produced.
 */
export class BatchFailureError extends Error {
  readonly code: BatchFailureCode

  constructor(code: BatchFailureCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BatchFailureError'
    this.code = code
  }
}

/**
 * Anything the pipeline did not expect: archive write failures, images the
 * decoder rejects, broken document references.
 */
export class UnexpectedFaultError extends Error {
  readonly fileName?: string

  constructor(message: string, options: { fileName?: string; cause?: unknown } = {}) {
    super(options.fileName ? `${message} (${options.fileName})` : message, { cause: options.cause })
    this.name = 'UnexpectedFaultError'
    this.fileName = options.fileName
  }
}

export function errorToMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
