/**
 * Error taxonomy. Intake errors surface synchronously to the caller with
 * their status code; stage errors are caught at the pipeline boundary and
 * turned into an ERROR decision.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class UnknownVariantError extends AppError {
  constructor(public readonly variant: string) {
    super(`No document profile registered for variant "${variant}"`, 'UNKNOWN_VARIANT', 400);
  }
}

export class MissingIdentityDataError extends AppError {
  constructor(public readonly missingConcepts: string[]) {
    super(
      `Identity data is missing required concepts: ${missingConcepts.join(', ')}`,
      'MISSING_IDENTITY_DATA',
      422
    );
  }
}

export class DuplicateJobError extends AppError {
  constructor(public readonly documentId: string) {
    super(`Document ${documentId} already has an active processing run`, 'DUPLICATE_ACTIVE_JOB', 409);
  }
}

export class DownloadError extends AppError {
  constructor(message: string, public readonly httpStatus?: number) {
    super(message, 'DOWNLOAD_FAILED', 502);
  }
}

export class UnreadableDocumentError extends AppError {
  constructor(message = 'Document contains no readable text') {
    super(message, 'UNREADABLE_DOCUMENT', 422);
  }
}

export class ExtractionEngineError extends AppError {
  constructor(message: string) {
    super(message, 'EXTRACTION_ENGINE_FAILED', 502);
  }
}
