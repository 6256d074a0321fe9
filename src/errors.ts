export type ApiErrorCode =
  | 'BAD_REQUEST'
  | 'MISSING_BOUNDARY'
  | 'MISSING_FILE'
  | 'MALFORMED_MULTIPART'
  | 'INVALID_PARAMETER'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'NO_MODEL'
  | 'TRANSCRIPTION_FAILED'
  | 'DIARIZATION_NOT_IMPLEMENTED'
  | 'DIARIZATION_UNAVAILABLE'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

export interface ApiErrorBody {
  success: false;
  error: {
    code: ApiErrorCode;
    message: string;
  };
}

export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    public readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toBody(): ApiErrorBody {
    return { success: false, error: { code: this.code, message: this.message } };
  }
}

/** Malformed request line, headers or framing. Resolved inside the connection. */
export class ProtocolError extends ApiError {
  constructor(message: string) {
    super('BAD_REQUEST', 400, message);
  }
}

export class PayloadTooLargeError extends ApiError {
  constructor(declaredBytes: number, maxBytes: number) {
    super('PAYLOAD_TOO_LARGE', 413, `Request body of ${declaredBytes} bytes exceeds the ${maxBytes} byte limit`);
  }
}

export class RouteNotFoundError extends ApiError {
  constructor(method: string, path: string) {
    super('NOT_FOUND', 404, `No route for ${method} ${path}`);
  }
}

export class MissingBoundaryError extends ApiError {
  constructor() {
    super('MISSING_BOUNDARY', 400, 'Missing boundary in multipart/form-data content type');
  }
}

export class MissingFileError extends ApiError {
  constructor() {
    super('MISSING_FILE', 400, "No audio file found: multipart field 'file' is required");
  }
}

export class MalformedMultipartError extends ApiError {
  constructor(detail: string) {
    super('MALFORMED_MULTIPART', 400, `Malformed multipart body: ${detail}`);
  }
}

export class InvalidParameterError extends ApiError {
  constructor(message: string) {
    super('INVALID_PARAMETER', 400, message);
  }
}

export class NoModelSelectedError extends ApiError {
  constructor() {
    super('NO_MODEL', 500, 'No transcription model is currently selected');
  }
}

export class ModelLoadFailedError extends ApiError {
  constructor(modelId: string, cause: unknown) {
    super('TRANSCRIPTION_FAILED', 500, `Transcription failed: model '${modelId}' could not be loaded`, { cause });
  }
}

export class EngineTranscriptionFailedError extends ApiError {
  constructor(detail: string, cause?: unknown) {
    super('TRANSCRIPTION_FAILED', 500, `Transcription failed: ${detail}`, { cause });
  }
}

export class DiarizationMethodNotImplementedError extends ApiError {
  constructor(method: string) {
    super('DIARIZATION_NOT_IMPLEMENTED', 500, `Diarization method '${method}' is not yet implemented`);
  }
}

export class DiarizationUnavailableError extends ApiError {
  constructor(detail = 'No suitable diarization method available for this audio') {
    super('DIARIZATION_UNAVAILABLE', 500, detail);
  }
}

export class ProcessingTimeoutError extends ApiError {
  constructor(timeoutMs: number) {
    super('TIMEOUT', 504, `Transcription timeout after ${Math.round(timeoutMs / 1000)}s - file too large or complex`);
  }
}

export class InternalError extends ApiError {
  constructor(message = 'Internal server error', cause?: unknown) {
    super('INTERNAL_ERROR', 500, message, { cause });
  }
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, error);
}
