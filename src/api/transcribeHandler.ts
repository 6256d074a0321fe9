import { z } from 'zod';
import type { DiarizationParams } from '../diarization/types';
import { InvalidParameterError, MissingBoundaryError } from '../errors';
import { parseBoundary } from '../http/requestParser';
import { errorResponse, jsonResponse } from '../http/responses';
import type { RequestHandler } from '../http/types';
import { extractOrThrow } from '../multipart/multipartExtractor';
import type { TranscriptionCoordinator } from '../transcription/coordinator';

const formBoolean = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return undefined;
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return value;
}, z.boolean().default(false));

const formSpeakers = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().int().min(1).max(32).optional(),
);

const DiarizationFieldsSchema = z
  .object({
    enable_diarization: formBoolean,
    diarization_mode: z.enum(['fast', 'balanced', 'accurate']).default('balanced'),
    min_speakers: formSpeakers,
    max_speakers: formSpeakers,
    use_tinydiarize: formBoolean,
    diarization_method: z.enum(['auto', 'stereo', 'tinydiarize', 'pyannote']).default('auto'),
  })
  .refine(
    (fields) =>
      fields.min_speakers === undefined ||
      fields.max_speakers === undefined ||
      fields.min_speakers <= fields.max_speakers,
    { message: 'min_speakers must not exceed max_speakers', path: ['min_speakers'] },
  );

export function parseDiarizationFields(fields: Record<string, string>): DiarizationParams {
  const parsed = DiarizationFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new InvalidParameterError(`Invalid form fields: ${issues}`);
  }
  const data = parsed.data;
  const params: DiarizationParams = {
    enableDiarization: data.enable_diarization,
    mode: data.diarization_mode,
    useTinydiarize: data.use_tinydiarize,
    method: data.diarization_method,
  };
  if (data.min_speakers !== undefined) params.minSpeakers = data.min_speakers;
  if (data.max_speakers !== undefined) params.maxSpeakers = data.max_speakers;
  return params;
}

/** POST /api/transcribe */
export function transcribeHandler(coordinator: TranscriptionCoordinator): RequestHandler {
  return async (request, context) => {
    const boundary = parseBoundary(request.headers.get('content-type'));
    if (!boundary) {
      throw new MissingBoundaryError();
    }

    const { file, fields } = extractOrThrow(request.body, boundary);
    if (file.bytes.length === 0) {
      throw new InvalidParameterError("Multipart field 'file' is empty");
    }
    const diarization = parseDiarizationFields(fields);

    const result = await coordinator.transcribe({
      audio: file.bytes,
      declaredContentType: file.contentType,
      diarization,
      signal: context.signal,
      requestId: context.connectionId,
    });
    return result.ok ? jsonResponse(200, result.response) : errorResponse(result.error);
  };
}
