import type { DiarizationFailurePolicy } from '../config';
import type { AudioDecoder } from '../audio/audioDecoder';
import { AudioFormat, classify, FORMAT_INFO, formatFromContentType } from '../audio/formatSniffer';
import { durationSeconds, PcmAudio, PreparedAudio } from '../audio/pcm';
import { describeWavHeader } from '../audio/wavInfo';
import { alignTranscript } from '../diarization/aligner';
import type { DiarizationService } from '../diarization/diarizationService';
import type { AlignedSegment, AlignedTranscription, DiarizationMethod, DiarizationParams } from '../diarization/types';
import {
  ApiError,
  ApiErrorBody,
  DiarizationUnavailableError,
  EngineTranscriptionFailedError,
  ModelLoadFailedError,
  NoModelSelectedError,
  toApiError,
} from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { TempScope, withTempScope } from '../storage/tempResource';
import type { Enhancement } from './enhancement';
import type { ModelState } from './modelState';
import type { TranscriptionProvider } from './provider';
import type { EngineResult, ProviderKind, TranscriptionModel } from './types';
import type { WordReplacement } from './wordReplacement';

export interface TranscribeRequest {
  audio: Buffer;
  declaredContentType?: string | null;
  diarization?: DiarizationParams;
  signal?: AbortSignal;
  /** Correlates log lines with the connection that carried the upload. */
  requestId?: string;
}

export interface TranscriptionMetadata {
  model: string;
  language: string;
  duration: number;
  processingTime: number;
  transcriptionTime: number;
  diarizationTime?: number;
  enhancementTime?: number;
  enhanced: boolean;
  diarizationEnabled?: boolean;
  diarizationMethod?: DiarizationMethod;
  diarizationError?: ApiErrorBody['error'];
  replacementsApplied: boolean;
}

export interface TranscriptionResponse {
  success: true;
  text: string;
  enhancedText?: string;
  segments?: AlignedSegment[];
  speakers?: string[];
  numSpeakers?: number;
  textWithSpeakers?: string;
  textInline?: string;
  metadata: TranscriptionMetadata;
}

export type CoordinatorResult = { ok: true; response: TranscriptionResponse } | { ok: false; error: ApiError };

export interface ProviderLookup {
  get(kind: ProviderKind): TranscriptionProvider;
}

export interface TranscriptionCoordinatorOptions {
  state: ModelState;
  providers: ProviderLookup;
  decoder: AudioDecoder;
  wordReplacement: WordReplacement;
  enhancement: Enhancement;
  diarization: DiarizationService;
  tempDir: string;
  language: string;
  diarizationFailurePolicy: DiarizationFailurePolicy;
}

interface EngineOutcome {
  audio: PcmAudio;
  duration: number;
  result: EngineResult;
  transcriptionSeconds: number;
}

function seconds(ms: number): number {
  return ms / 1000;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one upload through decode, transcription and post-processing.
 * Model state is only touched through `ModelState`. Decoding and channel
 * analysis run on worker threads and engine calls are async I/O, so nothing
 * here holds the event loop. Failures come back as values, never as throws.
 */
export class TranscriptionCoordinator {
  constructor(private readonly options: TranscriptionCoordinatorOptions) {}

  async transcribe(request: TranscribeRequest): Promise<CoordinatorResult> {
    try {
      return { ok: true, response: await this.run(request) };
    } catch (error) {
      const apiError = toApiError(error);
      log[apiError.status >= 500 ? 'error' : 'warn'](
        { err: error, event: 'transcription_failed', request_id: request.requestId, code: apiError.code },
        'transcription failed',
      );
      return { ok: false, error: apiError };
    }
  }

  private async run(request: TranscribeRequest): Promise<TranscriptionResponse> {
    const startedAt = Date.now();
    const { state } = this.options;

    const ready = await state.ensureReady();
    if (!ready.ok) {
      if (ready.reason === 'no_model') {
        throw new NoModelSelectedError();
      }
      throw new ModelLoadFailedError(ready.model.id, ready.cause);
    }
    const model = ready.model;
    const snapshot = await state.snapshot();

    const format = classify(request.audio);
    const declared = formatFromContentType(request.declaredContentType);
    if (declared && declared !== format) {
      log.warn(
        {
          event: 'declared_content_type_mismatch',
          request_id: request.requestId,
          declared_content_type: request.declaredContentType,
          sniffed_format: format,
        },
        'declared content type does not match audio bytes',
      );
    }

    const engine = await withTempScope(this.options.tempDir, (scope) =>
      this.transcribeInScope(scope, request, model, FORMAT_INFO[format].extension, format),
    );

    let text = engine.result.text.trim();
    if (snapshot.wordReplacementEnabled) {
      text = this.options.wordReplacement.apply(text);
    }

    let enhancedText: string | undefined;
    let enhancementMs = 0;
    const { enhancement } = this.options;
    if (snapshot.enhancementEnabled && enhancement.isConfigured && text !== '') {
      const end = startStageTimer('enhancement');
      try {
        enhancedText = await enhancement.enhance(text, request.signal);
        enhancementMs = end();
      } catch (error) {
        end();
        incStageError('enhancement');
        log.warn({ err: error, event: 'enhancement_failed', request_id: request.requestId }, 'enhancement failed');
      }
    }

    const metadata: TranscriptionMetadata = {
      model: model.displayName,
      language: this.options.language,
      duration: engine.duration,
      processingTime: 0,
      transcriptionTime: engine.transcriptionSeconds,
      enhanced: enhancedText !== undefined,
      replacementsApplied: snapshot.wordReplacementEnabled,
    };
    if (enhancementMs > 0) {
      metadata.enhancementTime = seconds(enhancementMs);
    }

    const response: TranscriptionResponse = { success: true, text, metadata };
    if (enhancedText !== undefined) {
      response.enhancedText = enhancedText;
    }

    if (request.diarization?.enableDiarization) {
      await this.applyDiarization(response, engine, text, request);
    }

    metadata.processingTime = seconds(Date.now() - startedAt);
    log.info(
      {
        event: 'transcription_done',
        request_id: request.requestId,
        model: model.id,
        duration_s: engine.duration,
        processing_s: metadata.processingTime,
        text_length: text.length,
        diarized: response.segments !== undefined,
      },
      'transcription done',
    );
    return response;
  }

  private async transcribeInScope(
    scope: TempScope,
    request: TranscribeRequest,
    model: TranscriptionModel,
    extension: string,
    format: AudioFormat,
  ): Promise<EngineOutcome> {
    const uploadPath = await scope.writeFile(request.audio, extension);

    const endDecode = startStageTimer('decode');
    let prepared: PreparedAudio;
    try {
      prepared = await this.options.decoder.decode({ path: uploadPath, format }, scope, request.signal);
    } catch (error) {
      incStageError('decode');
      log.warn(
        {
          err: error,
          event: 'audio_decode_failed',
          request_id: request.requestId,
          format,
          bytes: request.audio.length,
          header: describeWavHeader(request.audio),
        },
        'audio decode failed',
      );
      throw new EngineTranscriptionFailedError(`audio could not be decoded (${errorMessage(error)})`, error);
    } finally {
      endDecode();
    }

    const { audio, engineWav: wav } = prepared;
    const duration = durationSeconds(audio);
    const wavPath = await scope.writeFile(wav, 'wav');

    const provider = this.options.providers.get(model.provider);
    const endTranscription = startStageTimer('transcription');
    let result: EngineResult;
    try {
      result = await provider.transcribe(
        {
          wavPath,
          wav,
          durationSeconds: duration,
          language: this.options.language,
          speakerTurns: request.diarization?.enableDiarization === true && request.diarization.useTinydiarize,
          signal: request.signal,
        },
        model,
      );
    } catch (error) {
      endTranscription();
      incStageError('transcription');
      throw new EngineTranscriptionFailedError(errorMessage(error), error);
    }
    const transcriptionSeconds = seconds(endTranscription());

    return { audio, duration, result, transcriptionSeconds };
  }

  private async applyDiarization(
    response: TranscriptionResponse,
    engine: EngineOutcome,
    text: string,
    request: TranscribeRequest,
  ): Promise<void> {
    const params = request.diarization;
    if (!params) return;

    const end = startStageTimer('diarization');
    let aligned: AlignedTranscription;
    try {
      if (engine.result.segments.length === 0) {
        throw new DiarizationUnavailableError('The transcription engine returned no timestamped segments');
      }
      const diarization = await this.options.diarization.diarize({
        audio: engine.audio,
        transcript: engine.result.segments,
        params,
        signal: request.signal,
      });
      aligned = alignTranscript(engine.result.segments, diarization, text);
    } catch (error) {
      end();
      incStageError('diarization');
      const apiError = toApiError(error);
      if (this.options.diarizationFailurePolicy === 'fail') {
        throw apiError;
      }
      log.warn(
        { err: error, event: 'diarization_degraded', request_id: request.requestId, code: apiError.code },
        'diarization failed; returning plain transcript',
      );
      response.metadata.diarizationEnabled = false;
      response.metadata.diarizationError = apiError.toBody().error;
      return;
    }

    const diarizationMs = end();
    response.segments = aligned.segments;
    response.speakers = aligned.speakers;
    response.numSpeakers = aligned.speakers.length;
    response.textWithSpeakers = aligned.textWithSpeakers;
    response.textInline = aligned.textInline;
    response.metadata.diarizationEnabled = true;
    response.metadata.diarizationMethod = aligned.diarizationMethod;
    if (diarizationMs > 0) {
      response.metadata.diarizationTime = seconds(diarizationMs);
    }
  }
}
