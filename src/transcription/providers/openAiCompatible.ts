import { Blob } from 'buffer';
import { fetch, FormData } from 'undici';
import { log } from '../../log';
import type { TranscriptionProvider } from '../provider';
import type { EngineInput, EngineResult, TranscriptionModel } from '../types';
import { parseEngineResponse } from './engineResponse';

export interface OpenAiCompatibleOptions {
  /** Base URL up to and including the API version, e.g. https://host/v1 */
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

/** Cloud transcription through an OpenAI-style `/audio/transcriptions` endpoint. */
export class OpenAiCompatibleProvider implements TranscriptionProvider {
  public readonly id = 'cloud';

  constructor(private readonly options: OpenAiCompatibleOptions) {}

  public async transcribe(input: EngineInput, model: TranscriptionModel): Promise<EngineResult> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/audio/transcriptions`;
    const form = new FormData();
    form.append('file', new Blob([input.wav], { type: 'audio/wav' }), 'audio.wav');
    form.append('model', model.id);
    form.append('response_format', 'verbose_json');
    if (input.language !== 'auto') {
      form.append('language', input.language);
    }

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const startedAt = Date.now();
    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: form,
      signal: input.signal ? AbortSignal.any([input.signal, timeout]) : timeout,
    });
    const contentType = response.headers.get('content-type') ?? '';
    const body = await response.text();

    log.info(
      {
        event: 'engine_request_done',
        provider: this.id,
        model: model.id,
        status: response.status,
        elapsed_ms: Date.now() - startedAt,
      },
      'cloud transcription responded',
    );

    if (!response.ok) {
      const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
      throw new Error(`cloud transcription error ${response.status}: ${preview}`);
    }
    return parseEngineResponse(body, contentType);
  }
}
