import { Blob } from 'buffer';
import { fetch, FormData } from 'undici';
import { log } from '../../log';
import type { TranscriptionProvider } from '../provider';
import type { EngineInput, EngineResult, TranscriptionModel } from '../types';
import { parseEngineResponse } from './engineResponse';

export interface WhisperServerOptions {
  baseUrl: string;
  timeoutMs: number;
}

function previewText(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Local whisper.cpp server: `POST /inference` with the WAV as multipart,
 * `POST /load` to swap the model in memory.
 */
export class WhisperServerProvider implements TranscriptionProvider {
  public readonly id = 'local';

  constructor(private readonly options: WhisperServerOptions) {}

  public async transcribe(input: EngineInput, model: TranscriptionModel): Promise<EngineResult> {
    const url = joinUrl(this.options.baseUrl, '/inference');
    const form = new FormData();
    form.append('file', new Blob([input.wav], { type: 'audio/wav' }), 'audio.wav');
    form.append('response_format', 'verbose_json');
    form.append('temperature', '0.0');
    if (input.language !== 'auto') {
      form.append('language', input.language);
    }
    if (input.speakerTurns) {
      form.append('tinydiarize', 'true');
    }

    const startedAt = Date.now();
    log.info(
      { event: 'engine_request_start', provider: this.id, model: model.id, url, wav_bytes: input.wav.length },
      'sending audio to whisper server',
    );

    const response = await fetch(url, {
      method: 'POST',
      body: form,
      headers: { Accept: 'application/json, text/plain;q=0.9, */*;q=0.1' },
      signal: requestSignal(this.options.timeoutMs, input.signal),
    });
    const contentType = response.headers.get('content-type') ?? '';
    const body = await response.text();

    log.info(
      {
        event: 'engine_request_done',
        provider: this.id,
        status: response.status,
        elapsed_ms: Date.now() - startedAt,
        content_type: contentType,
      },
      'whisper server responded',
    );

    if (!response.ok) {
      throw new Error(`whisper server error ${response.status}: ${previewText(body)}`);
    }
    return parseEngineResponse(body, contentType);
  }

  public async loadModel(model: TranscriptionModel): Promise<void> {
    if (!model.path) {
      throw new Error(`model '${model.id}' has no file path`);
    }
    const form = new FormData();
    form.append('model', model.path);

    const response = await fetch(joinUrl(this.options.baseUrl, '/load'), {
      method: 'POST',
      body: form,
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`whisper server load error ${response.status}: ${previewText(body)}`);
    }
  }
}
