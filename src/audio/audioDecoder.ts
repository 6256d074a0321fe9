import { spawn } from 'child_process';
import { log } from '../log';
import type { TempScope } from '../storage/tempResource';
import { prepareAudioFile } from './audioWorkerClient';
import type { AudioFormat } from './formatSniffer';
import { ENGINE_SAMPLE_RATE_HZ, PreparedAudio } from './pcm';

export interface AudioSource {
  path: string;
  format: AudioFormat;
}

export interface AudioDecoder {
  decode(source: AudioSource, scope: TempScope, signal?: AbortSignal): Promise<PreparedAudio>;
}

export class AudioDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioDecodeError';
  }
}

export interface FfmpegDecoderOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

const STDERR_TAIL_BYTES = 2000;

/** Converts any container ffmpeg understands into a 16 kHz PCM16 WAV, keeping channels. */
export class FfmpegAudioDecoder implements AudioDecoder {
  constructor(private readonly options: FfmpegDecoderOptions) {}

  async decode(source: AudioSource, scope: TempScope, signal?: AbortSignal): Promise<PreparedAudio> {
    const outputPath = scope.filePath('wav');
    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-nostdin',
      '-y',
      '-i',
      source.path,
      '-vn',
      '-acodec',
      'pcm_s16le',
      '-ar',
      String(ENGINE_SAMPLE_RATE_HZ),
      '-f',
      'wav',
      outputPath,
    ];

    await new Promise<void>((resolve, reject) => {
      const ffmpeg = spawn(this.options.ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      const stderr: Buffer[] = [];
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        ffmpeg.kill('SIGKILL');
      }, this.options.timeoutMs);
      timeout.unref?.();

      const onAbort = () => ffmpeg.kill('SIGKILL');
      signal?.addEventListener('abort', onAbort, { once: true });

      ffmpeg.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      ffmpeg.on('error', (error) => {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        reject(new AudioDecodeError(`ffmpeg could not be started: ${error.message}`, { cause: error }));
      });
      ffmpeg.on('close', (code) => {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        if (timedOut) {
          reject(new AudioDecodeError(`ffmpeg decode timed out after ${this.options.timeoutMs}ms`));
          return;
        }
        if (signal?.aborted) {
          reject(new AudioDecodeError('ffmpeg decode aborted'));
          return;
        }
        if (code !== 0) {
          const tail = Buffer.concat(stderr).toString('utf8').slice(-STDERR_TAIL_BYTES).trim();
          reject(new AudioDecodeError(`ffmpeg exited with code ${code}: ${tail}`));
          return;
        }
        resolve();
      });
    });

    return prepareAudioFile(outputPath, signal);
  }
}

/**
 * Decodes PCM WAV on a worker thread and hands every other format (or a WAV
 * encoding the built-in reader does not cover) to the fallback decoder.
 */
export class CompositeAudioDecoder implements AudioDecoder {
  constructor(private readonly fallback: AudioDecoder) {}

  async decode(source: AudioSource, scope: TempScope, signal?: AbortSignal): Promise<PreparedAudio> {
    if (source.format === 'wav') {
      try {
        return await prepareAudioFile(source.path, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        log.info(
          { event: 'wav_inprocess_decode_skipped', reason: error instanceof Error ? error.message : String(error) },
          'wav handed to external decoder',
        );
      }
    }
    return this.fallback.decode(source, scope, signal);
  }
}
