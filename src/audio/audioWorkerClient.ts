import path from 'path';
import { Worker } from 'worker_threads';
import { assertStereo } from '../diarization/stereo';
import type { DiarizationMode, DiarizationResult } from '../diarization/types';
import { log } from '../log';
import { AudioJob, AudioJobResult, AudioWorkerReplySchema, transferables } from './audioJobs';
import type { PcmAudio, PreparedAudio } from './pcm';

// Same extension as this module: .ts under tsx, .js once built.
const WORKER_PATH = path.join(__dirname, `audioWorker${path.extname(__filename)}`);

export class AudioWorkerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioWorkerError';
  }
}

/**
 * Runs one CPU-bound audio job on its own worker thread so the event loop
 * stays free for sockets, timers and the model-state mailbox. Buffers listed
 * in `transfer` move to the worker and are unusable here afterwards.
 * Aborting terminates the worker.
 */
export function runAudioJob(job: AudioJob, transfer: ArrayBuffer[] = [], signal?: AbortSignal): Promise<AudioJobResult> {
  if (signal?.aborted) {
    return Promise.reject(new AudioWorkerError('audio job aborted'));
  }

  return new Promise<AudioJobResult>((resolve, reject) => {
    const worker = new Worker(WORKER_PATH, { workerData: job, transferList: transfer });
    let settled = false;

    const settle = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      outcome();
    };

    const onAbort = (): void => {
      settle(() => reject(new AudioWorkerError('audio job aborted')));
      worker.terminate().catch((error: unknown) => {
        log.warn({ err: error, event: 'audio_worker_terminate_failed', job: job.kind }, 'audio worker terminate failed');
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    worker.once('message', (message: unknown) => {
      const reply = AudioWorkerReplySchema.safeParse(message);
      if (!reply.success) {
        settle(() => reject(new AudioWorkerError('audio worker sent a malformed reply')));
        return;
      }
      const data = reply.data;
      settle(() => (data.ok ? resolve(data.result) : reject(new AudioWorkerError(data.message))));
    });
    worker.once('error', (error: Error) => {
      settle(() => reject(new AudioWorkerError(`audio worker failed: ${error.message}`, { cause: error })));
    });
    worker.once('exit', (code: number) => {
      settle(() => reject(new AudioWorkerError(`audio worker exited with code ${code} before replying`)));
    });
  });
}

/** Decodes a WAV file and derives the 16 kHz mono engine WAV, off the event loop. */
export async function prepareAudioFile(inputPath: string, signal?: AbortSignal): Promise<PreparedAudio> {
  const result = await runAudioJob({ kind: 'prepare', inputPath }, [], signal);
  if (result.kind !== 'prepare') {
    throw new AudioWorkerError(`unexpected '${result.kind}' reply to a prepare job`);
  }
  const { engineWav } = result;
  return {
    audio: { sampleRateHz: result.sampleRateHz, channels: result.channels },
    engineWav: Buffer.from(engineWav.buffer, engineWav.byteOffset, engineWav.byteLength),
  };
}

/**
 * Stereo channel-energy diarization on a worker thread. The first two
 * channels travel to the worker and back; `audio` holds them again once the
 * promise resolves.
 */
export async function diarizeStereoInWorker(
  audio: PcmAudio,
  mode: DiarizationMode,
  signal?: AbortSignal,
): Promise<DiarizationResult> {
  assertStereo(audio);
  const [left, right] = audio.channels;
  const result = await runAudioJob(
    { kind: 'stereo', sampleRateHz: audio.sampleRateHz, left, right, mode },
    transferables([left, right]),
    signal,
  );
  if (result.kind !== 'stereo') {
    throw new AudioWorkerError(`unexpected '${result.kind}' reply to a stereo job`);
  }
  audio.channels[0] = result.left;
  audio.channels[1] = result.right;
  return result.result;
}
