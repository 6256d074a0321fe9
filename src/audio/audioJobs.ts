import { z } from 'zod';
import type { DiarizationMode, DiarizationResult } from '../diarization/types';

/** Work handed to an audio worker thread; typed arrays travel as transferables. */
export type AudioJob =
  | { kind: 'prepare'; inputPath: string }
  | { kind: 'stereo'; sampleRateHz: number; left: Float32Array; right: Float32Array; mode: DiarizationMode };

export type AudioJobResult =
  | { kind: 'prepare'; sampleRateHz: number; channels: Float32Array[]; engineWav: Uint8Array }
  | { kind: 'stereo'; result: DiarizationResult; left: Float32Array; right: Float32Array };

export type AudioWorkerReply = { ok: true; result: AudioJobResult } | { ok: false; message: string };

const Float32ArraySchema = z.instanceof(Float32Array);

export const AudioJobSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('prepare'), inputPath: z.string() }),
  z.object({
    kind: z.literal('stereo'),
    sampleRateHz: z.number().positive(),
    left: Float32ArraySchema,
    right: Float32ArraySchema,
    mode: z.enum(['fast', 'balanced', 'accurate']),
  }),
]);

const DiarizationResultSchema = z.object({
  segments: z.array(
    z.object({
      start: z.number(),
      end: z.number(),
      speaker: z.string(),
      confidence: z.number().optional(),
    }),
  ),
  speakers: z.array(z.string()),
  totalDuration: z.number(),
  method: z.enum(['stereo', 'tinydiarize', 'pyannote', 'none']),
});

const AudioJobResultSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('prepare'),
    sampleRateHz: z.number(),
    channels: z.array(Float32ArraySchema),
    engineWav: z.instanceof(Uint8Array),
  }),
  z.object({
    kind: z.literal('stereo'),
    result: DiarizationResultSchema,
    left: Float32ArraySchema,
    right: Float32ArraySchema,
  }),
]);

export const AudioWorkerReplySchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: AudioJobResultSchema }),
  z.object({ ok: z.literal(false), message: z.string() }),
]);

/**
 * Buffers that can move to the other thread without a copy. Views that share
 * their buffer with other data (pooled Buffers, subarrays) are left out and
 * get cloned instead.
 */
export function transferables(views: ArrayBufferView[]): ArrayBuffer[] {
  const buffers: ArrayBuffer[] = [];
  for (const view of views) {
    const { buffer } = view;
    if (
      buffer instanceof ArrayBuffer &&
      view.byteOffset === 0 &&
      view.byteLength === buffer.byteLength &&
      !buffers.includes(buffer)
    ) {
      buffers.push(buffer);
    }
  }
  return buffers;
}
