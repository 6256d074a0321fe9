import type { ConnectionLimits, LargeUploadLimits } from '../config';
import type { ConnectionProfile } from './types';
import { largeUploadPolicy } from './largeUpload';

export interface BodyAccumulator {
  readonly expected: number;
  readonly received: number;
  /** Appends at most the bytes still missing; returns how many were taken. */
  append(chunk: Buffer): number;
  isComplete(): boolean;
  toBuffer(): Buffer;
}

export interface ConnectionPolicy {
  readonly profile: ConnectionProfile;
  readonly inactivityTimeoutMs: number;
  readonly processingTimeoutMs: number;
  /** Bytes handed to the framing logic per step; larger socket reads are sliced. */
  readonly readSliceBytes: number;
  /** Keep the inactivity timer armed while the handler runs (heartbeats reset it). */
  readonly idleTimerDuringProcessing: boolean;
  readonly heartbeatIntervalMs: number | null;
  readonly interimResponses: boolean;
  createBody(expected: number, onProgress: (received: number, expected: number) => void): BodyAccumulator;
}

export class ChunkListBody implements BodyAccumulator {
  private readonly chunks: Buffer[] = [];
  private receivedBytes = 0;

  constructor(public readonly expected: number) {}

  get received(): number {
    return this.receivedBytes;
  }

  append(chunk: Buffer): number {
    const missing = this.expected - this.receivedBytes;
    if (missing <= 0) return 0;
    const taken = chunk.length > missing ? chunk.subarray(0, missing) : chunk;
    this.chunks.push(taken);
    this.receivedBytes += taken.length;
    return taken.length;
  }

  isComplete(): boolean {
    return this.receivedBytes >= this.expected;
  }

  toBuffer(): Buffer {
    return this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.receivedBytes);
  }
}

export function standardPolicy(limits: ConnectionLimits): ConnectionPolicy {
  return {
    profile: 'standard',
    inactivityTimeoutMs: limits.inactivityTimeoutMs,
    processingTimeoutMs: limits.processingTimeoutMs,
    readSliceBytes: limits.readChunkBytes,
    idleTimerDuringProcessing: false,
    heartbeatIntervalMs: null,
    interimResponses: false,
    createBody: (expected) => new ChunkListBody(expected),
  };
}

export function selectPolicy(
  contentLength: number,
  limits: ConnectionLimits,
  largeUpload: LargeUploadLimits,
): ConnectionPolicy {
  if (contentLength >= largeUpload.thresholdBytes) {
    return largeUploadPolicy(limits, largeUpload);
  }
  return standardPolicy(limits);
}
