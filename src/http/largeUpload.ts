import type { ConnectionLimits, LargeUploadLimits } from '../config';
import type { BodyAccumulator, ConnectionPolicy } from './connectionPolicy';

/**
 * Body buffer for multi-hour recordings. Storage grows with the bytes that
 * actually arrive (doubling, capped at the declared length) so a declared
 * `Content-Length` alone commits no memory. `onProgress` fires each time
 * another `chunkBytes` have arrived.
 */
export class GrowingBody implements BodyAccumulator {
  private buffer: Buffer = Buffer.alloc(0);
  private receivedBytes = 0;
  private nextProgressAt: number;

  constructor(
    public readonly expected: number,
    private readonly chunkBytes: number,
    private readonly onProgress: (received: number, expected: number) => void,
  ) {
    this.nextProgressAt = chunkBytes;
  }

  get received(): number {
    return this.receivedBytes;
  }

  /** Bytes currently allocated for the body. */
  get capacity(): number {
    return this.buffer.length;
  }

  append(chunk: Buffer): number {
    const missing = this.expected - this.receivedBytes;
    if (missing <= 0) return 0;
    const taken = Math.min(missing, chunk.length);
    this.reserve(this.receivedBytes + taken);
    chunk.copy(this.buffer, this.receivedBytes, 0, taken);
    this.receivedBytes += taken;

    if (this.receivedBytes >= this.nextProgressAt || this.receivedBytes === this.expected) {
      this.onProgress(this.receivedBytes, this.expected);
      while (this.nextProgressAt <= this.receivedBytes) {
        this.nextProgressAt += this.chunkBytes;
      }
    }
    return taken;
  }

  isComplete(): boolean {
    return this.receivedBytes >= this.expected;
  }

  toBuffer(): Buffer {
    return this.buffer.subarray(0, this.receivedBytes);
  }

  private reserve(needed: number): void {
    if (needed <= this.buffer.length) return;
    const grown = Math.max(needed, this.buffer.length * 2, Math.min(this.chunkBytes, this.expected));
    const next = Buffer.allocUnsafe(Math.min(this.expected, grown));
    this.buffer.copy(next, 0, 0, this.receivedBytes);
    this.buffer = next;
  }
}

export function largeUploadPolicy(limits: ConnectionLimits, largeUpload: LargeUploadLimits): ConnectionPolicy {
  return {
    profile: 'large_upload',
    inactivityTimeoutMs: Math.max(limits.inactivityTimeoutMs, largeUpload.inactivityTimeoutMs),
    processingTimeoutMs: Math.max(limits.processingTimeoutMs, largeUpload.inactivityTimeoutMs),
    readSliceBytes: largeUpload.chunkBytes,
    idleTimerDuringProcessing: true,
    heartbeatIntervalMs: largeUpload.keepAliveIntervalMs,
    interimResponses: largeUpload.interimResponses,
    createBody: (expected, onProgress) => new GrowingBody(expected, largeUpload.chunkBytes, onProgress),
  };
}
