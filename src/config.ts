import os from 'os';
import { env } from './env';

export type BindScope = 'loopback' | 'all';

export type DiarizationFailurePolicy = 'degrade' | 'fail';

export interface ConnectionLimits {
  maxBodyBytes: number;
  maxHeaderBytes: number;
  readChunkBytes: number;
  inactivityTimeoutMs: number;
  processingTimeoutMs: number;
}

export interface LargeUploadLimits {
  thresholdBytes: number;
  inactivityTimeoutMs: number;
  chunkBytes: number;
  keepAliveIntervalMs: number;
  /** Write `102 Processing` on every heartbeat. Off by default: not every client skips 1xx. */
  interimResponses: boolean;
}

export interface ServerConfig {
  port: number;
  bindScope: BindScope;
  serviceName: string;
  serviceVersion: string;
  connection: ConnectionLimits;
  largeUpload: LargeUploadLimits;
  language: string;
  tempDir: string;
  diarizationFailurePolicy: DiarizationFailurePolicy;
}

export function bindHost(scope: BindScope): string {
  return scope === 'all' ? '0.0.0.0' : '127.0.0.1';
}

export function loadServerConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: env.PORT,
    bindScope: env.API_BIND_SCOPE,
    serviceName: env.SERVICE_NAME,
    serviceVersion: env.SERVICE_VERSION,
    connection: {
      maxBodyBytes: env.MAX_BODY_BYTES,
      maxHeaderBytes: env.MAX_HEADER_BYTES,
      readChunkBytes: env.READ_CHUNK_BYTES,
      inactivityTimeoutMs: env.INACTIVITY_TIMEOUT_MS,
      processingTimeoutMs: env.PROCESSING_TIMEOUT_MS,
    },
    largeUpload: {
      thresholdBytes: env.LARGE_UPLOAD_THRESHOLD_BYTES,
      inactivityTimeoutMs: env.LARGE_UPLOAD_TIMEOUT_MS,
      chunkBytes: env.LARGE_UPLOAD_CHUNK_BYTES,
      keepAliveIntervalMs: env.KEEP_ALIVE_INTERVAL_MS,
      interimResponses: env.LARGE_UPLOAD_INTERIM_RESPONSES,
    },
    language: env.TRANSCRIPTION_LANGUAGE,
    tempDir: env.TEMP_DIR ?? os.tmpdir(),
    diarizationFailurePolicy: env.DIARIZATION_FAILURE_POLICY,
    ...overrides,
  };
}
