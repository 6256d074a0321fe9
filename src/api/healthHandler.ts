import os from 'os';
import type { BindScope } from '../config';
import { jsonResponse } from '../http/responses';
import type { RequestHandler } from '../http/types';
import type { ModelState } from '../transcription/modelState';
import type { RequestStats } from './requestStats';

export const CAPABILITIES = [
  'speech-to-text',
  'multi-model-support',
  'ai-enhancement',
  'word-replacement',
  'local-transcription',
  'cloud-transcription',
  'speaker-diarization',
] as const;

export interface HealthSnapshot {
  status: 'healthy';
  service: string;
  version: string;
  /** Unix seconds. */
  timestamp: number;
  system: {
    platform: string;
    osVersion: string;
    processorCount: number;
    memoryUsageMB: number;
    uptimeSeconds: number;
  };
  api: {
    endpoint: string;
    port: number;
    isRunning: boolean;
    requestsServed: number;
    averageProcessingTimeMs: number;
  };
  transcription: {
    currentModel: string | null;
    modelLoaded: boolean;
    availableModels: string[];
    enhancementEnabled: boolean;
    wordReplacementEnabled: boolean;
  };
  capabilities: string[];
}

export interface HealthSource {
  serviceName: string;
  serviceVersion: string;
  bindScope: BindScope;
  port(): number;
  isRunning(): boolean;
  startedAt(): number | null;
  stats: RequestStats;
  state: ModelState;
}

export async function buildHealthSnapshot(source: HealthSource, now = Date.now()): Promise<HealthSnapshot> {
  const models = await source.state.snapshot();
  const stats = source.stats.snapshot();
  const startedAt = source.startedAt();
  const port = source.port();

  return {
    status: 'healthy',
    service: source.serviceName,
    version: source.serviceVersion,
    timestamp: now / 1000,
    system: {
      platform: os.platform(),
      osVersion: os.release(),
      processorCount: os.cpus().length,
      memoryUsageMB: process.memoryUsage().rss / 1024 / 1024,
      uptimeSeconds: startedAt === null ? 0 : (now - startedAt) / 1000,
    },
    api: {
      endpoint: `http://${source.bindScope === 'all' ? '0.0.0.0' : 'localhost'}:${port}`,
      port,
      isRunning: source.isRunning(),
      requestsServed: stats.requestsServed,
      averageProcessingTimeMs: stats.averageProcessingTimeMs,
    },
    transcription: {
      currentModel: models.current?.displayName ?? null,
      modelLoaded: models.loaded,
      availableModels: models.available.map((model) => model.displayName),
      enhancementEnabled: models.enhancementEnabled,
      wordReplacementEnabled: models.wordReplacementEnabled,
    },
    capabilities: [...CAPABILITIES],
  };
}

export function healthHandler(source: HealthSource): RequestHandler {
  return async () => jsonResponse(200, await buildHealthSnapshot(source));
}
