import client from 'prom-client';
import { log } from './log';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records TRUE milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'transcription_api_';

let defaultMetricsEnabled = false;

// HTTP request duration in milliseconds
const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds, from dispatch to response written',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 300000],
  registers: [register],
});

// Pipeline stage duration in milliseconds (decode/transcription/enhancement/diarization)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds (decode/transcription/enhancement/diarization)',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000, 300000, 1200000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by pipeline stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const activeConnections = new client.Gauge({
  name: `${METRICS_PREFIX}active_connections`,
  help: 'Accepted connections not yet closed',
  registers: [register],
});

const connectionTimeoutsTotal = new client.Counter({
  name: `${METRICS_PREFIX}connection_timeouts_total`,
  help: 'Connections cancelled by the inactivity or processing timer',
  labelNames: ['kind'] as const,
  registers: [register],
});

const payloadTooLargeTotal = new client.Counter({
  name: `${METRICS_PREFIX}payload_too_large_total`,
  help: 'Requests rejected with 413',
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Unknown paths collapse into one label to keep cardinality bounded
const KNOWN_ROUTES = new Set(['/health', '/api/transcribe', '/metrics']);

export function routeLabel(path: string): string {
  return KNOWN_ROUTES.has(path) ? path : 'unmatched';
}

export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  defaultMetricsEnabled = true;
  client.collectDefaultMetrics({ register, prefix: METRICS_PREFIX });
}

export function metricsContentType(): string {
  return register.contentType;
}

export async function renderMetrics(): Promise<string> {
  return register.metrics();
}

export function observeHttpRequest(method: string, path: string, statusCode: number, durationMs: number): void {
  try {
    httpRequestDurationMs.observe(
      { method, route: routeLabel(path), code: String(statusCode) },
      durationMs,
    );
  } catch (error) {
    // never break requests due to metrics
    log.debug({ err: error, event: 'metrics_observe_failed', metric: 'http_request_duration_ms' }, 'metrics observe failed');
  }
}

// ---------- stage timing API ----------

/**
 * Starts a stage timer and returns an end() function that reports the
 * elapsed milliseconds.
 */
export function startStageTimer(stage: string): () => number {
  const start = nowNs();

  return () => {
    const durationMs = nsToMs(nowNs() - start);
    try {
      stageDurationMs.observe({ stage }, durationMs);
    } catch (error) {
      log.debug({ err: error, event: 'metrics_observe_failed', metric: 'stage_duration_ms', stage }, 'metrics observe failed');
    }
    return durationMs;
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incActiveConnections(): void {
  activeConnections.inc();
}

export function decActiveConnections(): void {
  activeConnections.dec();
}

export function incConnectionTimeout(kind: 'inactivity' | 'processing'): void {
  connectionTimeoutsTotal.inc({ kind });
}

export function incPayloadTooLarge(): void {
  payloadTooLargeTotal.inc();
}
