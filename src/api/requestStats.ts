export interface RequestStatsSnapshot {
  requestsServed: number;
  averageProcessingTimeMs: number;
}

/**
 * Process-wide request counter and cumulative latency. Connections record
 * into it from their close callbacks; each record is a single synchronous
 * update, so concurrent connections cannot lose increments.
 */
export class RequestStats {
  private count = 0;
  private totalMs = 0;

  record(processingMs: number): void {
    this.count += 1;
    this.totalMs += Math.max(0, processingMs);
  }

  snapshot(): RequestStatsSnapshot {
    return {
      requestsServed: this.count,
      averageProcessingTimeMs: this.count > 0 ? this.totalMs / this.count : 0,
    };
  }
}
