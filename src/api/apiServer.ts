import type { ServerConfig } from '../config';
import { HttpListener } from '../http/listener';
import { Router } from '../http/router';
import { log } from '../log';
import { metricsContentType, renderMetrics } from '../metrics';
import type { TranscriptionCoordinator } from '../transcription/coordinator';
import type { ModelState } from '../transcription/modelState';
import { healthHandler } from './healthHandler';
import { RequestStats } from './requestStats';
import { transcribeHandler } from './transcribeHandler';

export interface ApiServerOptions {
  config: ServerConfig;
  coordinator: TranscriptionCoordinator;
  state: ModelState;
}

/** Listener, routes and request counters of the transcription API. */
export class ApiServer {
  readonly stats = new RequestStats();
  readonly router = new Router();
  private readonly listener: HttpListener;
  private readonly config: ServerConfig;
  private startedAt: number | null = null;

  constructor(options: ApiServerOptions) {
    this.config = options.config;

    this.router
      .get(
        '/health',
        healthHandler({
          serviceName: this.config.serviceName,
          serviceVersion: this.config.serviceVersion,
          bindScope: this.config.bindScope,
          port: () => this.port,
          isRunning: () => this.isRunning,
          startedAt: () => this.startedAt,
          stats: this.stats,
          state: options.state,
        }),
      )
      .post('/api/transcribe', transcribeHandler(options.coordinator))
      .get('/metrics', async () => ({
        status: 200,
        contentType: metricsContentType(),
        body: await renderMetrics(),
      }));

    this.listener = new HttpListener({
      handler: this.router.handler(),
      limits: this.config.connection,
      largeUpload: this.config.largeUpload,
      onConnectionClosed: (summary) => {
        if (summary.status === null || summary.processingMs === null) return;
        this.stats.record(summary.processingMs);
        log.info(
          {
            event: 'request_completed',
            connection_id: summary.id,
            method: summary.method,
            path: summary.path,
            status: summary.status,
            processing_ms: summary.processingMs,
            reason: summary.reason,
          },
          'request completed',
        );
      },
    });
  }

  get isRunning(): boolean {
    return this.listener.listening;
  }

  /** Bound port, or the configured one before start. */
  get port(): number {
    return this.listener.port() ?? this.config.port;
  }

  async start(): Promise<void> {
    await this.listener.start(this.config.port, this.config.bindScope);
    this.startedAt = Date.now();
  }

  async stop(): Promise<void> {
    await this.listener.stop();
    this.startedAt = null;
  }
}
