import net from 'net';
import { randomUUID } from 'crypto';
import { BindScope, bindHost, ConnectionLimits, LargeUploadLimits } from '../config';
import { log } from '../log';
import { Connection, ConnectionSummary } from './connection';
import type { RequestHandler } from './types';

export class BindError extends Error {
  constructor(
    public readonly port: number,
    public readonly host: string,
    public readonly code: string | undefined,
    options?: { cause?: unknown },
  ) {
    super(`Failed to bind ${host}:${port}${code ? ` (${code})` : ''}`, options);
    this.name = 'BindError';
  }
}

export interface HttpListenerOptions {
  handler: RequestHandler;
  limits: ConnectionLimits;
  largeUpload: LargeUploadLimits;
  onConnectionClosed?: (summary: ConnectionSummary) => void;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * TCP acceptor. Each accepted socket gets its own `Connection`; connections
 * never share mutable state.
 */
export class HttpListener {
  private server: net.Server | null = null;
  private readonly connections = new Map<string, Connection>();

  constructor(private readonly options: HttpListenerOptions) {}

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  get openConnections(): number {
    return this.connections.size;
  }

  /** Bound port; differs from the requested one when port 0 was asked for. */
  port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') return null;
    return address.port;
  }

  async start(port: number, scope: BindScope): Promise<void> {
    if (this.server) {
      throw new Error('listener already started');
    }
    const host = bindHost(scope);
    const server = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening);
        reject(new BindError(port, host, errorCode(error), { cause: error }));
      };
      const onListening = () => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(port, host);
    });

    server.on('error', (error) => {
      log.error({ err: error, event: 'listener_error' }, 'listener error');
    });
    this.server = server;

    log.info({ event: 'listener_started', host, port: this.port(), scope }, 'listener started');
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const connection of this.connections.values()) {
      connection.destroy('server_stopped');
    }
    this.connections.clear();

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    log.info({ event: 'listener_stopped' }, 'listener stopped');
  }

  private accept(socket: net.Socket): void {
    socket.setNoDelay(true);
    const id = randomUUID();
    const connection = new Connection({
      id,
      socket,
      handler: this.options.handler,
      limits: this.options.limits,
      largeUpload: this.options.largeUpload,
      onClosed: (summary) => {
        this.connections.delete(id);
        this.options.onConnectionClosed?.(summary);
      },
    });
    this.connections.set(id, connection);
    connection.start();
  }
}
