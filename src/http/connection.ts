import type { ConnectionLimits, LargeUploadLimits } from '../config';
import { ApiError, PayloadTooLargeError, ProcessingTimeoutError, ProtocolError, toApiError } from '../errors';
import { log } from '../log';
import {
  decActiveConnections,
  incActiveConnections,
  incConnectionTimeout,
  incPayloadTooLarge,
  observeHttpRequest,
} from '../metrics';
import { BodyAccumulator, ConnectionPolicy, selectPolicy, standardPolicy } from './connectionPolicy';
import { findHeaderTerminator, HEADER_TERMINATOR, parseRequestHead } from './requestParser';
import { errorResponse, serializeInterim, serializeResponse } from './responses';
import type {
  ConnectionSocket,
  HttpResponse,
  ParsedRequest,
  RequestContext,
  RequestHandler,
  RequestHead,
} from './types';

export type CloseReason =
  | 'response_sent'
  | 'response_write_failed'
  | 'client_closed'
  | 'inactivity_timeout'
  | 'socket_error'
  | 'server_stopped';

export type ConnectionPhase =
  | { kind: 'reading_headers'; buffer: Buffer; scannedTo: number }
  | { kind: 'reading_body'; head: RequestHead; body: BodyAccumulator }
  | { kind: 'dispatched'; request: ParsedRequest; dispatchedAt: number }
  | { kind: 'responding'; status: number }
  | { kind: 'closed'; reason: CloseReason };

export interface ConnectionSummary {
  id: string;
  method: string | null;
  path: string | null;
  status: number | null;
  /** Dispatch to response written; null when nothing was dispatched. */
  processingMs: number | null;
  reason: CloseReason;
}

export interface ConnectionOptions {
  id: string;
  socket: ConnectionSocket;
  handler: RequestHandler;
  limits: ConnectionLimits;
  largeUpload: LargeUploadLimits;
  onClosed?: (summary: ConnectionSummary) => void;
}

const EMPTY = Buffer.alloc(0);

/**
 * One accepted socket, driven through
 * reading_headers -> reading_body -> dispatched -> responding -> closed.
 *
 * Every transition goes through `transition()`, so dispatch and the final
 * response each happen at most once no matter how read, timer and close
 * events interleave.
 */
export class Connection {
  readonly id: string;
  private readonly socket: ConnectionSocket;
  private readonly handler: RequestHandler;
  private readonly limits: ConnectionLimits;
  private readonly largeUpload: LargeUploadLimits;
  private readonly onClosed?: (summary: ConnectionSummary) => void;

  private phase: ConnectionPhase = { kind: 'reading_headers', buffer: EMPTY, scannedTo: 0 };
  private policy: ConnectionPolicy;
  private readonly abort = new AbortController();
  private readonly createdAt = Date.now();
  private lastActivityAt = Date.now();

  private inactivityTimer: NodeJS.Timeout | null = null;
  private processingTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;

  private requestLine: { method: string; path: string } | null = null;
  private dispatchedAt: number | null = null;
  private responseStatus: number | null = null;

  constructor(options: ConnectionOptions) {
    this.id = options.id;
    this.socket = options.socket;
    this.handler = options.handler;
    this.limits = options.limits;
    this.largeUpload = options.largeUpload;
    this.onClosed = options.onClosed;
    this.policy = standardPolicy(options.limits);
  }

  start(): void {
    incActiveConnections();
    this.socket.on('data', (chunk) => this.feed(chunk));
    this.socket.on('end', () => this.onEnd());
    this.socket.on('error', (error) => this.onSocketError(error));
    this.socket.on('close', () => this.close('client_closed'));
    this.armInactivityTimer();

    log.debug(
      { event: 'connection_accepted', connection_id: this.id, remote_address: this.socket.remoteAddress },
      'connection accepted',
    );
  }

  get state(): ConnectionPhase['kind'] {
    return this.phase.kind;
  }

  get profile(): ConnectionPolicy['profile'] {
    return this.policy.profile;
  }

  /** Feeds bytes read from the socket into the framing state machine. */
  feed(chunk: Buffer): void {
    let offset = 0;
    // The slice size is re-read each step: the profile can switch once headers are parsed.
    while (offset < chunk.length) {
      if (this.phase.kind !== 'reading_headers' && this.phase.kind !== 'reading_body') {
        return;
      }
      const end = Math.min(chunk.length, offset + this.policy.readSliceBytes);
      this.touch();
      this.consume(chunk.subarray(offset, end));
      offset = end;
    }
  }

  /** Cancels the connection without a response, e.g. when the listener stops. */
  destroy(reason: CloseReason = 'server_stopped'): void {
    this.close(reason);
  }

  private consume(bytes: Buffer): void {
    if (this.phase.kind === 'reading_headers') {
      this.consumeHeaderBytes(this.phase, bytes);
      return;
    }
    if (this.phase.kind === 'reading_body') {
      this.phase.body.append(bytes);
      if (this.phase.body.isComplete()) {
        this.dispatch(this.phase.head, this.phase.body.toBuffer());
      }
    }
  }

  private consumeHeaderBytes(phase: Extract<ConnectionPhase, { kind: 'reading_headers' }>, bytes: Buffer): void {
    const buffer = phase.buffer.length === 0 ? bytes : Buffer.concat([phase.buffer, bytes]);
    const terminator = findHeaderTerminator(buffer, phase.scannedTo);

    if (terminator === -1) {
      if (buffer.length > this.limits.maxHeaderBytes) {
        this.fail(new ProtocolError('request headers too large'));
        return;
      }
      this.phase = { kind: 'reading_headers', buffer, scannedTo: buffer.length };
      return;
    }
    if (terminator > this.limits.maxHeaderBytes) {
      this.fail(new ProtocolError('request headers too large'));
      return;
    }

    let head: RequestHead;
    try {
      head = parseRequestHead(buffer.subarray(0, terminator));
    } catch (error) {
      this.fail(toApiError(error));
      return;
    }
    this.requestLine = { method: head.method, path: head.path };

    if (head.chunked) {
      this.fail(new ProtocolError('chunked transfer encoding is not supported; send Content-Length'));
      return;
    }

    const contentLength = head.contentLength ?? 0;
    if (contentLength > this.limits.maxBodyBytes) {
      incPayloadTooLarge();
      log.warn(
        {
          event: 'payload_too_large',
          connection_id: this.id,
          declared_bytes: contentLength,
          max_bytes: this.limits.maxBodyBytes,
        },
        'request body exceeds limit',
      );
      this.fail(new PayloadTooLargeError(contentLength, this.limits.maxBodyBytes));
      return;
    }

    const rest = buffer.subarray(terminator + HEADER_TERMINATOR.length);

    if (contentLength === 0) {
      this.dispatch(head, EMPTY);
      return;
    }

    this.applyPolicy(selectPolicy(contentLength, this.limits, this.largeUpload));

    if (head.expectContinue && rest.length === 0) {
      this.socket.write(serializeInterim(100));
    }

    const body = this.policy.createBody(contentLength, (received, expected) => {
      log.info(
        { event: 'upload_progress', connection_id: this.id, received_bytes: received, expected_bytes: expected },
        'upload progress',
      );
    });
    this.phase = { kind: 'reading_body', head, body };

    if (rest.length > 0) {
      body.append(rest);
    }
    if (body.isComplete()) {
      this.dispatch(head, body.toBuffer());
    }
  }

  private applyPolicy(policy: ConnectionPolicy): void {
    if (policy.profile === this.policy.profile) return;
    this.policy = policy;
    if (policy.heartbeatIntervalMs !== null) {
      this.socket.setKeepAlive(true, policy.heartbeatIntervalMs);
    }
    this.armInactivityTimer();
    log.info(
      {
        event: 'connection_profile_selected',
        connection_id: this.id,
        profile: policy.profile,
        inactivity_timeout_ms: policy.inactivityTimeoutMs,
        processing_timeout_ms: policy.processingTimeoutMs,
      },
      'connection profile selected',
    );
  }

  private dispatch(head: RequestHead, body: Buffer): void {
    if (this.phase.kind !== 'reading_headers' && this.phase.kind !== 'reading_body') {
      return;
    }

    const request: ParsedRequest = {
      method: head.method,
      path: head.path,
      query: head.query,
      headers: head.headers,
      body,
    };
    const dispatchedAt = Date.now();
    this.phase = { kind: 'dispatched', request, dispatchedAt };
    this.dispatchedAt = dispatchedAt;

    // No further reads: anything past the declared length is ignored.
    this.socket.pause();
    if (this.policy.idleTimerDuringProcessing) {
      this.armInactivityTimer();
    } else {
      this.clearInactivityTimer();
    }
    this.startHeartbeat();
    this.processingTimer = setTimeout(() => this.onProcessingTimeout(), this.policy.processingTimeoutMs);
    this.processingTimer.unref?.();

    log.info(
      {
        event: 'request_dispatched',
        connection_id: this.id,
        method: request.method,
        path: request.path,
        body_bytes: body.length,
        profile: this.policy.profile,
      },
      'request dispatched',
    );

    const context: RequestContext = {
      connectionId: this.id,
      profile: this.policy.profile,
      signal: this.abort.signal,
    };

    let pending: Promise<HttpResponse>;
    try {
      pending = this.handler(request, context);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      (response) => this.respond(response),
      (error: unknown) => {
        const apiError = toApiError(error);
        if (apiError.status >= 500) {
          log.error({ err: error, event: 'handler_failed', connection_id: this.id }, 'request handler failed');
        }
        this.respond(errorResponse(apiError));
      },
    );
  }

  private fail(error: ApiError): void {
    // Protocol-level failures stop the read side before answering.
    this.socket.pause();
    this.respond(errorResponse(error));
  }

  private respond(response: HttpResponse): void {
    if (this.phase.kind === 'responding' || this.phase.kind === 'closed') {
      log.debug(
        { event: 'response_suppressed', connection_id: this.id, status: response.status, state: this.phase.kind },
        'response suppressed',
      );
      return;
    }

    this.phase = { kind: 'responding', status: response.status };
    this.responseStatus = response.status;
    this.stopHeartbeat();
    this.clearProcessingTimer();
    this.armInactivityTimer();

    let bytes: Buffer;
    try {
      bytes = serializeResponse(response);
    } catch (error) {
      log.error({ err: error, event: 'response_serialize_failed', connection_id: this.id }, 'response serialize failed');
      this.close('response_write_failed');
      return;
    }

    this.socket.end(bytes, () => {
      this.close('response_sent');
    });
  }

  private onProcessingTimeout(): void {
    this.processingTimer = null;
    if (this.phase.kind !== 'dispatched') return;

    const error = new ProcessingTimeoutError(this.policy.processingTimeoutMs);
    incConnectionTimeout('processing');
    log.warn(
      {
        event: 'processing_timeout',
        connection_id: this.id,
        timeout_ms: this.policy.processingTimeoutMs,
        path: this.phase.request.path,
      },
      'processing timeout',
    );
    this.abort.abort(error);
    this.respond(errorResponse(error));
  }

  private onEnd(): void {
    // Half-close from the client: a request still being framed can never complete.
    if (this.phase.kind === 'reading_headers' || this.phase.kind === 'reading_body') {
      const received = this.phase.kind === 'reading_body' ? this.phase.body.received : this.phase.buffer.length;
      if (received === 0 && this.phase.kind === 'reading_headers') {
        this.close('client_closed');
        return;
      }
      this.fail(new ProtocolError('connection closed before the request was complete'));
    }
  }

  private onSocketError(error: Error): void {
    const level = this.phase.kind === 'responding' ? 'error' : 'warn';
    log[level](
      {
        err: error,
        event: this.phase.kind === 'responding' ? 'response_write_failed' : 'connection_socket_error',
        connection_id: this.id,
        state: this.phase.kind,
      },
      'connection socket error',
    );
    this.close(this.phase.kind === 'responding' ? 'response_write_failed' : 'socket_error');
  }

  private close(reason: CloseReason): void {
    if (this.phase.kind === 'closed') return;
    const previous = this.phase.kind;
    this.phase = { kind: 'closed', reason };

    this.clearInactivityTimer();
    this.clearProcessingTimer();
    this.stopHeartbeat();
    if (!this.abort.signal.aborted) {
      this.abort.abort(new Error(`connection_closed:${reason}`));
    }
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
    decActiveConnections();

    const processingMs = this.dispatchedAt === null ? null : Date.now() - this.dispatchedAt;
    if (this.requestLine && this.responseStatus !== null && processingMs !== null) {
      observeHttpRequest(this.requestLine.method, this.requestLine.path, this.responseStatus, processingMs);
    }

    log.debug(
      {
        event: 'connection_closed',
        connection_id: this.id,
        reason,
        previous_state: previous,
        status: this.responseStatus,
        lifetime_ms: Date.now() - this.createdAt,
      },
      'connection closed',
    );

    this.onClosed?.({
      id: this.id,
      method: this.requestLine?.method ?? null,
      path: this.requestLine?.path ?? null,
      status: this.responseStatus,
      processingMs,
      reason,
    });
  }

  // ---------- timers ----------

  private touch(): void {
    this.lastActivityAt = Date.now();
    if (this.inactivityTimer) {
      this.inactivityTimer.refresh();
    }
  }

  private armInactivityTimer(): void {
    this.clearInactivityTimer();
    this.inactivityTimer = setTimeout(() => this.onInactivityTimeout(), this.policy.inactivityTimeoutMs);
    this.inactivityTimer.unref?.();
  }

  private clearInactivityTimer(): void {
    if (this.inactivityTimer) {
      clearTimeout(this.inactivityTimer);
      this.inactivityTimer = null;
    }
  }

  private clearProcessingTimer(): void {
    if (this.processingTimer) {
      clearTimeout(this.processingTimer);
      this.processingTimer = null;
    }
  }

  private onInactivityTimeout(): void {
    this.inactivityTimer = null;
    incConnectionTimeout('inactivity');
    log.warn(
      {
        event: 'connection_timeout',
        connection_id: this.id,
        state: this.phase.kind,
        idle_ms: Date.now() - this.lastActivityAt,
        timeout_ms: this.policy.inactivityTimeoutMs,
        received_bytes: this.phase.kind === 'reading_body' ? this.phase.body.received : undefined,
      },
      'connection inactivity timeout',
    );
    this.close('inactivity_timeout');
  }

  private startHeartbeat(): void {
    const interval = this.policy.heartbeatIntervalMs;
    if (interval === null) return;
    this.heartbeatTimer = setInterval(() => this.heartbeat(), interval);
    this.heartbeatTimer.unref?.();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private heartbeat(): void {
    if (this.phase.kind !== 'dispatched') return;
    this.touch();
    const elapsedMs = Date.now() - this.phase.dispatchedAt;
    log.info(
      { event: 'processing_heartbeat', connection_id: this.id, elapsed_ms: elapsedMs, path: this.phase.request.path },
      'processing in progress',
    );
    if (this.policy.interimResponses) {
      this.socket.write(serializeInterim(102), (error) => {
        if (error) {
          log.warn({ err: error, event: 'heartbeat_write_failed', connection_id: this.id }, 'heartbeat write failed');
        }
      });
    }
  }
}
