import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import type { ConnectionLimits, LargeUploadLimits } from '../src/config';
import type { ConnectionSummary } from '../src/http/connection';
import type { RequestHandler } from '../src/http/types';
import { parseResponseText } from './helpers/httpText';
import { openSocket, rawRequest } from './helpers/rawHttp';
import { setTestEnv } from './testEnv';

setTestEnv();

const limits: ConnectionLimits = {
  maxBodyBytes: 1024 * 1024,
  maxHeaderBytes: 16 * 1024,
  readChunkBytes: 64 * 1024,
  inactivityTimeoutMs: 5_000,
  processingTimeoutMs: 5_000,
};

const largeUpload: LargeUploadLimits = {
  thresholdBytes: 512 * 1024,
  inactivityTimeoutMs: 10_000,
  chunkBytes: 64 * 1024,
  keepAliveIntervalMs: 30_000,
  interimResponses: false,
};

async function startListener(handler: RequestHandler) {
  const { HttpListener } = await import('../src/http/listener');
  const summaries: ConnectionSummary[] = [];
  const listener = new HttpListener({
    handler,
    limits,
    largeUpload,
    onConnectionClosed: (summary) => summaries.push(summary),
  });
  await listener.start(0, 'loopback');
  const port = listener.port();
  assert.ok(port !== null && port > 0);
  return { listener, port, summaries };
}

test('listener binds an ephemeral loopback port and serves requests', async () => {
  const { listener, port, summaries } = await startListener(async (request) => ({
    status: 200,
    contentType: 'text/plain',
    body: `${request.method} ${request.path} ${request.body.length}`,
  }));

  try {
    assert.equal(listener.listening, true);
    const raw = await rawRequest(port, 'POST /echo HTTP/1.1\r\nContent-Length: 4\r\n\r\nabcd');
    const response = parseResponseText(raw);
    assert.equal(response.status, 200);
    assert.equal(response.headers.connection, 'close');
    assert.equal(response.body, 'POST /echo 4');
    await delay(20);
    assert.equal(summaries.length, 1);
    assert.equal(summaries[0].reason, 'response_sent');
    assert.equal(listener.openConnections, 0);
  } finally {
    await listener.stop();
  }
  assert.equal(listener.listening, false);
});

test('listener answers after the client half-closes its side', async () => {
  const { listener, port } = await startListener(async () => ({ status: 200, contentType: 'text/plain', body: 'ok' }));
  try {
    const raw = await rawRequest(port, 'GET /health HTTP/1.1\r\n\r\n', { endAfterWrite: true });
    assert.equal(parseResponseText(raw).body, 'ok');
  } finally {
    await listener.stop();
  }
});

test('a slow request does not hold up other connections', async () => {
  const { listener, port } = await startListener(async (request) => {
    if (request.path === '/slow') {
      await delay(200);
    }
    return { status: 200, contentType: 'text/plain', body: request.path };
  });
  try {
    const order: string[] = [];
    const slow = rawRequest(port, 'GET /slow HTTP/1.1\r\n\r\n').then((raw) => order.push(parseResponseText(raw).body));
    await delay(20);
    const fast = rawRequest(port, 'GET /fast HTTP/1.1\r\n\r\n').then((raw) => order.push(parseResponseText(raw).body));
    await Promise.all([slow, fast]);
    assert.deepEqual(order, ['/fast', '/slow']);
  } finally {
    await listener.stop();
  }
});

test('listener reports a port that is already taken as BindError', async () => {
  const { listener, port } = await startListener(async () => ({ status: 200, body: '' }));
  const { HttpListener, BindError } = await import('../src/http/listener');
  const second = new HttpListener({ handler: async () => ({ status: 200, body: '' }), limits, largeUpload });
  try {
    await assert.rejects(second.start(port, 'loopback'), (error: unknown) => {
      assert.ok(error instanceof BindError);
      assert.equal(error.code, 'EADDRINUSE');
      assert.equal(error.message, `Failed to bind 127.0.0.1:${port} (EADDRINUSE)`);
      return true;
    });
    assert.equal(second.listening, false);
  } finally {
    await listener.stop();
  }
});

test('stop cancels in-flight requests and closes their sockets', async () => {
  const seen: { signal?: AbortSignal } = {};
  const { listener, port, summaries } = await startListener(
    (_request, context) =>
      new Promise(() => {
        seen.signal = context.signal;
      }),
  );

  const socket = await openSocket(port);
  const closed = new Promise<void>((resolve) => socket.on('close', () => resolve()));
  socket.on('error', () => undefined);
  socket.write('GET /forever HTTP/1.1\r\n\r\n');
  await delay(50);
  assert.equal(listener.openConnections, 1);

  await listener.stop();
  await closed;

  assert.equal(seen.signal?.aborted, true);
  assert.equal(summaries[0].reason, 'server_stopped');
  assert.equal(listener.openConnections, 0);
});
