import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import type { ConnectionLimits } from '../src/config';
import type { TranscriptionProvider } from '../src/transcription/provider';
import { FakeEnhancement, FakeProvider, failingDecoder, LOCAL_MODEL, lookupOf } from './helpers/fakes';
import { parseResponseText } from './helpers/httpText';
import { buildMultipart } from './helpers/multipart';
import { rawRequest } from './helpers/rawHttp';
import { makeToneWav } from './helpers/wav';
import { setTestEnv } from './testEnv';

setTestEnv();

const engine = new FakeProvider(async (input) => {
  await delay(input.durationSeconds < 0.5 ? 30 : 5);
  return {
    text: `transcript of ${input.durationSeconds}s`,
    segments: [{ start: 0, end: input.durationSeconds, text: `transcript of ${input.durationSeconds}s` }],
  };
});

async function startApi(options: { provider?: TranscriptionProvider; connection?: Partial<ConnectionLimits> } = {}) {
  const { buildServer } = await import('../src/server');
  const { loadServerConfig } = await import('../src/config');
  const { CatalogueModelStore } = await import('../src/transcription/modelStore');
  const { CompositeAudioDecoder } = await import('../src/audio/audioDecoder');
  const { noWordReplacement } = await import('../src/transcription/wordReplacement');

  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'api-test-'));
  const base = loadServerConfig({ port: 0, bindScope: 'loopback', tempDir });
  const built = await buildServer({
    config: { ...base, connection: { ...base.connection, ...options.connection } },
    store: new CatalogueModelStore([LOCAL_MODEL], async () => undefined),
    providers: lookupOf(options.provider ?? engine),
    decoder: new CompositeAudioDecoder(failingDecoder('ffmpeg missing')),
    wordReplacement: noWordReplacement,
    enhancement: new FakeEnhancement((text) => text, false),
    enhancementEnabled: false,
    wordReplacementEnabled: false,
  });
  await built.state.warmUp();
  await built.api.start();
  return { ...built, port: built.api.port, tempDir };
}

function post(pathName: string, contentType: string, body: Buffer): Buffer {
  const head =
    `POST ${pathName} HTTP/1.1\r\n` +
    'Host: localhost\r\n' +
    `Content-Type: ${contentType}\r\n` +
    `Content-Length: ${body.length}\r\n\r\n`;
  return Buffer.concat([Buffer.from(head, 'latin1'), body]);
}

function transcribeRequest(audio: Buffer, fields: Record<string, string> = {}): Buffer {
  const { body, contentType } = buildMultipart({ fields, file: { filename: 'clip.wav', contentType: 'audio/wav', data: audio } });
  return post('/api/transcribe', contentType, body);
}

async function send(port: number, payload: Buffer | string) {
  const response = parseResponseText(await rawRequest(port, payload));
  const isJson = response.headers['content-type'] === 'application/json';
  return { ...response, json: isJson ? JSON.parse(response.body) : null };
}

test('health on a fresh server reports running with nothing served', async () => {
  const { api, port } = await startApi();
  try {
    const response = await send(port, 'GET /health HTTP/1.1\r\nHost: localhost\r\n\r\n');
    assert.equal(response.status, 200);
    assert.equal(response.headers['content-type'], 'application/json');
    assert.equal(response.headers['access-control-allow-origin'], '*');
    assert.equal(response.json.status, 'healthy');
    assert.equal(response.json.service, 'Local Transcription API');
    assert.equal(response.json.api.isRunning, true);
    assert.equal(response.json.api.port, port);
    assert.equal(response.json.api.endpoint, `http://localhost:${port}`);
    assert.equal(response.json.api.requestsServed, 0);
    assert.equal(response.json.api.averageProcessingTimeMs, 0);
    assert.deepEqual(response.json.transcription, {
      currentModel: 'base',
      modelLoaded: true,
      availableModels: ['base'],
      enhancementEnabled: false,
      wordReplacementEnabled: false,
    });
    assert.ok(response.json.capabilities.includes('speech-to-text'));
    assert.ok(response.json.capabilities.includes('speaker-diarization'));
    assert.equal(typeof response.json.timestamp, 'number');
  } finally {
    await api.stop();
  }
});

test('word replacement switched on without a dictionary is reported as disabled', async () => {
  const { buildServer } = await import('../src/server');
  const { loadServerConfig } = await import('../src/config');
  const { CatalogueModelStore } = await import('../src/transcription/modelStore');
  const built = await buildServer({
    config: loadServerConfig({ port: 0, bindScope: 'loopback' }),
    store: new CatalogueModelStore([LOCAL_MODEL], async () => undefined),
    providers: lookupOf(engine),
    decoder: failingDecoder('unused'),
    enhancement: new FakeEnhancement((text) => text, false),
    enhancementEnabled: false,
    wordReplacementEnabled: true,
  });
  assert.equal((await built.state.snapshot()).wordReplacementEnabled, false);
});

test('a three-second WAV upload is transcribed', async () => {
  const { api, port, tempDir } = await startApi();
  try {
    const response = await send(port, transcribeRequest(makeToneWav(3)));
    assert.equal(response.status, 200);
    assert.equal(response.json.success, true);
    assert.equal(response.json.text, 'transcript of 3s');
    assert.equal(response.json.metadata.duration, 3);
    assert.equal(response.json.metadata.model, 'base');
    assert.equal(response.json.segments, undefined);

    await delay(20);
    const health = await send(port, 'GET /health HTTP/1.1\r\n\r\n');
    assert.equal(health.json.api.requestsServed, 1);
    assert.deepEqual(await fs.readdir(tempDir), []);
  } finally {
    await api.stop();
  }
});

test('an upload without the file field is rejected with MISSING_FILE', async () => {
  const { api, port } = await startApi();
  try {
    const { body, contentType } = buildMultipart({ fields: { enable_diarization: 'false' } });
    const response = await send(port, post('/api/transcribe', contentType, body));
    assert.equal(response.status, 400);
    assert.deepEqual(response.json, {
      success: false,
      error: { code: 'MISSING_FILE', message: "No audio file found: multipart field 'file' is required" },
    });
  } finally {
    await api.stop();
  }
});

test('a body over the cap is refused with 413 before it is read', async () => {
  const { api, port } = await startApi({ connection: { maxBodyBytes: 1024 } });
  try {
    const head =
      'POST /api/transcribe HTTP/1.1\r\n' +
      'Content-Type: multipart/form-data; boundary=abc\r\n' +
      'Content-Length: 600000\r\n\r\n';
    const response = await send(port, head);
    assert.equal(response.status, 413);
    assert.deepEqual(response.json, {
      success: false,
      error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body of 600000 bytes exceeds the 1024 byte limit' },
    });
  } finally {
    await api.stop();
  }
});

test('concurrent uploads complete independently', async () => {
  const { api, port, tempDir } = await startApi();
  try {
    const [short, long] = await Promise.all([
      send(port, transcribeRequest(makeToneWav(0.25))),
      send(port, transcribeRequest(makeToneWav(0.75))),
    ]);
    assert.equal(short.status, 200);
    assert.equal(long.status, 200);
    assert.equal(short.json.text, 'transcript of 0.25s');
    assert.equal(long.json.text, 'transcript of 0.75s');
    assert.equal(short.json.metadata.duration, 0.25);
    assert.equal(long.json.metadata.duration, 0.75);
    assert.deepEqual(await fs.readdir(tempDir), []);
  } finally {
    await api.stop();
  }
});

test('diarization fields are validated', async () => {
  const { api, port } = await startApi();
  try {
    const response = await send(port, transcribeRequest(makeToneWav(0.25), { diarization_mode: 'turbo' }));
    assert.equal(response.status, 400);
    assert.equal(response.json.error.code, 'INVALID_PARAMETER');
    assert.match(response.json.error.message, /^Invalid form fields: diarization_mode: /);

    const inverted = await send(
      port,
      transcribeRequest(makeToneWav(0.25), { min_speakers: '3', max_speakers: '2' }),
    );
    assert.equal(inverted.status, 400);
    assert.equal(
      inverted.json.error.message,
      'Invalid form fields: min_speakers: min_speakers must not exceed max_speakers',
    );
  } finally {
    await api.stop();
  }
});

test('a mono upload with diarization requested degrades to a plain transcript', async () => {
  const { api, port } = await startApi();
  try {
    const response = await send(port, transcribeRequest(makeToneWav(0.5), { enable_diarization: 'true' }));
    assert.equal(response.status, 200);
    assert.equal(response.json.text, 'transcript of 0.5s');
    assert.equal(response.json.metadata.diarizationEnabled, false);
    assert.equal(response.json.metadata.diarizationError.code, 'DIARIZATION_UNAVAILABLE');
  } finally {
    await api.stop();
  }
});

test('malformed uploads get specific 400 errors', async () => {
  const { api, port } = await startApi();
  try {
    const noBoundary = await send(port, post('/api/transcribe', 'application/json', Buffer.from('{}')));
    assert.equal(noBoundary.status, 400);
    assert.equal(noBoundary.json.error.code, 'MISSING_BOUNDARY');

    const empty = await send(port, transcribeRequest(Buffer.alloc(0)));
    assert.equal(empty.status, 400);
    assert.deepEqual(empty.json.error, { code: 'INVALID_PARAMETER', message: "Multipart field 'file' is empty" });

    const broken = await send(
      port,
      post('/api/transcribe', 'multipart/form-data; boundary=xyz', Buffer.from('no parts here', 'latin1')),
    );
    assert.equal(broken.status, 400);
    assert.deepEqual(broken.json.error, {
      code: 'MALFORMED_MULTIPART',
      message: 'Malformed multipart body: boundary not found in body',
    });
  } finally {
    await api.stop();
  }
});

test('preflight, unknown routes and metrics', async () => {
  const { api, port } = await startApi();
  try {
    const preflight = await send(port, 'OPTIONS /api/transcribe HTTP/1.1\r\n\r\n');
    assert.equal(preflight.status, 200);
    assert.equal(preflight.headers['access-control-allow-methods'], 'GET, POST, OPTIONS');
    assert.equal(preflight.headers['content-length'], '0');

    const missing = await send(port, 'GET /nope HTTP/1.1\r\n\r\n');
    assert.equal(missing.status, 404);
    assert.equal(missing.json.error.message, 'No route for GET /nope');

    await delay(20);
    const metrics = await send(port, 'GET /metrics HTTP/1.1\r\n\r\n');
    assert.equal(metrics.status, 200);
    assert.match(metrics.body, /transcription_api_http_request_duration_ms/);
  } finally {
    await api.stop();
  }
});
