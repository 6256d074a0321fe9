import assert from 'node:assert/strict';
import { test } from 'node:test';
import { extract, extractOrThrow, parseParts } from '../src/multipart/multipartExtractor';
import { buildMultipart, TEST_BOUNDARY } from './helpers/multipart';

test('extract returns the file bytes untouched alongside trimmed fields', () => {
  // Payload deliberately contains CRLF, dashes and a partial boundary.
  const payload = Buffer.concat([
    Buffer.from([0x00, 0xff, 0x0d, 0x0a, 0x2d, 0x2d]),
    Buffer.from(`\r\n--${TEST_BOUNDARY.slice(0, 10)}`, 'latin1'),
    Buffer.from([0x80, 0x81, 0x0d, 0x0a]),
  ]);
  const { body } = buildMultipart({
    fields: { enable_diarization: ' true ', diarization_mode: 'fast' },
    file: { filename: 'meeting.m4a', contentType: 'audio/mp4', data: payload },
  });

  const result = extract(body, TEST_BOUNDARY);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.ok(result.file.bytes.equals(payload));
  assert.equal(result.file.filename, 'meeting.m4a');
  assert.equal(result.file.contentType, 'audio/mp4');
  assert.deepEqual(result.fields, { enable_diarization: 'true', diarization_mode: 'fast' });
});

test('extract keeps the first file part when several are sent', () => {
  const first = buildMultipart({ file: { data: Buffer.from('first') } }).body;
  const boundary = TEST_BOUNDARY;
  const second = Buffer.from(
    `--${boundary}\r\nContent-Disposition: form-data; name="file"; filename="b.wav"\r\n\r\nsecond\r\n--${boundary}--\r\n`,
    'latin1',
  );
  // Drop the closing delimiter of the first body and append another part.
  const closing = Buffer.from(`--${boundary}--\r\n`, 'latin1');
  const body = Buffer.concat([first.subarray(0, first.length - closing.length), second]);

  const parts = parseParts(body, boundary);
  assert.equal(parts.length, 2);
  const result = extract(body, boundary);
  assert.ok(result.ok);
  if (!result.ok) return;
  assert.equal(result.file.bytes.toString('latin1'), 'first');
});

test('extract reports a well-formed body without a file part as missing_file', () => {
  const { body } = buildMultipart({ fields: { model: 'base' } });
  assert.deepEqual(extract(body, TEST_BOUNDARY), {
    ok: false,
    reason: 'missing_file',
    detail: "no 'file' part among 1 part(s)",
  });
});

test('extract reports structural problems as malformed', () => {
  assert.deepEqual(extract(Buffer.from('no delimiters here', 'latin1'), TEST_BOUNDARY), {
    ok: false,
    reason: 'malformed',
    detail: 'boundary not found in body',
  });

  const unterminated = Buffer.from(
    `--${TEST_BOUNDARY}\r\nContent-Disposition: form-data; name="file"\r\n\r\nabc`,
    'latin1',
  );
  assert.deepEqual(extract(unterminated, TEST_BOUNDARY), {
    ok: false,
    reason: 'malformed',
    detail: 'missing closing boundary',
  });

  const badHeader = Buffer.from(`--${TEST_BOUNDARY}\r\nnot a header\r\n\r\nabc\r\n--${TEST_BOUNDARY}--`, 'latin1');
  assert.deepEqual(extract(badHeader, TEST_BOUNDARY), {
    ok: false,
    reason: 'malformed',
    detail: "invalid part header line 'not a header'",
  });
});

test('extractOrThrow raises the matching API errors', () => {
  const { body } = buildMultipart({ fields: { model: 'base' } });
  assert.throws(() => extractOrThrow(body, TEST_BOUNDARY), {
    name: 'MissingFileError',
    code: 'MISSING_FILE',
    status: 400,
    message: "No audio file found: multipart field 'file' is required",
  });
  assert.throws(() => extractOrThrow(Buffer.from('junk', 'latin1'), TEST_BOUNDARY), {
    name: 'MalformedMultipartError',
    code: 'MALFORMED_MULTIPART',
    message: 'Malformed multipart body: boundary not found in body',
  });
});
