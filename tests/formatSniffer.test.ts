import assert from 'node:assert/strict';
import { test } from 'node:test';
import { classify, FORMAT_INFO, formatFromContentType } from '../src/audio/formatSniffer';

function padded(prefix: Buffer | string, length = 12): Buffer {
  const head = typeof prefix === 'string' ? Buffer.from(prefix, 'latin1') : prefix;
  return Buffer.concat([head, Buffer.alloc(Math.max(0, length - head.length))]);
}

test('classify recognises each supported container by its magic bytes', () => {
  assert.equal(classify(padded('ID3')), 'mp3');
  assert.equal(classify(padded(Buffer.from([0xff, 0xfb, 0x90, 0x64]))), 'mp3');
  assert.equal(classify(padded('RIFF\x24\x00\x00\x00WAVE')), 'wav');
  assert.equal(classify(padded('\x00\x00\x00\x20ftypM4A ')), 'm4a');
  assert.equal(classify(padded('fLaC')), 'flac');
  assert.equal(classify(padded('OggS')), 'ogg');
  assert.equal(classify(padded(Buffer.from([0x1a, 0x45, 0xdf, 0xa3]))), 'webm');
});

test('classify gives the same answer for the same bytes and leaves them untouched', () => {
  const samples = [
    padded('ID3'),
    padded('RIFF\x24\x00\x00\x00WAVE'),
    padded('\x00\x00\x00\x20ftypM4A '),
    padded(Buffer.from([0x1a, 0x45, 0xdf, 0xa3])),
    Buffer.from('hello world!', 'latin1'),
  ];
  for (const bytes of samples) {
    const before = Buffer.from(bytes);
    const first = classify(bytes);
    assert.equal(classify(bytes), first);
    assert.equal(classify(Buffer.from(bytes)), first);
    assert.deepEqual(bytes, before);
  }
});

test('classify needs at least twelve bytes', () => {
  assert.equal(classify(Buffer.from('RIFF', 'latin1')), 'unknown');
  assert.equal(classify(Buffer.alloc(0)), 'unknown');
});

test('classify falls back to unknown for unrecognised bytes', () => {
  assert.equal(classify(Buffer.from('hello world!', 'latin1')), 'unknown');
  assert.equal(classify(padded('RIFF\x24\x00\x00\x00AVI ')), 'unknown');
  assert.deepEqual(FORMAT_INFO.unknown, { extension: 'bin', contentType: 'application/octet-stream' });
});

test('formatFromContentType maps declared media types', () => {
  assert.equal(formatFromContentType('audio/x-wav; charset=binary'), 'wav');
  assert.equal(formatFromContentType('Audio/MPEG'), 'mp3');
  assert.equal(formatFromContentType('text/plain'), null);
  assert.equal(formatFromContentType(undefined), null);
});
