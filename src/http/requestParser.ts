import { ProtocolError } from '../errors';
import { HeaderMap, RequestHead } from './types';

export const HEADER_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');

const METHOD_REGEX = /^[A-Z]{3,12}$/;
const VERSION_REGEX = /^HTTP\/1\.[01]$/;
const HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const CONTENT_LENGTH_REGEX = /^\d{1,15}$/;

/**
 * Finds the header terminator in an accumulating buffer. `scannedTo` is how far
 * a previous call already looked; the search backs up three bytes so a CRLFCRLF
 * split across two reads is still found.
 */
export function findHeaderTerminator(buffer: Buffer, scannedTo = 0): number {
  const from = Math.max(0, scannedTo - (HEADER_TERMINATOR.length - 1));
  return buffer.indexOf(HEADER_TERMINATOR, from);
}

function splitTarget(target: string): { path: string; query: string } {
  if (target === '*') {
    return { path: '*', query: '' };
  }

  let pathAndQuery = target;
  if (!target.startsWith('/')) {
    // absolute-form, e.g. from a forward proxy
    let url: URL;
    try {
      url = new URL(target);
    } catch {
      throw new ProtocolError(`invalid request target: ${target}`);
    }
    pathAndQuery = `${url.pathname}${url.search}`;
  }

  const queryIndex = pathAndQuery.indexOf('?');
  if (queryIndex === -1) {
    return { path: pathAndQuery, query: '' };
  }
  return { path: pathAndQuery.slice(0, queryIndex), query: pathAndQuery.slice(queryIndex + 1) };
}

function parseContentLength(headers: HeaderMap): number | null {
  const raw = headers.get('content-length');
  if (raw === undefined) {
    return null;
  }
  // Repeated identical values are tolerated, conflicting ones are not.
  const values = new Set(raw.split(',').map((value) => value.trim()));
  if (values.size !== 1) {
    throw new ProtocolError('conflicting Content-Length headers');
  }
  const [value] = values;
  if (value === undefined || !CONTENT_LENGTH_REGEX.test(value)) {
    throw new ProtocolError(`invalid Content-Length: ${raw}`);
  }
  return Number.parseInt(value, 10);
}

export function parseBoundary(contentType: string | undefined): string | null {
  if (!contentType) {
    return null;
  }
  const [mediaType, ...params] = contentType.split(';');
  if (!mediaType || mediaType.trim().toLowerCase() !== 'multipart/form-data') {
    return null;
  }
  for (const param of params) {
    const eq = param.indexOf('=');
    if (eq === -1) continue;
    const name = param.slice(0, eq).trim().toLowerCase();
    if (name !== 'boundary') continue;
    let value = param.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    return value.length > 0 && value.length <= 200 ? value : null;
  }
  return null;
}

/** Parses the request line and header fields. The block excludes the terminating CRLFCRLF. */
export function parseRequestHead(block: Buffer): RequestHead {
  const text = block.toString('latin1');
  const lines = text.split('\r\n');
  const requestLine = lines[0] ?? '';
  const parts = requestLine.split(' ');

  if (parts.length !== 3) {
    throw new ProtocolError('malformed request line');
  }
  const [method, target, version] = parts;
  if (!METHOD_REGEX.test(method)) {
    throw new ProtocolError(`invalid method: ${method}`);
  }
  if (!VERSION_REGEX.test(version)) {
    throw new ProtocolError(`unsupported protocol version: ${version}`);
  }
  if (target.length === 0 || (target === '*' && method !== 'OPTIONS')) {
    throw new ProtocolError('invalid request target');
  }

  const fields: Array<[string, string]> = [];
  for (const line of lines.slice(1)) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new ProtocolError('malformed header line');
    }
    const name = line.slice(0, colon);
    if (!HEADER_NAME_REGEX.test(name)) {
      throw new ProtocolError(`invalid header name: ${name}`);
    }
    fields.push([name, line.slice(colon + 1).trim()]);
  }

  const headers = new HeaderMap(fields);
  const { path, query } = splitTarget(target);
  const transferEncoding = headers.get('transfer-encoding')?.toLowerCase() ?? '';

  return {
    method,
    target,
    path,
    query,
    version,
    headers,
    contentLength: parseContentLength(headers),
    boundary: parseBoundary(headers.get('content-type')),
    expectContinue: headers.get('expect')?.toLowerCase() === '100-continue',
    chunked: transferEncoding.includes('chunked'),
  };
}
