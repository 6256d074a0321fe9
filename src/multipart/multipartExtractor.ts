import { MalformedMultipartError, MissingFileError } from '../errors';

const CRLF = Buffer.from('\r\n', 'latin1');
const HEADER_END = Buffer.from('\r\n\r\n', 'latin1');
const DASH_DASH = Buffer.from('--', 'latin1');

export const FILE_FIELD = 'file';

export interface MultipartPart {
  headers: Record<string, string>;
  name: string | null;
  filename: string | null;
  contentType: string | null;
  /** View into the request body; not copied. */
  data: Buffer;
}

export interface UploadedFile {
  bytes: Buffer;
  filename: string | null;
  contentType: string | null;
}

export type ExtractResult =
  | { ok: true; file: UploadedFile; fields: Record<string, string> }
  | { ok: false; reason: 'missing_file' | 'malformed'; detail: string };

class MultipartSyntaxError extends Error {}

function parseDisposition(value: string): { name: string | null; filename: string | null } {
  let name: string | null = null;
  let filename: string | null = null;
  const pattern = /;\s*([a-zA-Z*]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^;\s]+))/g;
  for (const match of value.matchAll(pattern)) {
    const key = match[1].toLowerCase();
    const raw = match[2] !== undefined ? match[2].replace(/\\(.)/g, '$1') : match[3];
    if (key === 'name') name = raw;
    if (key === 'filename') filename = raw;
  }
  return { name, filename };
}

function parsePartHeaders(block: Buffer): Record<string, string> {
  const headers: Record<string, string> = {};
  const text = block.toString('utf8');
  if (text.length === 0) return headers;
  for (const line of text.split('\r\n')) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new MultipartSyntaxError(`invalid part header line '${line.slice(0, 80)}'`);
    }
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }
  return headers;
}

/**
 * Splits a multipart/form-data body into parts. Payloads stay raw bytes:
 * only the part headers are decoded as text.
 */
export function parseParts(body: Buffer, boundary: string): MultipartPart[] {
  const delimiter = Buffer.from(`--${boundary}`, 'latin1');
  // Every delimiter after the first is preceded by CRLF, which belongs to it.
  const innerDelimiter = Buffer.concat([CRLF, delimiter]);

  let cursor = body.indexOf(delimiter);
  if (cursor === -1) {
    throw new MultipartSyntaxError('boundary not found in body');
  }
  cursor += delimiter.length;

  const parts: MultipartPart[] = [];
  for (;;) {
    if (body.subarray(cursor, cursor + 2).equals(DASH_DASH)) {
      return parts;
    }
    if (!body.subarray(cursor, cursor + 2).equals(CRLF)) {
      throw new MultipartSyntaxError('expected CRLF after boundary');
    }
    cursor += CRLF.length;

    let payloadStart: number;
    let headers: Record<string, string>;
    if (body.subarray(cursor, cursor + 2).equals(CRLF)) {
      // part without headers
      headers = {};
      payloadStart = cursor + CRLF.length;
    } else {
      const headerEnd = body.indexOf(HEADER_END, cursor);
      if (headerEnd === -1) {
        throw new MultipartSyntaxError('unterminated part headers');
      }
      headers = parsePartHeaders(body.subarray(cursor, headerEnd));
      payloadStart = headerEnd + HEADER_END.length;
    }

    const next = body.indexOf(innerDelimiter, payloadStart);
    if (next === -1) {
      throw new MultipartSyntaxError('missing closing boundary');
    }

    const disposition = headers['content-disposition'];
    const { name, filename } = disposition ? parseDisposition(disposition) : { name: null, filename: null };
    parts.push({
      headers,
      name,
      filename,
      contentType: headers['content-type'] ?? null,
      data: body.subarray(payloadStart, next),
    });

    cursor = next + innerDelimiter.length;
  }
}

/**
 * Locates the `file` part and the scalar fields. A structurally broken body
 * and a well-formed body without a file are reported as different reasons.
 */
export function extract(body: Buffer, boundary: string): ExtractResult {
  let parts: MultipartPart[];
  try {
    parts = parseParts(body, boundary);
  } catch (error) {
    if (error instanceof MultipartSyntaxError) {
      return { ok: false, reason: 'malformed', detail: error.message };
    }
    throw error;
  }

  let file: UploadedFile | null = null;
  const fields: Record<string, string> = {};
  for (const part of parts) {
    if (part.name === null) continue;
    if (part.name === FILE_FIELD) {
      file ??= { bytes: part.data, filename: part.filename, contentType: part.contentType };
      continue;
    }
    if (part.filename === null) {
      fields[part.name] = part.data.toString('utf8').trim();
    }
  }

  if (!file) {
    return { ok: false, reason: 'missing_file', detail: `no '${FILE_FIELD}' part among ${parts.length} part(s)` };
  }
  return { ok: true, file, fields };
}

/** `extract` with the failure reasons raised as API errors. */
export function extractOrThrow(body: Buffer, boundary: string): { file: UploadedFile; fields: Record<string, string> } {
  const result = extract(body, boundary);
  if (result.ok) {
    return { file: result.file, fields: result.fields };
  }
  if (result.reason === 'missing_file') {
    throw new MissingFileError();
  }
  throw new MalformedMultipartError(result.detail);
}
