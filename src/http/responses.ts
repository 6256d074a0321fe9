import { ApiError } from '../errors';
import { HttpResponse } from './types';

const STATUS_TEXT: Record<number, string> = {
  100: 'Continue',
  102: 'Processing',
  200: 'OK',
  204: 'No Content',
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  413: 'Payload Too Large',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
  'Access-Control-Max-Age': '86400',
};

export function statusText(status: number): string {
  return STATUS_TEXT[status] ?? 'Unknown';
}

export function jsonResponse(status: number, payload: unknown): HttpResponse {
  return {
    status,
    contentType: 'application/json',
    body: JSON.stringify(payload),
  };
}

export function errorResponse(error: ApiError): HttpResponse {
  return jsonResponse(error.status, error.toBody());
}

export function optionsResponse(): HttpResponse {
  return { status: 200, contentType: 'text/plain', body: Buffer.alloc(0) };
}

/** Interim 1xx response; carries no body and leaves the connection in place. */
export function serializeInterim(status: 100 | 102): Buffer {
  return Buffer.from(`HTTP/1.1 ${status} ${statusText(status)}\r\n\r\n`, 'latin1');
}

/**
 * Serializes a final response. Content-Length is always computed from the
 * body bytes actually written, and every response closes the connection.
 */
export function serializeResponse(response: HttpResponse): Buffer {
  const body = typeof response.body === 'string' ? Buffer.from(response.body, 'utf8') : response.body;
  const headers: Record<string, string> = {
    'Content-Type': response.contentType ?? 'application/octet-stream',
    ...CORS_HEADERS,
    ...(response.headers ?? {}),
    'Content-Length': String(body.length),
    Connection: 'close',
  };

  let head = `HTTP/1.1 ${response.status} ${statusText(response.status)}\r\n`;
  for (const [name, value] of Object.entries(headers)) {
    head += `${name}: ${value}\r\n`;
  }
  head += '\r\n';

  return Buffer.concat([Buffer.from(head, 'latin1'), body]);
}
