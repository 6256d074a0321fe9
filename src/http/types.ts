/** Case-insensitive, read-only view over request headers. Repeated headers are joined with ", ". */
export class HeaderMap {
  private readonly values = new Map<string, string>();

  constructor(entries: Iterable<[string, string]> = []) {
    for (const [name, value] of entries) {
      this.append(name, value);
    }
  }

  private append(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.values.get(key);
    this.values.set(key, existing === undefined ? value : `${existing}, ${value}`);
  }

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  entries(): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

export interface RequestHead {
  method: string;
  target: string;
  path: string;
  query: string;
  version: string;
  headers: HeaderMap;
  contentLength: number | null;
  boundary: string | null;
  expectContinue: boolean;
  chunked: boolean;
}

export interface ParsedRequest {
  method: string;
  path: string;
  query: string;
  headers: HeaderMap;
  body: Buffer;
}

export interface HttpResponse {
  status: number;
  contentType?: string;
  headers?: Record<string, string>;
  body: Buffer | string;
}

export type ConnectionProfile = 'standard' | 'large_upload';

export interface RequestContext {
  connectionId: string;
  profile: ConnectionProfile;
  /** Aborted when the client goes away or the processing ceiling is hit. */
  signal: AbortSignal;
}

export type RequestHandler = (request: ParsedRequest, context: RequestContext) => Promise<HttpResponse>;

/**
 * The subset of `net.Socket` a connection needs. Kept narrow so the state
 * machine can be driven by an in-process fake.
 */
export interface ConnectionSocket {
  readonly destroyed: boolean;
  readonly remoteAddress?: string;
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'end', listener: () => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  write(chunk: Buffer, callback?: (error?: Error | null) => void): boolean;
  end(chunk: Buffer, callback?: () => void): this;
  pause(): this;
  resume(): this;
  setKeepAlive(enable?: boolean, initialDelay?: number): this;
  destroy(error?: Error): this;
}
