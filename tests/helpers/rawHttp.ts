import net from 'node:net';

export interface RawRequestOptions {
  /** Half-close the socket once the payload is written. */
  endAfterWrite?: boolean;
  /** Written after the first response bytes arrive (e.g. after 100 Continue). */
  afterFirstData?: Buffer | string;
}

/** Writes raw bytes to a loopback port and collects everything until the server closes. */
export function rawRequest(port: number, payload: Buffer | string, options: RawRequestOptions = {}): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, '127.0.0.1');
    const chunks: Buffer[] = [];
    let failure: Error | null = null;
    let followUp = options.afterFirstData;

    socket.on('connect', () => {
      socket.write(payload);
      if (options.endAfterWrite && followUp === undefined) socket.end();
    });
    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      if (followUp !== undefined) {
        socket.write(followUp);
        followUp = undefined;
        if (options.endAfterWrite) socket.end();
      }
    });
    socket.on('error', (error) => {
      failure = error;
    });
    socket.on('close', () => {
      const text = Buffer.concat(chunks).toString('latin1');
      if (text.length === 0 && failure) {
        reject(failure);
        return;
      }
      resolve(text);
    });
  });
}

/** Opens a connection and resolves once it is established; the caller owns the socket. */
export function openSocket(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, '127.0.0.1');
    socket.once('connect', () => resolve(socket));
    socket.once('error', reject);
  });
}
