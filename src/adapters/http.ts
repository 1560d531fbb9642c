import type { IncomingMessage } from 'node:http';
import type { RequestSnapshot, StoreSnapshot, StoredValue } from '../types';

export interface IncomingSnapshotOptions {
  /** Already-decoded request payload. */
  body?: StoreSnapshot;
  form?: StoreSnapshot;
  env?: Record<string, string | undefined>;
}

/** True for requests that arrived over a TLSSocket. */
function isEncrypted(req: IncomingMessage): boolean {
  const socket = req.socket;
  return 'encrypted' in socket && socket.encrypted === true;
}

function queryFromUrl(url: string): StoreSnapshot {
  const params = new URL(url, 'http://localhost').searchParams;
  return Object.fromEntries(
    [...new Set(params.keys())].map((name): [string, StoredValue] => {
      const values = params.getAll(name);
      return [name, values.length === 1 ? values[0] : values];
    }),
  );
}

/**
 * Builds the request snapshot for a Node `IncomingMessage`: query string, headers,
 * and the server variables the stores consult (`HTTPS`, `SERVER_PORT`, ...).
 */
export function snapshotFromIncomingMessage(
  req: IncomingMessage,
  options: IncomingSnapshotOptions = {},
): RequestSnapshot {
  const method = (req.method || 'GET').toUpperCase();
  const url = req.url || '/';
  const encrypted = isEncrypted(req);

  const server: Record<string, StoredValue> = {
    REQUEST_METHOD: method,
    REQUEST_URI: url,
    SERVER_PROTOCOL: `HTTP/${req.httpVersion}`,
    HTTPS: encrypted ? 'on' : 'off',
  };
  if (req.headers.host) server.HTTP_HOST = req.headers.host;
  if (req.socket.localPort !== undefined) server.SERVER_PORT = req.socket.localPort;
  if (req.socket.remoteAddress !== undefined) server.REMOTE_ADDR = req.socket.remoteAddress;

  return {
    method,
    query: queryFromUrl(url),
    form: options.form ?? {},
    body: options.body ?? {},
    server,
    env: options.env ?? process.env,
    headers: { ...req.headers },
  };
}
