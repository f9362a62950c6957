import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { SyncHandler } from './handler';

async function toRequest(req: IncomingMessage): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? 'GET';
  const url = `http://${req.headers.host ?? 'localhost'}${req.url ?? '/'}`;
  if (method === 'GET' || method === 'HEAD') {
    return new Request(url, { method, headers });
  }

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Request(url, { method, headers, body: Buffer.concat(chunks) });
}

async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  res.end(Buffer.from(await response.arrayBuffer()));
}

/**
 * Serve a fetch-style handler over node:http. Resolves once the server is listening.
 */
export async function startSyncServer(handler: SyncHandler, port: number): Promise<Server> {
  const server = createServer((req, res) => {
    toRequest(req)
      .then(handler)
      .then(response => writeResponse(response, res))
      .catch(error => {
        console.error('[SyncServer] Unhandled request error:', error);
        if (!res.headersSent) res.statusCode = 500;
        res.end();
      });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });

  return server;
}
