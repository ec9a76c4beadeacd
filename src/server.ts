/**
 * HTTP server: CORS, auth and routing in front of the API handlers
 */

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { ApiContext, handleFields, handleSnapshots, handleTemplates, handleTranscripts } from './api';
import { isPublicPath, sendUnauthorized, setRequestUserId, validateAuth } from './middleware/auth';

export interface ServerOptions extends ApiContext {
  serviceName: string;
  corsOrigins: string[];
}

function setCorsHeaders(req: IncomingMessage, res: ServerResponse, allowedOrigins: string[]): void {
  const origin = req.headers.origin;

  if (origin && allowedOrigins.includes(origin)) {
    res.setHeader('Access-Control-Allow-Origin', origin);
  }

  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  res.setHeader('Access-Control-Max-Age', '86400');
}

function getPathname(req: IncomingMessage): string {
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  return url.pathname;
}

function sendNotFound(res: ServerResponse): void {
  res.writeHead(404, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ success: false, error: 'Not found' }));
}

export function createRequestHandler(options: ServerOptions) {
  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    setCorsHeaders(req, res, options.corsOrigins);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = getPathname(req);

    // Health check (no auth required)
    if (pathname === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok' }));
      return;
    }

    if (pathname === '/') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ service: options.serviceName, status: 'running' }));
      return;
    }

    if (!isPublicPath(pathname)) {
      const auth = await validateAuth(req);
      if (!auth.authorized || !auth.userId) {
        sendUnauthorized(res, auth.error || 'Unauthorized');
        return;
      }
      setRequestUserId(req, auth.userId);
    }

    if (pathname.startsWith('/api/snapshots')) {
      return handleSnapshots(req, res, pathname, options);
    }

    if (pathname === '/api/transcripts/parse') {
      return handleTranscripts(req, res);
    }

    if (pathname.startsWith('/api/templates')) {
      return handleTemplates(req, res, pathname);
    }

    if (pathname.startsWith('/api/fields')) {
      return handleFields(req, res, pathname);
    }

    sendNotFound(res);
  };
}

export function createSnapshotServer(options: ServerOptions): Server {
  const handleRequest = createRequestHandler(options);

  return createServer((req, res) => {
    handleRequest(req, res).catch((err) => {
      console.error('Unhandled error:', err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ success: false, error: 'Internal server error' }));
    });
  });
}
