/**
 * Shared request/response helpers for the API handlers
 */

import { IncomingMessage, ServerResponse } from 'http';
import { SnapshotOrchestrator } from '../generation';
import { ErrorCode, SnapshotError, errorMessage, httpStatusFor, isSnapshotError } from '../services/errors';
import { SnapshotStore } from '../services/snapshot-store';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ErrorCode;
  details?: Record<string, unknown>;
}

export interface ApiContext {
  store: SnapshotStore;
  getOrchestrator(): SnapshotOrchestrator;
}

export function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    req.on('end', () => {
      // Decoded once so multi-byte characters split across chunks survive
      const body = Buffer.concat(chunks).toString('utf8');
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new SnapshotError('INVALID_INPUT', 'Invalid JSON'));
      }
    });
    req.on('error', reject);
  });
}

export function sendJson(res: ServerResponse, status: number, data: ApiResponse): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

export function sendMethodNotAllowed(res: ServerResponse): void {
  sendJson(res, 405, { success: false, error: 'Method not allowed' });
}

export function sendNotFound(res: ServerResponse, message = 'Not found'): void {
  sendJson(res, 404, { success: false, error: message, code: 'RESOURCE_NOT_FOUND' });
}

/**
 * Maps a thrown value to a JSON error response. Pipeline errors keep their
 * code and details; anything else is a 500.
 */
export function sendError(res: ServerResponse, err: unknown, context: string): void {
  if (isSnapshotError(err)) {
    const status = httpStatusFor(err.code);
    if (status >= 500) {
      console.error(`[API] ${context}:`, err.message);
    }
    sendJson(res, status, { success: false, error: err.message, code: err.code, details: err.details });
    return;
  }

  console.error(`[API] ${context}:`, err);
  sendJson(res, 500, { success: false, error: errorMessage(err) });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads the JSON body, rejecting anything that is not an object. */
export async function readJsonObject(req: IncomingMessage): Promise<Record<string, unknown>> {
  const body = await parseBody(req);
  if (!isRecord(body)) {
    throw new SnapshotError('INVALID_INPUT', 'Request body must be a JSON object');
  }
  return body;
}

export function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new SnapshotError('INVALID_INPUT', `${key} must be a string`, { field: key });
  }
  return value;
}

export function requiredString(body: Record<string, unknown>, key: string): string {
  const value = optionalString(body, key);
  if (value === undefined || value.trim() === '') {
    throw new SnapshotError('INVALID_INPUT', `${key} is required`, { field: key });
  }
  return value;
}

/** Decodes a matched path segment; null when its percent escapes are malformed. */
export function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

export function getQueryParam(req: IncomingMessage, name: string): string | null {
  const url = new URL(req.url ?? '/', 'http://localhost');
  return url.searchParams.get(name);
}
