/**
 * Snapshots API
 *
 * POST /api/snapshots - Generate a snapshot from WebVTT content
 * GET /api/snapshots - List the caller's snapshots
 * GET /api/snapshots/:id - Get one snapshot (?format=markdown for Markdown)
 * GET /api/snapshots/:id/sections/:slug - Get one section of a snapshot
 */

import { IncomingMessage, ServerResponse } from 'http';
import { requireUserId } from '../middleware/auth';
import { sectionSlug } from '../generation';
import { SnapshotError } from '../services/errors';
import { formatSnapshotMarkdown } from '../services/markdown';
import { snapshotIdFor } from '../services/snapshot-store';
import { OutputFormat } from '../types';
import {
  ApiContext,
  decodePathSegment,
  optionalString,
  readJsonObject,
  requiredString,
  getQueryParam,
  sendError,
  sendJson,
  sendMethodNotAllowed,
  sendNotFound,
} from './http';

function parseOutputFormat(value: string | undefined | null): OutputFormat {
  if (value === undefined || value === null || value === 'json') return 'json';
  if (value === 'markdown') return 'markdown';
  throw new SnapshotError('INVALID_INPUT', `output_format must be "json" or "markdown", got "${value}"`, {
    field: 'output_format',
  });
}

async function handleCreate(req: IncomingMessage, res: ServerResponse, ctx: ApiContext): Promise<void> {
  try {
    const userId = requireUserId(req);
    const body = await readJsonObject(req);
    const vttContent = requiredString(body, 'vtt_content');
    const filename = optionalString(body, 'filename') || 'transcript.vtt';
    const format = parseOutputFormat(optionalString(body, 'output_format'));

    console.log(`[Snapshots] Generating from ${filename} (${vttContent.length} chars, ${format})`);

    const snapshot = await ctx.getOrchestrator().generate(vttContent, filename);
    const stored = ctx.store.save(userId, snapshotIdFor(filename), snapshot);

    console.log(
      `[Snapshots] Stored ${stored.id}: ${snapshot.metadata.total_sections} sections, avg confidence ${snapshot.metadata.avg_confidence.toFixed(2)}`
    );

    sendJson(res, 201, {
      success: true,
      data:
        format === 'markdown'
          ? { id: stored.id, markdown: formatSnapshotMarkdown(snapshot) }
          : { id: stored.id, snapshot },
    });
  } catch (err) {
    sendError(res, err, 'Error generating snapshot');
  }
}

function handleList(req: IncomingMessage, res: ServerResponse, ctx: ApiContext): void {
  const userId = requireUserId(req);
  const snapshots = ctx.store.list(userId).map((stored) => ({
    id: stored.id,
    created_at: stored.created_at,
    total_sections: stored.snapshot.metadata.total_sections,
    avg_confidence: stored.snapshot.metadata.avg_confidence,
  }));

  sendJson(res, 200, { success: true, data: snapshots });
}

function handleGet(req: IncomingMessage, res: ServerResponse, ctx: ApiContext, id: string): void {
  try {
    const userId = requireUserId(req);
    const format = parseOutputFormat(getQueryParam(req, 'format'));
    const stored = ctx.store.get(userId, id);

    if (!stored) {
      sendNotFound(res, `Snapshot not found: ${id}`);
      return;
    }

    sendJson(res, 200, {
      success: true,
      data:
        format === 'markdown'
          ? { id: stored.id, markdown: formatSnapshotMarkdown(stored.snapshot) }
          : { id: stored.id, created_at: stored.created_at, snapshot: stored.snapshot },
    });
  } catch (err) {
    sendError(res, err, 'Error fetching snapshot');
  }
}

function handleGetSection(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: ApiContext,
  id: string,
  slug: string
): void {
  const userId = requireUserId(req);
  const stored = ctx.store.get(userId, id);

  if (!stored) {
    sendNotFound(res, `Snapshot not found: ${id}`);
    return;
  }

  const entry = Object.entries(stored.snapshot.sections).find(([name]) => sectionSlug(name) === slug);
  if (!entry) {
    sendNotFound(res, `Section not found: ${slug}`);
    return;
  }

  const [sectionName, section] = entry;
  sendJson(res, 200, { success: true, data: { snapshot_id: id, section_name: sectionName, ...section } });
}

export async function handleSnapshots(
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string,
  ctx: ApiContext
): Promise<void> {
  const sectionMatch = pathname.match(/^\/api\/snapshots\/([^/]+)\/sections\/([^/]+)$/);
  const idMatch = pathname.match(/^\/api\/snapshots\/([^/]+)$/);
  const isCollection = pathname === '/api/snapshots' || pathname === '/api/snapshots/';

  if (isCollection) {
    if (req.method === 'POST') return handleCreate(req, res, ctx);
    if (req.method === 'GET') return handleList(req, res, ctx);
    return sendMethodNotAllowed(res);
  }

  if (sectionMatch) {
    if (req.method !== 'GET') return sendMethodNotAllowed(res);
    const id = decodePathSegment(sectionMatch[1]);
    const slug = decodePathSegment(sectionMatch[2]);
    if (id === null || slug === null) return sendNotFound(res);
    return handleGetSection(req, res, ctx, id, slug);
  }

  if (idMatch) {
    if (req.method !== 'GET') return sendMethodNotAllowed(res);
    const id = decodePathSegment(idMatch[1]);
    if (id === null) return sendNotFound(res);
    return handleGet(req, res, ctx, id);
  }

  sendNotFound(res);
}
