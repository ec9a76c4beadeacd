/**
 * Templates API
 *
 * GET /api/templates - List section prompt templates
 * GET /api/templates/:name - Get one template with its prompt text
 * POST /api/templates/:name - Fill a template with { arguments } and return the prompt
 */

import { IncomingMessage, ServerResponse } from 'http';
import { SnapshotError } from '../services/errors';
import {
  MissingTemplateKeyError,
  SectionTemplate,
  fillTemplate,
  findTemplateByName,
  listSectionTemplates,
} from '../services/templates';
import {
  decodePathSegment,
  isRecord,
  readJsonObject,
  sendError,
  sendJson,
  sendMethodNotAllowed,
  sendNotFound,
} from './http';

function toDescriptor(template: SectionTemplate) {
  return {
    name: template.name,
    description: template.description,
    arguments: template.arguments,
  };
}

function readArguments(body: Record<string, unknown>): Record<string, string> {
  const args = body.arguments ?? {};
  if (!isRecord(args)) {
    throw new SnapshotError('INVALID_INPUT', 'arguments must be an object', { field: 'arguments' });
  }

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value !== 'string') {
      throw new SnapshotError('INVALID_INPUT', `Argument ${key} must be a string`, { field: key });
    }
    result[key] = value;
  }
  return result;
}

async function handleFill(req: IncomingMessage, res: ServerResponse, template: SectionTemplate): Promise<void> {
  try {
    const args = readArguments(await readJsonObject(req));

    let prompt: string;
    try {
      prompt = fillTemplate(template.template, args);
    } catch (err) {
      if (err instanceof MissingTemplateKeyError) {
        throw new SnapshotError('INVALID_INPUT', `Missing required argument: ${err.key}`, {
          template: template.name,
          argument: err.key,
        });
      }
      throw err;
    }

    sendJson(res, 200, {
      success: true,
      data: { name: template.name, description: template.description, prompt },
    });
  } catch (err) {
    sendError(res, err, 'Error filling template');
  }
}

export async function handleTemplates(req: IncomingMessage, res: ServerResponse, pathname: string): Promise<void> {
  if (pathname === '/api/templates' || pathname === '/api/templates/') {
    if (req.method !== 'GET') return sendMethodNotAllowed(res);
    sendJson(res, 200, { success: true, data: listSectionTemplates().map(toDescriptor) });
    return;
  }

  const match = pathname.match(/^\/api\/templates\/([^/]+)$/);
  if (!match) return sendNotFound(res);

  const name = decodePathSegment(match[1]);
  if (name === null) return sendNotFound(res);
  const template = findTemplateByName(name);
  if (!template) return sendNotFound(res, `Template not found: ${name}`);

  if (req.method === 'GET') {
    sendJson(res, 200, { success: true, data: { ...toDescriptor(template), template: template.template } });
    return;
  }
  if (req.method === 'POST') return handleFill(req, res, template);

  sendMethodNotAllowed(res);
}
