/**
 * Fields API
 *
 * GET /api/fields - List field definitions (?section=Name for that section's fields)
 * GET /api/fields/:name - Get one field definition
 * POST /api/fields/:name/elicit - Build a prompt asking the user for a missing field
 * POST /api/fields/:name/validate - Check a user-supplied value against the field
 */

import { IncomingMessage, ServerResponse } from 'http';
import {
  FIELD_DEFINITIONS,
  buildElicitationPrompt,
  getFieldInfo,
  getRequiredFields,
  getValuableFields,
  isFieldRequired,
  isValidFieldValue,
} from '../services/fields';
import {
  decodePathSegment,
  getQueryParam,
  readJsonObject,
  requiredString,
  sendError,
  sendJson,
  sendMethodNotAllowed,
  sendNotFound,
} from './http';

function handleList(req: IncomingMessage, res: ServerResponse): void {
  const section = getQueryParam(req, 'section');

  if (!section) {
    const fields = Object.entries(FIELD_DEFINITIONS).map(([name, definition]) => ({ name, ...definition }));
    sendJson(res, 200, { success: true, data: fields });
    return;
  }

  // Required fields first, then the ones worth asking for
  const names = [...getRequiredFields(section), ...getValuableFields(section)];
  const fields = names.flatMap((name) => {
    const definition = getFieldInfo(name);
    return definition ? [{ name, ...definition, required: isFieldRequired(section, name) }] : [];
  });

  sendJson(res, 200, { success: true, data: fields });
}

async function handleElicit(req: IncomingMessage, res: ServerResponse, fieldName: string): Promise<void> {
  try {
    const body = await readJsonObject(req);
    const sectionName = requiredString(body, 'section_name');
    const prompt = buildElicitationPrompt(fieldName, sectionName);

    sendJson(res, 200, {
      success: true,
      data: {
        description: `Elicit ${fieldName} for ${sectionName}`,
        required: isFieldRequired(sectionName, fieldName),
        prompt,
      },
    });
  } catch (err) {
    sendError(res, err, 'Error building elicitation prompt');
  }
}

async function handleValidate(req: IncomingMessage, res: ServerResponse, fieldName: string): Promise<void> {
  try {
    const body = await readJsonObject(req);
    const value = requiredString(body, 'value');

    sendJson(res, 200, {
      success: true,
      data: { name: fieldName, value, valid: isValidFieldValue(fieldName, value) },
    });
  } catch (err) {
    sendError(res, err, 'Error validating field value');
  }
}

export async function handleFields(req: IncomingMessage, res: ServerResponse, pathname: string): Promise<void> {
  if (pathname === '/api/fields' || pathname === '/api/fields/') {
    if (req.method !== 'GET') return sendMethodNotAllowed(res);
    return handleList(req, res);
  }

  const actionMatch = pathname.match(/^\/api\/fields\/([^/]+)\/(elicit|validate)$/);
  if (actionMatch) {
    if (req.method !== 'POST') return sendMethodNotAllowed(res);
    const name = decodePathSegment(actionMatch[1]);
    if (name === null) return sendNotFound(res);
    if (actionMatch[2] === 'elicit') return handleElicit(req, res, name);
    if (!getFieldInfo(name)) return sendNotFound(res, `Field not found: ${name}`);
    return handleValidate(req, res, name);
  }

  const match = pathname.match(/^\/api\/fields\/([^/]+)$/);
  if (!match) return sendNotFound(res);
  if (req.method !== 'GET') return sendMethodNotAllowed(res);

  const name = decodePathSegment(match[1]);
  if (name === null) return sendNotFound(res);
  const field = getFieldInfo(name);
  if (!field) return sendNotFound(res, `Field not found: ${name}`);

  sendJson(res, 200, { success: true, data: { name, ...field } });
}
