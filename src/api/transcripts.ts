/**
 * Transcripts API
 *
 * POST /api/transcripts/parse - Parse WebVTT content without generating a snapshot
 */

import { IncomingMessage, ServerResponse } from 'http';
import { parseVttContent, summarizeTranscript } from '../services/transcript';
import { optionalString, readJsonObject, requiredString, sendError, sendJson, sendMethodNotAllowed } from './http';

export async function handleTranscripts(req: IncomingMessage, res: ServerResponse): Promise<void> {
  if (req.method !== 'POST') {
    sendMethodNotAllowed(res);
    return;
  }

  try {
    const body = await readJsonObject(req);
    const vttContent = requiredString(body, 'vtt_content');
    const filename = optionalString(body, 'filename') || 'transcript.vtt';

    const transcript = parseVttContent(vttContent, filename);

    sendJson(res, 200, {
      success: true,
      data: {
        transcript,
        summary: summarizeTranscript(transcript),
      },
    });
  } catch (err) {
    sendError(res, err, 'Error parsing transcript');
  }
}
