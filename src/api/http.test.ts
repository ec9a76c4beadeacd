import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { describe, expect, it } from 'vitest';
import { decodePathSegment, parseBody } from './http';

function emptyRequest(): IncomingMessage {
  return new IncomingMessage(new Socket());
}

describe('parseBody', () => {
  it('keeps multi-byte characters split across chunks', async () => {
    const req = emptyRequest();
    const bytes = Buffer.from('{"vtt_content":"Jos\u00e9"}', 'utf8');
    // cut between the two bytes of the accented letter
    const split = bytes.indexOf(0xc3) + 1;

    const parsed = parseBody(req);
    req.emit('data', bytes.subarray(0, split));
    req.emit('data', bytes.subarray(split));
    req.emit('end');

    await expect(parsed).resolves.toEqual({ vtt_content: 'Jos\u00e9' });
  });

  it('treats an empty body as an empty object', async () => {
    const req = emptyRequest();

    const parsed = parseBody(req);
    req.emit('end');

    await expect(parsed).resolves.toEqual({});
  });

  it('rejects malformed JSON', async () => {
    const req = emptyRequest();

    const parsed = parseBody(req);
    req.emit('data', Buffer.from('{not json'));
    req.emit('end');

    await expect(parsed).rejects.toMatchObject({ code: 'INVALID_INPUT', message: 'Invalid JSON' });
  });
});

describe('decodePathSegment', () => {
  it('decodes percent escapes', () => {
    expect(decodePathSegment('weekly%20sync')).toBe('weekly sync');
  });

  it('returns null for a malformed escape', () => {
    expect(decodePathSegment('%E0%A4%A')).toBeNull();
  });
});
