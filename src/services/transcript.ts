/**
 * WebVTT transcript parsing
 *
 * Turns caption files from meeting recorders into speaker-labelled text and
 * turns. Speakers come from `<v Name>` voice tags or a leading `Name:` /
 * `Name (Role):` label.
 */

import { SpeakerTurn, TranscriptData } from '../types';
import { SnapshotError } from './errors';

export type TranscriptParser = (content: string, filename: string) => TranscriptData;

const UNKNOWN_SPEAKER = 'Unknown';
const SKIPPED_BLOCKS = ['NOTE', 'STYLE', 'REGION'];

const TIMING_PATTERN = /^(\S+)\s+-->\s+(\S+)/;
const TIMESTAMP_PATTERN = /^(?:(\d+):)?(\d{2}):(\d{2})\.(\d{3})$/;
const VOICE_TAG_PATTERN = /<v(?:\.[^\s>]*)?\s+([^>]+)>/;
const SPEAKER_PATTERN = /^([^:(]+?)(?:\s*\([^)]+\))?\s*:\s*(.*)$/;

interface Cue {
  start: number;
  end: number;
  text: string;
}

export function parseTimestamp(value: string): number | null {
  const match = value.match(TIMESTAMP_PATTERN);
  if (!match) return null;

  const hours = match[1] ? parseInt(match[1], 10) : 0;
  const minutes = parseInt(match[2], 10);
  const seconds = parseInt(match[3], 10);
  const millis = parseInt(match[4], 10);

  if (minutes > 59 || seconds > 59) return null;

  return hours * 3600 + minutes * 60 + seconds + millis / 1000;
}

export function formatTimestamp(totalSeconds: number): string {
  const totalMillis = Math.round(totalSeconds * 1000);
  const hours = Math.floor(totalMillis / 3_600_000);
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMillis % 60_000) / 1000);
  const millis = totalMillis % 1000;

  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
}

export function cleanTranscriptText(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/\s+/g, ' ')
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2018\u2019]/g, "'")
    .trim();
}

/**
 * Splits a `Name: text` or `Name (Role): text` line. Returns an empty speaker
 * when the line has no label.
 */
export function extractSpeakerInfo(text: string): { speaker: string; text: string } {
  const trimmed = text.trim();
  const match = trimmed.match(SPEAKER_PATTERN);

  if (match) {
    return { speaker: match[1].trim(), text: match[2].trim() };
  }

  return { speaker: '', text: trimmed };
}

function parseCueBlock(lines: string[], filename: string): Cue {
  const timingIndex = lines.findIndex((line) => line.includes('-->'));
  if (timingIndex === -1) {
    throw new SnapshotError('PARSE_ERROR', 'Invalid VTT format: cue block has no timing line', {
      filename,
      block: lines.join('\n').slice(0, 200),
    });
  }

  const timing = lines[timingIndex].trim().match(TIMING_PATTERN);
  const start = timing ? parseTimestamp(timing[1]) : null;
  const end = timing ? parseTimestamp(timing[2]) : null;

  if (start === null || end === null) {
    throw new SnapshotError('PARSE_ERROR', `Invalid VTT format: bad cue timing "${lines[timingIndex].trim()}"`, {
      filename,
    });
  }

  return {
    start,
    end,
    text: lines.slice(timingIndex + 1).join('\n'),
  };
}

export function parseVttContent(content: string, filename = 'transcript.vtt'): TranscriptData {
  console.log(`[Transcript] Parsing ${filename}`);

  if (!content || !content.trim()) {
    throw new SnapshotError('INVALID_INPUT', 'VTT content is empty', { filename });
  }

  const normalized = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const blocks = normalized
    .trim()
    .split(/\n[ \t]*\n/)
    .map((block) => block.split('\n').filter((line) => line.trim() !== ''))
    .filter((lines) => lines.length > 0);

  const header = blocks[0][0].trim();
  if (!header.startsWith('WEBVTT')) {
    throw new SnapshotError('PARSE_ERROR', "Invalid VTT format: content must start with 'WEBVTT'", {
      filename,
      first_line: header.slice(0, 100),
    });
  }

  const cues: Cue[] = [];
  for (const lines of blocks.slice(1)) {
    const firstWord = lines[0].trim().split(/\s/)[0];
    if (SKIPPED_BLOCKS.includes(firstWord)) continue;
    cues.push(parseCueBlock(lines, filename));
  }

  const speakers = new Set<string>();
  const turns: SpeakerTurn[] = [];
  const textParts: string[] = [];

  for (const cue of cues) {
    const voice = cue.text.match(VOICE_TAG_PATTERN);
    const cleaned = cleanTranscriptText(cue.text);
    const { speaker, text } = voice
      ? { speaker: cleanTranscriptText(voice[1]), text: cleaned }
      : extractSpeakerInfo(cleaned);

    const start = formatTimestamp(cue.start);
    const end = formatTimestamp(cue.end);

    if (speaker) {
      speakers.add(speaker);
      turns.push({ speaker, text, start, end });
      textParts.push(`${speaker}: ${text}`);
    } else if (text) {
      turns.push({ speaker: UNKNOWN_SPEAKER, text, start, end });
      textParts.push(text);
    }
  }

  const duration = cues.length > 0 ? cues[cues.length - 1].end : 0;
  const fullText = textParts.join('\n');

  console.log(
    `[Transcript] Parsed ${filename}: ${speakers.size} speakers, ${turns.length} turns, ${duration}s, ${fullText.length} chars`
  );

  return {
    text: fullText,
    speakers: [...speakers].sort(),
    speaker_turns: turns,
    duration,
    metadata: {
      filename,
      caption_count: cues.length,
      speaker_count: speakers.size,
    },
  };
}

export function summarizeTranscript(data: TranscriptData): string {
  const { speakers, speaker_turns, duration, text } = data;
  const minutes = Math.floor(duration / 60);
  const seconds = Math.floor(duration % 60);
  const named = speakers.slice(0, 3).join(', ') + (speakers.length > 3 ? '...' : '');

  return [
    'Transcript Summary:',
    `- Speakers: ${speakers.length} (${named})`,
    `- Duration: ${minutes}m ${seconds}s`,
    `- Speaking turns: ${speaker_turns.length}`,
    `- Total text length: ${text.length.toLocaleString('en-US')} characters`,
  ].join('\n');
}
