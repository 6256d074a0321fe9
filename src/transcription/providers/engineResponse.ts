import type { EngineResult, TranscriptSegment } from '../types';

const SPEAKER_TURN_TOKEN = '[SPEAKER_TURN]';
const SPEAKER_TURN_PATTERN = /\s*\[SPEAKER_TURN\]\s*/g;

function stripTurnMarkers(text: string): string {
  return text.replace(SPEAKER_TURN_PATTERN, ' ').trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(record: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return undefined;
}

/**
 * Engines answer in several shapes:
 * - { text: "..." }
 * - { transcription: "..." }
 * - { result: { text: "..." } }
 * - { segments: [{ text: "..." }, ...] }
 */
export function extractText(result: unknown): string {
  if (!isRecord(result)) return '';

  if (typeof result.text === 'string') return result.text;
  if (typeof result.transcription === 'string') return result.transcription;

  const nested = result.result;
  if (isRecord(nested)) {
    if (typeof nested.text === 'string') return nested.text;
    if (typeof nested.transcription === 'string') return nested.transcription;
  }

  return extractSegments(result)
    .map((segment) => segment.text)
    .filter((text) => text !== '')
    .join(' ')
    .trim();
}

function toSegment(raw: unknown): TranscriptSegment | null {
  if (!isRecord(raw) || typeof raw.text !== 'string') return null;

  // whisper.cpp reports offsets in milliseconds, OpenAI-style servers in seconds
  const offsets = isRecord(raw.offsets) ? raw.offsets : null;
  const start = offsets ? numberField(offsets, 'from') : numberField(raw, 'start', 't0');
  const end = offsets ? numberField(offsets, 'to') : numberField(raw, 'end', 't1');
  if (start === undefined || end === undefined) return null;
  const scale = offsets ? 1000 : 1;

  const speakerTurnNext = raw.speaker_turn_next === true || raw.text.includes(SPEAKER_TURN_TOKEN);
  const segment: TranscriptSegment = { start: start / scale, end: end / scale, text: stripTurnMarkers(raw.text) };
  const avgLogprob = numberField(raw, 'avg_logprob');
  if (avgLogprob !== undefined) {
    segment.confidence = Math.min(1, Math.max(0, Math.exp(avgLogprob)));
  }
  if (speakerTurnNext) {
    segment.speakerTurnNext = true;
  }
  return segment;
}

export function extractSegments(result: unknown): TranscriptSegment[] {
  if (!isRecord(result)) return [];
  const raw = Array.isArray(result.segments)
    ? result.segments
    : Array.isArray(result.transcription)
      ? result.transcription
      : [];
  const segments: TranscriptSegment[] = [];
  for (const item of raw) {
    const segment = toSegment(item);
    if (segment) segments.push(segment);
  }
  return segments;
}

/** Parses an engine response body; non-JSON bodies are taken as plain text. */
export function parseEngineResponse(body: string, contentType: string): EngineResult {
  if (!contentType.includes('application/json')) {
    return { text: body.trim(), segments: [] };
  }
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return { text: body.trim(), segments: [] };
  }
  const segments = extractSegments(data);
  const text = isRecord(data) && Array.isArray(data.transcription)
    ? segments.map((segment) => segment.text).join(' ')
    : extractText(data);
  return { text: stripTurnMarkers(text), segments };
}
