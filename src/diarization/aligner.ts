import type { TranscriptSegment } from '../transcription/types';
import {
  AlignedSegment,
  AlignedTranscription,
  DiarizationResult,
  DiarizationSegment,
  UNKNOWN_SPEAKER,
} from './types';

/** Consecutive same-speaker segments closer than this (seconds) are merged. */
export const MERGE_GAP_SECONDS = 1.0;

export interface SpeakerMatch {
  speaker: string;
  confidence: number;
}

/**
 * Speaker with the largest temporal overlap; ties keep the earlier
 * diarization segment. No overlap at all yields SPEAKER_UNKNOWN with 0.
 */
export function bestSpeaker(start: number, end: number, diarization: DiarizationSegment[]): SpeakerMatch {
  let best: SpeakerMatch = { speaker: UNKNOWN_SPEAKER, confidence: 0 };
  let bestOverlap = 0;
  const duration = end - start;

  for (const segment of diarization) {
    const overlapStart = Math.max(start, segment.start);
    const overlapEnd = Math.min(end, segment.end);
    if (overlapStart >= overlapEnd) continue;
    const overlap = overlapEnd - overlapStart;
    if (overlap > bestOverlap) {
      bestOverlap = overlap;
      best = { speaker: segment.speaker, confidence: duration > 0 ? overlap / duration : 0 };
    }
  }
  return best;
}

function minDefined(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

export function mergeConsecutive(segments: AlignedSegment[]): AlignedSegment[] {
  const merged: AlignedSegment[] = [];
  for (const segment of segments) {
    const previous = merged[merged.length - 1];
    if (previous && previous.speaker === segment.speaker && segment.start - previous.end < MERGE_GAP_SECONDS) {
      const combined: AlignedSegment = {
        start: previous.start,
        end: segment.end,
        text: `${previous.text} ${segment.text}`,
        speaker: previous.speaker,
        speakerConfidence: Math.min(previous.speakerConfidence, segment.speakerConfidence),
      };
      const confidence = minDefined(previous.confidence, segment.confidence);
      if (confidence !== undefined) combined.confidence = confidence;
      merged[merged.length - 1] = combined;
    } else {
      merged.push({ ...segment });
    }
  }
  return merged;
}

/** Speaker blocks: "[A]:\nfirst words\n\n[B]:\nreply". */
export function renderBlocks(segments: AlignedSegment[]): string {
  const blocks: string[] = [];
  let currentSpeaker: string | null = null;
  let lines: string[] = [];
  for (const segment of segments) {
    if (segment.speaker !== currentSpeaker) {
      if (currentSpeaker !== null) blocks.push(`[${currentSpeaker}]:\n${lines.join(' ')}`);
      currentSpeaker = segment.speaker;
      lines = [];
    }
    lines.push(segment.text);
  }
  if (currentSpeaker !== null) blocks.push(`[${currentSpeaker}]:\n${lines.join(' ')}`);
  return blocks.join('\n\n');
}

/** One line: "[A]: first words [B]: reply". */
export function renderInline(segments: AlignedSegment[]): string {
  const parts: string[] = [];
  let currentSpeaker: string | null = null;
  for (const segment of segments) {
    if (segment.speaker !== currentSpeaker) {
      parts.push(`[${segment.speaker}]:`);
      currentSpeaker = segment.speaker;
    }
    parts.push(segment.text);
  }
  return parts.join(' ');
}

/**
 * Labels each transcript segment with its best-overlapping speaker, then
 * merges same-speaker neighbours in one left-to-right pass. Input order is
 * preserved.
 */
export function alignTranscript(
  transcript: TranscriptSegment[],
  diarization: DiarizationResult,
  text: string,
): AlignedTranscription {
  const labelled: AlignedSegment[] = transcript.map((segment) => {
    const match = bestSpeaker(segment.start, segment.end, diarization.segments);
    const aligned: AlignedSegment = {
      start: segment.start,
      end: segment.end,
      text: segment.text,
      speaker: match.speaker,
      speakerConfidence: match.confidence,
    };
    if (segment.confidence !== undefined) aligned.confidence = segment.confidence;
    return aligned;
  });

  const segments = mergeConsecutive(labelled);
  const speakers = [...new Set(segments.map((segment) => segment.speaker))].sort();

  return {
    segments,
    speakers,
    text,
    textWithSpeakers: renderBlocks(segments),
    textInline: renderInline(segments),
    diarizationMethod: diarization.method,
  };
}
