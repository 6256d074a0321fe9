import { DiarizationUnavailableError } from '../errors';
import type { PcmAudio } from '../audio/pcm';
import { durationSeconds, frameCount } from '../audio/pcm';
import { DiarizationMode, DiarizationResult, DiarizationSegment, speakerLabel } from './types';

const WINDOW_SECONDS: Record<DiarizationMode, number> = {
  fast: 1.0,
  balanced: 0.5,
  accurate: 0.25,
};

/** Windows where both channels stay below this RMS are treated as silence. */
const SILENCE_RMS = 0.01;

function rms(samples: Float32Array, from: number, to: number): number {
  if (to <= from) return 0;
  let sum = 0;
  for (let i = from; i < to; i += 1) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / (to - from));
}

export function pushOrExtend(segments: DiarizationSegment[], next: DiarizationSegment): void {
  const last = segments[segments.length - 1];
  if (last && last.speaker === next.speaker && Math.abs(last.end - next.start) < 1e-9) {
    last.end = next.end;
    if (last.confidence !== undefined && next.confidence !== undefined) {
      last.confidence = Math.min(last.confidence, next.confidence);
    }
    return;
  }
  segments.push(next);
}

export function distinctSpeakers(segments: DiarizationSegment[]): string[] {
  return [...new Set(segments.map((segment) => segment.speaker))].sort();
}

export function assertStereo(audio: PcmAudio): void {
  if (audio.channels.length < 2) {
    throw new DiarizationUnavailableError('Stereo diarization needs audio with at least two channels');
  }
}

/**
 * Channel-energy diarization: in each window the louder channel is the
 * active speaker (left SPEAKER_00, right SPEAKER_01).
 */
export function diarizeStereo(audio: PcmAudio, mode: DiarizationMode): DiarizationResult {
  assertStereo(audio);
  const [left, right] = audio.channels;
  const frames = frameCount(audio);
  const windowFrames = Math.max(1, Math.round(WINDOW_SECONDS[mode] * audio.sampleRateHz));
  const segments: DiarizationSegment[] = [];

  for (let from = 0; from < frames; from += windowFrames) {
    const to = Math.min(frames, from + windowFrames);
    const leftRms = rms(left, from, to);
    const rightRms = rms(right, from, to);
    if (leftRms < SILENCE_RMS && rightRms < SILENCE_RMS) continue;

    const leftDominant = leftRms >= rightRms;
    pushOrExtend(segments, {
      start: from / audio.sampleRateHz,
      end: to / audio.sampleRateHz,
      speaker: speakerLabel(leftDominant ? 0 : 1),
      confidence: (leftDominant ? leftRms : rightRms) / (leftRms + rightRms),
    });
  }

  return {
    segments,
    speakers: distinctSpeakers(segments),
    totalDuration: durationSeconds(audio),
    method: 'stereo',
  };
}
