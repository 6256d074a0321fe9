import { diarizeStereoInWorker } from '../audio/audioWorkerClient';
import type { PcmAudio } from '../audio/pcm';
import { durationSeconds } from '../audio/pcm';
import { DiarizationMethodNotImplementedError, DiarizationUnavailableError } from '../errors';
import { log } from '../log';
import type { TranscriptSegment } from '../transcription/types';
import { distinctSpeakers, pushOrExtend } from './stereo';
import {
  DiarizationMethod,
  DiarizationMode,
  DiarizationParams,
  DiarizationResult,
  DiarizationSegment,
  speakerLabel,
} from './types';

const DEFAULT_TURN_SPEAKERS = 2;

export type StereoDiarizer = (audio: PcmAudio, mode: DiarizationMode, signal?: AbortSignal) => Promise<DiarizationResult>;

export interface DiarizationInput {
  /** Decoded audio with its original channels. */
  audio: PcmAudio;
  transcript: TranscriptSegment[];
  params: DiarizationParams;
  signal?: AbortSignal;
}

/**
 * Speaker turns reported by the engine: each flagged segment hands over to
 * the next speaker, cycling through at most `maxSpeakers` labels.
 */
export function diarizeSpeakerTurns(
  transcript: TranscriptSegment[],
  totalDuration: number,
  maxSpeakers = DEFAULT_TURN_SPEAKERS,
): DiarizationResult {
  const cycle = Math.max(1, maxSpeakers);
  const segments: DiarizationSegment[] = [];
  let speaker = 0;
  for (const segment of transcript) {
    pushOrExtend(segments, { start: segment.start, end: segment.end, speaker: speakerLabel(speaker) });
    if (segment.speakerTurnNext) {
      speaker = (speaker + 1) % cycle;
    }
  }
  return {
    segments,
    speakers: distinctSpeakers(segments),
    totalDuration,
    method: 'tinydiarize',
  };
}

export function resolveMethod(
  params: DiarizationParams,
  channels: number,
  transcript: TranscriptSegment[],
): DiarizationMethod {
  if (params.method !== 'auto') return params.method;
  if (params.useTinydiarize) return 'tinydiarize';
  if (channels >= 2) return 'stereo';
  if (transcript.some((segment) => segment.speakerTurnNext)) return 'tinydiarize';
  return 'none';
}

/** Picks a method per request; channel analysis runs off the event loop. */
export class DiarizationService {
  constructor(private readonly stereo: StereoDiarizer = diarizeStereoInWorker) {}

  async diarize(input: DiarizationInput): Promise<DiarizationResult> {
    const method = resolveMethod(input.params, input.audio.channels.length, input.transcript);
    log.info(
      { event: 'diarization_method_selected', method, mode: input.params.mode, channels: input.audio.channels.length },
      'diarization method selected',
    );

    switch (method) {
      case 'stereo':
        return this.stereo(input.audio, input.params.mode, input.signal);
      case 'tinydiarize':
        return diarizeSpeakerTurns(input.transcript, durationSeconds(input.audio), input.params.maxSpeakers);
      case 'pyannote':
        throw new DiarizationMethodNotImplementedError('pyannote');
      case 'none':
        throw new DiarizationUnavailableError();
    }
  }
}
