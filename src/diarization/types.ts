export type DiarizationMethod = 'stereo' | 'tinydiarize' | 'pyannote' | 'none';

export type DiarizationMode = 'fast' | 'balanced' | 'accurate';

/** Method requested by the client; `auto` lets the service choose. */
export type DiarizationMethodRequest = 'auto' | 'stereo' | 'tinydiarize' | 'pyannote';

export const UNKNOWN_SPEAKER = 'SPEAKER_UNKNOWN';

export interface DiarizationSegment {
  start: number;
  end: number;
  speaker: string;
  confidence?: number;
}

export interface DiarizationResult {
  segments: DiarizationSegment[];
  speakers: string[];
  totalDuration: number;
  method: DiarizationMethod;
}

export interface DiarizationParams {
  enableDiarization: boolean;
  mode: DiarizationMode;
  minSpeakers?: number;
  maxSpeakers?: number;
  useTinydiarize: boolean;
  method: DiarizationMethodRequest;
}

export interface AlignedSegment {
  start: number;
  end: number;
  text: string;
  speaker: string;
  /** Engine confidence for the text, when the engine reports one. */
  confidence?: number;
  /** Share of the segment's duration covered by the chosen speaker. */
  speakerConfidence: number;
}

export interface AlignedTranscription {
  segments: AlignedSegment[];
  speakers: string[];
  text: string;
  textWithSpeakers: string;
  textInline: string;
  diarizationMethod: DiarizationMethod;
}

export function speakerLabel(index: number): string {
  return `SPEAKER_${String(index).padStart(2, '0')}`;
}
