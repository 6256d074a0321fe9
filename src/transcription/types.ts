export type ProviderKind = 'local' | 'cloud' | 'disabled';

export interface TranscriptionModel {
  id: string;
  displayName: string;
  provider: ProviderKind;
  /** Model file on disk, for local models. */
  path?: string;
}

export interface TranscriptSegment {
  /** Seconds from the start of the audio. */
  start: number;
  end: number;
  text: string;
  confidence?: number;
  /** The engine detected a change of speaker right after this segment. */
  speakerTurnNext?: boolean;
}

export interface EngineInput {
  /** 16 kHz mono PCM16 WAV, on disk and in memory. */
  wavPath: string;
  wav: Buffer;
  durationSeconds: number;
  language: string;
  /** Ask the engine for speaker-turn markers. */
  speakerTurns: boolean;
  signal?: AbortSignal;
}

export interface EngineResult {
  text: string;
  segments: TranscriptSegment[];
}
