import type { EngineInput, EngineResult, ProviderKind, TranscriptionModel } from './types';

export interface TranscriptionProvider {
  readonly id: ProviderKind;
  transcribe(input: EngineInput, model: TranscriptionModel): Promise<EngineResult>;
  /** Loads a local model into the engine's memory; absent for providers with nothing to load. */
  loadModel?(model: TranscriptionModel): Promise<void>;
}
