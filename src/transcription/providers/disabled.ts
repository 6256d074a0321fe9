import type { TranscriptionProvider } from '../provider';
import type { EngineInput, EngineResult, TranscriptionModel } from '../types';

export class DisabledTranscriptionProvider implements TranscriptionProvider {
  public readonly id = 'disabled';

  public async transcribe(_input: EngineInput, _model: TranscriptionModel): Promise<EngineResult> {
    return { text: '', segments: [] };
  }
}
