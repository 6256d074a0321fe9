import type { AudioDecoder } from '../../src/audio/audioDecoder';
import type { ProviderLookup } from '../../src/transcription/coordinator';
import type { Enhancement } from '../../src/transcription/enhancement';
import type { TranscriptionProvider } from '../../src/transcription/provider';
import type { EngineInput, EngineResult, ProviderKind, TranscriptionModel } from '../../src/transcription/types';

export const LOCAL_MODEL: TranscriptionModel = {
  id: 'ggml-base',
  displayName: 'base',
  provider: 'local',
  path: '/models/ggml-base.bin',
};

export const SECOND_LOCAL_MODEL: TranscriptionModel = {
  id: 'ggml-small',
  displayName: 'small',
  provider: 'local',
  path: '/models/ggml-small.bin',
};

export const CLOUD_MODEL: TranscriptionModel = { id: 'whisper-1', displayName: 'whisper-1', provider: 'cloud' };

type Responder = (input: EngineInput, model: TranscriptionModel) => EngineResult | Promise<EngineResult>;

export class FakeProvider implements TranscriptionProvider {
  readonly calls: Array<{ input: EngineInput; model: TranscriptionModel }> = [];

  constructor(
    private readonly respond: Responder,
    readonly id: ProviderKind = 'local',
  ) {}

  async transcribe(input: EngineInput, model: TranscriptionModel): Promise<EngineResult> {
    this.calls.push({ input, model });
    return this.respond(input, model);
  }
}

export function lookupOf(provider: TranscriptionProvider): ProviderLookup {
  return { get: () => provider };
}

export class FakeEnhancement implements Enhancement {
  readonly seen: string[] = [];

  constructor(
    private readonly rewrite: (text: string) => string,
    readonly isConfigured = true,
  ) {}

  async enhance(text: string): Promise<string> {
    this.seen.push(text);
    return this.rewrite(text);
  }
}

/** Fallback decoder for bytes that are not PCM WAV. */
export function failingDecoder(message: string): AudioDecoder {
  return {
    decode: async () => {
      throw new Error(message);
    },
  };
}

/** A latch that test code opens by hand. */
export function gate() {
  const waiting: Array<() => void> = [];
  let opened = false;
  return {
    wait(): Promise<void> {
      return opened ? Promise.resolve() : new Promise<void>((resolve) => waiting.push(resolve));
    },
    open(): void {
      opened = true;
      for (const resolve of waiting.splice(0)) resolve();
    },
  };
}
