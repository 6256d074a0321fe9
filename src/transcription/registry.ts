import type { Env } from '../env';
import { log } from '../log';
import type { TranscriptionProvider } from './provider';
import { DisabledTranscriptionProvider } from './providers/disabled';
import { OpenAiCompatibleProvider } from './providers/openAiCompatible';
import { WhisperServerProvider } from './providers/whisperServer';
import type { ProviderKind } from './types';

export type ProviderTable = Record<ProviderKind, TranscriptionProvider>;

/**
 * Maps a model's provider kind to the provider that serves it.
 * A kind without a configured backend falls back to the disabled provider.
 */
export class ProviderRegistry {
  constructor(private readonly providers: ProviderTable) {}

  get(kind: ProviderKind): TranscriptionProvider {
    const provider = this.providers[kind];
    log.debug({ event: 'transcription_provider_selected', kind, provider_id: provider.id }, 'provider selected');
    return provider;
  }
}

export function createProviderRegistry(
  env: Pick<Env, 'WHISPER_URL' | 'CLOUD_TRANSCRIBE_URL' | 'CLOUD_API_KEY' | 'ENGINE_TIMEOUT_MS'>,
): ProviderRegistry {
  const disabled = new DisabledTranscriptionProvider();
  let cloud: TranscriptionProvider = disabled;
  if (env.CLOUD_TRANSCRIBE_URL) {
    cloud = new OpenAiCompatibleProvider({
      baseUrl: env.CLOUD_TRANSCRIBE_URL,
      apiKey: env.CLOUD_API_KEY,
      timeoutMs: env.ENGINE_TIMEOUT_MS,
    });
  } else {
    log.info({ event: 'cloud_provider_disabled', reason: 'CLOUD_TRANSCRIBE_URL_unset' }, 'cloud provider disabled');
  }

  return new ProviderRegistry({
    local: new WhisperServerProvider({ baseUrl: env.WHISPER_URL, timeoutMs: env.ENGINE_TIMEOUT_MS }),
    cloud,
    disabled,
  });
}
