import { ApiServer } from './api/apiServer';
import { AudioDecoder, CompositeAudioDecoder, FfmpegAudioDecoder } from './audio/audioDecoder';
import { loadServerConfig, ServerConfig } from './config';
import { DiarizationService } from './diarization/diarizationService';
import { env } from './env';
import { ProviderLookup, TranscriptionCoordinator } from './transcription/coordinator';
import { Enhancement, HttpEnhancement } from './transcription/enhancement';
import { CatalogueModelStore, ModelStore, scanModelCatalogue } from './transcription/modelStore';
import { ModelState } from './transcription/modelState';
import { createProviderRegistry } from './transcription/registry';
import { resolveWordReplacement, WordReplacement } from './transcription/wordReplacement';

export interface ServerDeps {
  config?: ServerConfig;
  store?: ModelStore;
  providers?: ProviderLookup;
  decoder?: AudioDecoder;
  wordReplacement?: WordReplacement;
  enhancement?: Enhancement;
  enhancementEnabled?: boolean;
  wordReplacementEnabled?: boolean;
}

export interface BuiltServer {
  api: ApiServer;
  state: ModelState;
  coordinator: TranscriptionCoordinator;
  config: ServerConfig;
}

/** Wires the API from configuration; any collaborator can be swapped through `deps`. */
export async function buildServer(deps: ServerDeps = {}): Promise<BuiltServer> {
  const config = deps.config ?? loadServerConfig();
  const providers = deps.providers ?? createProviderRegistry(env);

  let store = deps.store;
  if (!store) {
    const models = await scanModelCatalogue(env.MODELS_DIR, env.CLOUD_MODELS);
    store = new CatalogueModelStore(models, async (model) => {
      const provider = providers.get(model.provider);
      if (provider.loadModel) {
        await provider.loadModel(model);
      }
    });
  }

  const requested = deps.wordReplacementEnabled ?? env.WORD_REPLACEMENT_ENABLED;
  const { replacement: wordReplacement, enabled: wordReplacementEnabled } = deps.wordReplacement
    ? { replacement: deps.wordReplacement, enabled: requested }
    : await resolveWordReplacement(requested, env.WORD_REPLACEMENTS_PATH);

  const enhancement =
    deps.enhancement ??
    new HttpEnhancement({
      url: env.ENHANCEMENT_URL,
      apiKey: env.ENHANCEMENT_API_KEY,
      model: env.ENHANCEMENT_MODEL,
      timeoutMs: env.ENHANCEMENT_TIMEOUT_MS,
    });

  const state = new ModelState(store, {
    enhancementEnabled: deps.enhancementEnabled ?? env.ENHANCEMENT_ENABLED,
    wordReplacementEnabled,
  });

  const decoder =
    deps.decoder ??
    new CompositeAudioDecoder(new FfmpegAudioDecoder({ ffmpegPath: env.FFMPEG_PATH, timeoutMs: env.ENGINE_TIMEOUT_MS }));

  const coordinator = new TranscriptionCoordinator({
    state,
    providers,
    decoder,
    wordReplacement,
    enhancement,
    diarization: new DiarizationService(),
    tempDir: config.tempDir,
    language: config.language,
    diarizationFailurePolicy: config.diarizationFailurePolicy,
  });

  const api = new ApiServer({ config, coordinator, state });
  return { api, state, coordinator, config };
}
