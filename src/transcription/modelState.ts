import { log } from '../log';
import type { ModelStore } from './modelStore';
import type { TranscriptionModel } from './types';

export interface ModelSnapshot {
  current: TranscriptionModel | null;
  loaded: boolean;
  available: TranscriptionModel[];
  enhancementEnabled: boolean;
  wordReplacementEnabled: boolean;
}

export type ReadyModel =
  | { ok: true; model: TranscriptionModel; loadedNow: boolean }
  | { ok: false; reason: 'no_model' }
  | { ok: false; reason: 'load_failed'; model: TranscriptionModel; cause: unknown };

interface WorkItem {
  name: string;
  run: () => void;
}

interface InflightLoad {
  modelId: string;
  promise: Promise<void>;
}

export interface ModelStateOptions {
  enhancementEnabled: boolean;
  wordReplacementEnabled: boolean;
}

/**
 * Sole owner of the model selection, the loaded flag and the enhancement
 * switch. Every read and write is a work item on one mailbox, run strictly
 * in order; work items are synchronous and never await. Model loads are
 * started from the mailbox but awaited outside it, and their completion is
 * posted back as another work item.
 */
export class ModelState {
  private readonly items: WorkItem[] = [];
  private running = false;
  private inflight: InflightLoad | null = null;
  private enhancementEnabled: boolean;
  private readonly wordReplacementEnabled: boolean;

  constructor(
    private readonly store: ModelStore,
    options: ModelStateOptions,
  ) {
    this.enhancementEnabled = options.enhancementEnabled;
    this.wordReplacementEnabled = options.wordReplacementEnabled;
  }

  snapshot(): Promise<ModelSnapshot> {
    return this.submit('snapshot', () => ({
      current: this.store.currentModel(),
      loaded: this.store.isLoaded(),
      available: this.store.availableModels(),
      enhancementEnabled: this.enhancementEnabled,
      wordReplacementEnabled: this.wordReplacementEnabled,
    }));
  }

  selectModel(id: string): Promise<TranscriptionModel> {
    return this.submit('select_model', () => this.store.selectModel(id));
  }

  setEnhancementEnabled(enabled: boolean): Promise<void> {
    return this.submit('set_enhancement', () => {
      this.enhancementEnabled = enabled;
    });
  }

  /**
   * Resolves the current model, loading it first when it is local and not in
   * memory. Concurrent callers share one load.
   */
  async ensureReady(): Promise<ReadyModel> {
    const step = await this.submit('ensure_ready', () => {
      const model = this.store.currentModel();
      if (!model) return { kind: 'no_model' as const };
      if (this.store.isLoaded()) return { kind: 'ready' as const, model };
      if (!this.inflight || this.inflight.modelId !== model.id) {
        this.inflight = { modelId: model.id, promise: this.runLoad(model) };
      }
      return { kind: 'loading' as const, model, promise: this.inflight.promise };
    });

    if (step.kind === 'no_model') {
      return { ok: false, reason: 'no_model' };
    }
    if (step.kind === 'ready') {
      return { ok: true, model: step.model, loadedNow: false };
    }
    try {
      await step.promise;
      return { ok: true, model: step.model, loadedNow: true };
    } catch (error) {
      return { ok: false, reason: 'load_failed', model: step.model, cause: error };
    }
  }

  /**
   * Picks `preferredId` (or the first available model) when nothing is
   * selected yet and loads it. Failures are logged; the server starts anyway.
   */
  async warmUp(preferredId?: string): Promise<void> {
    const selected = await this.submit('warm_up_select', () => {
      const existing = this.store.currentModel();
      if (existing) return existing;
      const available = this.store.availableModels();
      const preferred = preferredId ? available.find((model) => model.id === preferredId) : undefined;
      if (preferredId && !preferred) {
        log.warn({ event: 'default_model_missing', model: preferredId }, 'configured default model not found');
      }
      const choice = preferred ?? available.find((model) => model.provider === 'local') ?? available[0];
      return choice ? this.store.selectModel(choice.id) : null;
    });

    if (!selected) {
      log.warn({ event: 'model_warm_up_skipped', reason: 'no_models_available' }, 'no transcription model available');
      return;
    }

    const ready = await this.ensureReady();
    if (ready.ok) {
      log.info(
        { event: 'model_warm_up_done', model: ready.model.id, loaded_now: ready.loadedNow },
        'transcription model ready',
      );
    } else if (ready.reason === 'load_failed') {
      log.error({ err: ready.cause, event: 'model_warm_up_failed', model: ready.model.id }, 'model warm-up failed');
    }
  }

  private async runLoad(model: TranscriptionModel): Promise<void> {
    const startedAt = Date.now();
    log.info({ event: 'model_load_start', model: model.id }, 'loading transcription model');
    try {
      await this.store.loadModel(model.id);
      await this.submit('mark_loaded', () => this.store.markLoaded(model.id));
      log.info({ event: 'model_load_done', model: model.id, elapsed_ms: Date.now() - startedAt }, 'model loaded');
    } finally {
      await this.submit('clear_inflight', () => {
        if (this.inflight?.modelId === model.id) {
          this.inflight = null;
        }
      });
    }
  }

  private submit<T>(name: string, task: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.items.push({
        name,
        run: () => {
          try {
            resolve(task());
          } catch (error) {
            reject(error);
          }
        },
      });
      if (!this.running) {
        this.running = true;
        queueMicrotask(() => this.runQueue());
      }
    });
  }

  private runQueue(): void {
    while (this.items.length > 0) {
      const item = this.items.shift();
      if (!item) continue;
      log.trace({ event: 'model_state_task', task: item.name }, 'model state task');
      item.run();
    }
    this.running = false;
  }
}
