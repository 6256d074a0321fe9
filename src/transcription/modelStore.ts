import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';
import type { TranscriptionModel } from './types';

export interface ModelStore {
  availableModels(): TranscriptionModel[];
  currentModel(): TranscriptionModel | null;
  /** True when the current model is ready to serve; models without a load step always are. */
  isLoaded(): boolean;
  selectModel(id: string): TranscriptionModel;
  /** Performs the load; touches no store state, so it can run outside the owner. */
  loadModel(id: string): Promise<void>;
  markLoaded(id: string): void;
}

export class UnknownModelError extends Error {
  constructor(public readonly modelId: string) {
    super(`unknown model '${modelId}'`);
    this.name = 'UnknownModelError';
  }
}

const LOCAL_MODEL_PATTERN = /^ggml-.+\.bin$/;

export function displayNameFor(id: string): string {
  return id.replace(/^ggml-/, '');
}

/** Local `ggml-*.bin` files in `modelsDir` followed by the configured cloud model ids. */
export async function scanModelCatalogue(
  modelsDir: string | undefined,
  cloudModels: string | undefined,
): Promise<TranscriptionModel[]> {
  const models: TranscriptionModel[] = [];

  if (modelsDir) {
    try {
      const entries = await fs.readdir(modelsDir, { withFileTypes: true });
      const files = entries
        .filter((entry) => entry.isFile() && LOCAL_MODEL_PATTERN.test(entry.name))
        .map((entry) => entry.name)
        .sort();
      for (const file of files) {
        const id = file.slice(0, -'.bin'.length);
        models.push({ id, displayName: displayNameFor(id), provider: 'local', path: path.join(modelsDir, file) });
      }
    } catch (error) {
      log.warn({ err: error, event: 'model_scan_failed', models_dir: modelsDir }, 'model directory scan failed');
    }
  }

  for (const raw of (cloudModels ?? '').split(',')) {
    const id = raw.trim();
    if (id !== '') {
      models.push({ id, displayName: id, provider: 'cloud' });
    }
  }
  return models;
}

export type ModelLoader = (model: TranscriptionModel) => Promise<void>;

/**
 * Plain state holder for the model catalogue, the selection and the loaded
 * flag. Not safe for concurrent use: `ModelState` is its only caller.
 */
export class CatalogueModelStore implements ModelStore {
  private current: TranscriptionModel | null = null;
  private loadedId: string | null = null;

  constructor(
    private readonly models: TranscriptionModel[],
    private readonly loader: ModelLoader,
  ) {}

  availableModels(): TranscriptionModel[] {
    return [...this.models];
  }

  currentModel(): TranscriptionModel | null {
    return this.current;
  }

  isLoaded(): boolean {
    if (!this.current) return false;
    return this.current.provider !== 'local' || this.loadedId === this.current.id;
  }

  selectModel(id: string): TranscriptionModel {
    const model = this.find(id);
    this.current = model;
    return model;
  }

  async loadModel(id: string): Promise<void> {
    await this.loader(this.find(id));
  }

  markLoaded(id: string): void {
    this.loadedId = this.find(id).id;
  }

  private find(id: string): TranscriptionModel {
    const model = this.models.find((candidate) => candidate.id === id);
    if (!model) {
      throw new UnknownModelError(id);
    }
    return model;
  }
}
