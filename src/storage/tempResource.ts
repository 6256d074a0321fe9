import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';

const SCOPE_PREFIX = 'transcribe-';

/**
 * A per-request scratch directory. Every file written through it is removed
 * with the directory when the scope ends, whichever way it ends.
 */
export class TempScope {
  private constructor(public readonly dir: string) {}

  static async create(baseDir: string): Promise<TempScope> {
    await fs.mkdir(baseDir, { recursive: true });
    const dir = await fs.mkdtemp(path.join(baseDir, SCOPE_PREFIX));
    return new TempScope(dir);
  }

  filePath(extension: string): string {
    return path.join(this.dir, `${randomUUID()}.${extension}`);
  }

  async writeFile(data: Buffer, extension: string): Promise<string> {
    const filePath = this.filePath(extension);
    await fs.writeFile(filePath, data);
    return filePath;
  }

  async release(): Promise<void> {
    try {
      await fs.rm(this.dir, { recursive: true, force: true });
    } catch (error) {
      log.warn({ err: error, event: 'temp_cleanup_failed', dir: this.dir }, 'temp cleanup failed');
    }
  }
}

export async function withTempScope<T>(baseDir: string, work: (scope: TempScope) => Promise<T>): Promise<T> {
  const scope = await TempScope.create(baseDir);
  try {
    return await work(scope);
  } finally {
    await scope.release();
  }
}
