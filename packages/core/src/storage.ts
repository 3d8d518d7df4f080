import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { dirname, join } from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { MIND_DIR } from './types.js';

/**
 * JSON file-backed storage with atomic writes and backup.
 *
 * Write strategy:
 * 1. Write data to .tmp file
 * 2. Copy current file to .backup
 * 3. Rename .tmp to target (with Windows NTFS retry loop)
 * 4. On read failure (unparseable or failing the schema), fall back to .backup
 */
export class JsonStore<T> {
  private data: T | null = null;
  readonly filePath: string;

  constructor(
    dataRoot: string,
    fileName: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
    private readonly defaultData: T,
  ) {
    this.filePath = join(dataRoot, MIND_DIR, fileName);
  }

  read(): T {
    if (this.data) return this.data;

    const main = this.load(this.filePath);
    if (main.ok) {
      this.data = main.value;
      return this.data;
    }
    if (main.error) console.error(`[store] ${this.filePath}: ${main.error}, trying backup`);

    const backupPath = this.filePath + '.backup';
    const backup = this.load(backupPath);
    if (backup.ok) {
      this.data = backup.value;
      writeFileSync(this.filePath, readFileSync(backupPath, 'utf-8'), 'utf-8');
      return this.data;
    }
    if (backup.error) console.error(`[store] ${backupPath}: ${backup.error}, using defaults`);

    this.data = structuredClone(this.defaultData);
    return this.data;
  }

  write(data: T): void {
    this.data = data;
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    const tmpPath = this.filePath + '.tmp';
    const backupPath = this.filePath + '.backup';
    const content = JSON.stringify(data, null, 2);

    writeFileSync(tmpPath, content, 'utf-8');

    if (existsSync(this.filePath)) {
      copyFileSync(this.filePath, backupPath);
    }

    if (!this.atomicRename(tmpPath, this.filePath)) {
      // Not atomic, but the .backup copy is already in place
      writeFileSync(this.filePath, content, 'utf-8');
      if (existsSync(tmpPath)) unlinkSync(tmpPath);
    }
  }

  update(fn: (data: T) => T): T {
    const current = this.read();
    const updated = fn(current);
    this.write(updated);
    return updated;
  }

  /** Drop the cached copy so the next read goes to disk. */
  invalidate(): void {
    this.data = null;
  }

  private load(path: string): { ok: true; value: T } | { ok: false; error?: string } {
    if (!existsSync(path)) return { ok: false };
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      return { ok: false, error: parsed.error.issues[0]?.message ?? 'schema mismatch' };
    }
    return { ok: true, value: parsed.data };
  }

  /** Rename with retry loop for Windows NTFS (file may be held by a watcher) */
  private atomicRename(src: string, dest: string): boolean {
    const MAX_RETRIES = 5;
    const RETRY_MS = 50;

    for (let i = 0; i < MAX_RETRIES; i++) {
      try {
        renameSync(src, dest);
        return true;
      } catch (err: unknown) {
        const code = err instanceof Error && 'code' in err ? err.code : undefined;
        if (code !== 'EPERM' && code !== 'EACCES' && code !== 'EBUSY') {
          return false;
        }
        if (i < MAX_RETRIES - 1) {
          const start = Date.now();
          while (Date.now() - start < RETRY_MS * (i + 1)) {
            /* spin */
          }
        }
      }
    }
    return false;
  }
}
