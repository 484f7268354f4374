import fs from 'fs/promises';
import path from 'path';

const unsafeCharacters = /[<>:"|?*\u0000-\u001f]/g;

/**
 * Single path segment safe for any filesystem, or undefined when nothing usable is left
 */
export function sanitizePathSegment(name: string | undefined): string | undefined {
  if (!name) return undefined;

  const base = path.basename(name.replace(/\\/g, '/'));
  const cleaned = base.replace(unsafeCharacters, '_').trim();

  if (!cleaned || cleaned === '.' || cleaned === '..') return undefined;
  return cleaned;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Незавершенные `<target>.part` файлы текущего запуска
 */
export class PartialFiles {
  private readonly pending = new Set<string>();

  get size(): number {
    return this.pending.size;
  }

  track(targetPath: string): string {
    const partialPath = `${targetPath}.part`;
    this.pending.add(partialPath);
    return partialPath;
  }

  async commit(partialPath: string, targetPath: string): Promise<void> {
    await fs.rename(partialPath, targetPath);
    this.pending.delete(partialPath);
  }

  async discard(partialPath: string): Promise<void> {
    this.pending.delete(partialPath);
    await fs.rm(partialPath, { force: true });
  }

  async discardAll(): Promise<void> {
    const partialPaths = [...this.pending];
    this.pending.clear();
    await Promise.all(
      partialPaths.map((partialPath) => fs.rm(partialPath, { force: true })),
    );
  }
}
