import { existsSync, mkdirSync } from "fs";
import { readFile, readdir, rename, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { CacheKey, CacheStore } from "./cache.ts";
import { isCacheKind } from "./cache.ts";

const ENTRY_FILE = /^(.+)_([a-z]+)\.json$/;

/**
 * One JSON file per (identifier, kind) under the cache directory. Writes go
 * to a temp file first and are renamed into place, so readers only ever see
 * a whole entry and the last writer wins.
 */
export class FileCacheStore implements CacheStore {
  constructor(private readonly cacheDir: string) {}

  get dir(): string {
    return this.cacheDir;
  }

  private pathOf(key: CacheKey): string {
    const safeId = key.identifier.replace(/[^A-Za-z0-9.^=-]/g, "-");
    return join(this.cacheDir, `${safeId}_${key.kind}.json`);
  }

  private ensureDir(): void {
    if (!existsSync(this.cacheDir)) {
      mkdirSync(this.cacheDir, { recursive: true });
    }
  }

  async read(key: CacheKey): Promise<string | null> {
    const path = this.pathOf(key);
    if (!existsSync(path)) return null;
    return readFile(path, "utf-8");
  }

  async write(key: CacheKey, contents: string): Promise<void> {
    this.ensureDir();
    const path = this.pathOf(key);
    const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
    await writeFile(tempPath, contents, "utf-8");
    await rename(tempPath, path);
  }

  async remove(key: CacheKey): Promise<void> {
    await rm(this.pathOf(key), { force: true });
  }

  async list(): Promise<CacheKey[]> {
    if (!existsSync(this.cacheDir)) return [];

    const files = await readdir(this.cacheDir);
    const keys: CacheKey[] = [];
    for (const file of files) {
      const match = ENTRY_FILE.exec(file);
      const identifier = match?.[1];
      const kind = match?.[2];
      if (identifier && kind && isCacheKind(kind)) {
        keys.push({ identifier, kind });
      }
    }
    return keys;
  }
}
