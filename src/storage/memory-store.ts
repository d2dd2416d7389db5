import type { CacheKey, CacheStore } from "./cache.ts";
import { isCacheKind } from "./cache.ts";

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, string>();

  private keyOf(key: CacheKey): string {
    return `${key.identifier}_${key.kind}`;
  }

  async read(key: CacheKey): Promise<string | null> {
    return this.entries.get(this.keyOf(key)) ?? null;
  }

  async write(key: CacheKey, contents: string): Promise<void> {
    this.entries.set(this.keyOf(key), contents);
  }

  async remove(key: CacheKey): Promise<void> {
    this.entries.delete(this.keyOf(key));
  }

  async list(): Promise<CacheKey[]> {
    const keys: CacheKey[] = [];
    for (const name of this.entries.keys()) {
      const split = name.lastIndexOf("_");
      const kind = name.slice(split + 1);
      if (split > 0 && isCacheKind(kind)) {
        keys.push({ identifier: name.slice(0, split), kind });
      }
    }
    return keys;
  }
}
