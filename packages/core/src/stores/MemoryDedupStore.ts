import type { DedupStorePort } from "../ports/DedupStore.js";

export class MemoryDedupStore implements DedupStorePort {
  private readonly entries = new Map<string, string>();

  async has(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async set(key: string, value = ""): Promise<void> {
    this.entries.set(key, value);
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

/** "YYYY-MM-DD|signature", the day taken in UTC */
export function dedupKey(signature: string, day: Date): string {
  return `${day.toISOString().slice(0, 10)}|${signature}`;
}
