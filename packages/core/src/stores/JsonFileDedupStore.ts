import { readFile } from "node:fs/promises";
import type { DedupStorePort } from "../ports/DedupStore.js";
import { writeFileAtomic } from "../util/atomicWrite.js";

/**
 * Dedup keys kept in one JSON object on disk ({ "2024-01-01|sig": "QA-12" }).
 * Writes within a process are serialized and `has` waits for pending ones;
 * the file is replaced atomically.
 */
export class JsonFileDedupStore implements DedupStorePort {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly file: string) {}

  async has(key: string): Promise<boolean> {
    await this.queue;
    return Object.prototype.hasOwnProperty.call(await this.read(), key);
  }

  set(key: string, value = ""): Promise<void> {
    const run = this.queue.then(async () => {
      const data = await this.read();
      data[key] = value;
      await writeFileAtomic(this.file, `${JSON.stringify(data, null, 2)}\n`);
    });
    // keep the chain alive after a failure; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  async read(): Promise<Record<string, string>> {
    let text: string;
    try {
      text = await readFile(this.file, "utf8");
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Dedup store ${this.file} does not hold a JSON object`);
    }
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(parsed)) out[k] = String(v);
    return out;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
