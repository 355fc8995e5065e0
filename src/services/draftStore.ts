// src/services/draftStore.ts
import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { draftEventSchema } from "../schemas/draft.schema";
import type { DraftEvent } from "../types/drafts";
import type { EventRecord } from "../types/events";
import { NotFoundError } from "../lib/errors";

const DRAFT_ID = /^[A-Za-z0-9-]+$/;

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function serialize(value: DraftEvent): string {
  return JSON.stringify(value, null, 2) + "\n";
}

export function newDraft(params: {
  rawText: string;
  timezone: string;
  event: EventRecord;
  warnings: readonly string[];
  imageName?: string;
  now?: Date;
}): DraftEvent {
  const stamp = (params.now ?? new Date()).toISOString();
  return {
    id: randomUUID(),
    createdAt: stamp,
    updatedAt: stamp,
    imageName: params.imageName,
    rawText: params.rawText,
    timezone: params.timezone,
    event: params.event,
    warnings: [...params.warnings],
  };
}

/** One JSON file per draft under `dir` */
export class DraftStore {
  // Tail of the pending read-modify-write chain per draft id
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly dir: string) {}

  /** Runs `task` once every earlier task queued for the same id has settled */
  private async serialized<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(id, tail);
    try {
      return await run;
    } finally {
      if (this.queues.get(id) === tail) this.queues.delete(id);
    }
  }

  private pathFor(id: string): string {
    // ids end up in file names
    if (!DRAFT_ID.test(id)) throw new NotFoundError("Draft", id);
    return path.join(this.dir, `${id}.json`);
  }

  async save(draft: DraftEvent): Promise<DraftEvent> {
    const parsed = draftEventSchema.safeParse(draft);
    if (!parsed.success) throw new Error(`Refusing to persist invalid draft: ${parsed.error.message}`);

    const filePath = this.pathFor(draft.id);
    const tmpPath = path.join(this.dir, `${draft.id}.tmp.${process.pid}.${Date.now()}.json`);

    await mkdir(this.dir, { recursive: true });
    await writeFile(tmpPath, serialize(parsed.data), "utf8");
    await rename(tmpPath, filePath);
    return parsed.data;
  }

  /** null when the draft does not exist or no longer parses */
  async load(id: string): Promise<DraftEvent | null> {
    if (!DRAFT_ID.test(id)) return null;
    try {
      const json: unknown = JSON.parse(await readFile(this.pathFor(id), "utf8"));
      const parsed = draftEventSchema.safeParse(json);
      return parsed.success ? parsed.data : null;
    } catch (err) {
      if (isMissing(err) || err instanceof SyntaxError) return null;
      throw err;
    }
  }

  async require(id: string): Promise<DraftEvent> {
    const draft = await this.load(id);
    if (!draft) throw new NotFoundError("Draft", id);
    return draft;
  }

  /**
   * Read-modify-write, one at a time per id. `change` sees the latest stored
   * draft and may throw to abort without writing.
   */
  async update(id: string, change: (draft: DraftEvent) => DraftEvent, now = new Date()): Promise<DraftEvent> {
    return this.serialized(id, async () => {
      const current = await this.require(id);
      const next = change(current);
      return this.save({ ...next, id: current.id, createdAt: current.createdAt, updatedAt: now.toISOString() });
    });
  }

  /** false when there was nothing to delete */
  async delete(id: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(id));
      return true;
    } catch (err) {
      if (isMissing(err) || err instanceof NotFoundError) return false;
      throw err;
    }
  }

  /** Newest first */
  async list(): Promise<DraftEvent[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    const ids = names.filter((n) => n.endsWith(".json") && !n.includes(".tmp.")).map((n) => n.slice(0, -".json".length));
    const drafts = await Promise.all(ids.map((id) => this.load(id)));
    return drafts
      .filter((d): d is DraftEvent => d !== null)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }
}
