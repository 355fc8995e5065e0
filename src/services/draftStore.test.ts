import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError } from "../lib/errors";
import { DraftStore, newDraft } from "./draftStore";
import { extractEvent } from "./extractService";

const now = new Date("2024-06-01T16:00:00Z");

function sampleDraft(stamp = now) {
  const result = extractEvent("Summer Block Party\nSaturday, July 20, 2024\n7-9pm\nat Central Park", {
    now,
    timezone: "America/New_York",
  });
  return newDraft({
    rawText: "Summer Block Party",
    timezone: "America/New_York",
    event: result.event,
    warnings: result.warnings,
    imageName: "flyer.png",
    now: stamp,
  });
}

describe("DraftStore", () => {
  let dir: string;
  let store: DraftStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "drafts-"));
    store = new DraftStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves and loads a draft", async () => {
    const draft = sampleDraft();
    await store.save(draft);
    expect(await store.load(draft.id)).toEqual(draft);
    expect(await readdir(dir)).toEqual([`${draft.id}.json`]);
  });

  it("returns null for unknown, invalid or corrupt drafts", async () => {
    expect(await store.load("missing")).toBeNull();
    expect(await store.load("../etc/passwd")).toBeNull();
    await writeFile(path.join(dir, "broken.json"), "{ not json", "utf8");
    expect(await store.load("broken")).toBeNull();
    await writeFile(path.join(dir, "wrong.json"), JSON.stringify({ id: "wrong" }), "utf8");
    expect(await store.load("wrong")).toBeNull();
  });

  it("throws NotFoundError from require", async () => {
    await expect(store.require("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("updates a draft and bumps updatedAt", async () => {
    const draft = await store.save(sampleDraft());
    const later = new Date(2024, 5, 2, 9, 0);
    const updated = await store.update(draft.id, (d) => ({ ...d, googleEventId: "evt-1" }), later);
    expect(updated.googleEventId).toBe("evt-1");
    expect(updated.createdAt).toBe(draft.createdAt);
    expect(updated.updatedAt).toBe(later.toISOString());
    expect((await store.require(draft.id)).googleEventId).toBe("evt-1");
  });

  it("applies concurrent updates to one draft one after the other", async () => {
    const draft = await store.save(sampleDraft());
    await Promise.all([
      store.update(draft.id, (d) => ({ ...d, warnings: [...d.warnings, "first"] })),
      store.update(draft.id, (d) => ({ ...d, googleEventId: "evt-1" })),
      store.update(draft.id, (d) => ({ ...d, warnings: [...d.warnings, "second"] })),
    ]);

    const stored = await store.require(draft.id);
    expect(stored.warnings.slice(-2)).toEqual(["first", "second"]);
    expect(stored.googleEventId).toBe("evt-1");
  });

  it("keeps the draft and the queue intact when a change throws", async () => {
    const draft = await store.save(sampleDraft());
    const refused = store.update(draft.id, () => {
      throw new Error("refused");
    });
    const accepted = store.update(draft.id, (d) => ({ ...d, googleEventId: "evt-2" }));

    await expect(refused).rejects.toThrow("refused");
    await expect(accepted).resolves.toMatchObject({ googleEventId: "evt-2" });
    expect((await store.require(draft.id)).warnings).toEqual(draft.warnings);
  });

  it("lists drafts newest first", async () => {
    const older = await store.save(sampleDraft(new Date(2024, 5, 1, 9, 0)));
    const newer = await store.save(sampleDraft(new Date(2024, 5, 1, 10, 0)));
    expect((await store.list()).map((d) => d.id)).toEqual([newer.id, older.id]);
  });

  it("lists nothing when the directory does not exist yet", async () => {
    expect(await new DraftStore(path.join(dir, "nope")).list()).toEqual([]);
  });

  it("deletes drafts", async () => {
    const draft = await store.save(sampleDraft());
    expect(await store.delete(draft.id)).toBe(true);
    expect(await store.delete(draft.id)).toBe(false);
    expect(await store.load(draft.id)).toBeNull();
  });
});
