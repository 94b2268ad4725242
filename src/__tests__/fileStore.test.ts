import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import { JsonFileStore } from "../fileStore";
import { makeTempDir, removeDir, silentLogger } from "./helpers";

const countsSchema = z.object({ counts: z.array(z.number()) });
type Counts = z.output<typeof countsSchema>;

describe("JsonFileStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = path.join(dir, "nested", "counts.json");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function open(): JsonFileStore<Counts> {
    return new JsonFileStore(file, countsSchema, () => ({ counts: [] }), silentLogger());
  }

  it("starts empty when the file is missing", async () => {
    const store = open();
    expect(await store.read()).toEqual({ counts: [] });
    expect(await store.exists()).toBe(false);
  });

  it("writes through a temp file and keeps a backup", async () => {
    const store = open();
    await store.write({ counts: [1] });
    await store.update((current) => ({ counts: [...current.counts, 2] }));

    expect(JSON.parse(await fs.readFile(file, "utf8"))).toEqual({ counts: [1, 2] });
    expect(JSON.parse(await fs.readFile(`${file}.bak`, "utf8"))).toEqual({ counts: [1] });
    await expect(fs.stat(`${file}.tmp`)).rejects.toThrow();
    expect(await open().read()).toEqual({ counts: [1, 2] });
  });

  it("falls back to empty on unreadable or invalid content", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, "{ not json");
    expect(await open().read()).toEqual({ counts: [] });

    await fs.writeFile(file, JSON.stringify({ counts: ["one"] }));
    expect(await open().read()).toEqual({ counts: [] });
  });

  it("rereads the file on refresh", async () => {
    const store = open();
    await store.write({ counts: [1] });
    await fs.writeFile(file, JSON.stringify({ counts: [3] }));
    expect(await store.read()).toEqual({ counts: [1] });
    expect(await store.refresh()).toEqual({ counts: [3] });
  });
});
