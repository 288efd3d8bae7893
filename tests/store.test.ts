import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreCorruptionError } from "../server/domain/errors.js";
import {
  createPipelineStores,
  DOCUMENTS,
  FileDocumentStore,
  MemoryDocumentStore,
  PostgresDocumentStore,
  type SqlClient
} from "../server/domain/store.js";
import { directory } from "./helpers/fakes.js";

describe("JsonCollection over the memory backend", () => {
  it("fills schema defaults on load", async () => {
    const documents = new MemoryDocumentStore({ [DOCUMENTS.directories]: [{ name: "a.example", url: "https://a.example" }] });
    const [record] = await createPipelineStores(documents).directories.load();
    expect(record).toEqual({
      name: "a.example",
      url: "https://a.example",
      siteStatus: "unknown",
      authType: "unknown",
      captchaType: "unknown",
      pricingType: "unknown",
      categories: []
    });
  });

  it("treats a missing plan and queue as empty but a missing catalog as fatal", async () => {
    const stores = createPipelineStores(new MemoryDocumentStore());
    await expect(stores.plan.load()).resolves.toEqual([]);
    await expect(stores.queue.load()).resolves.toEqual([]);
    await expect(stores.directories.load()).rejects.toBeInstanceOf(StoreCorruptionError);
  });

  it("rejects malformed records and duplicate names", async () => {
    const malformed = createPipelineStores(new MemoryDocumentStore({ [DOCUMENTS.directories]: [{ name: "a", url: "x", siteStatus: "alive" }] }));
    await expect(malformed.directories.load()).rejects.toThrow(/^directories\.json: 0\.siteStatus:/);

    const duplicated = createPipelineStores(
      new MemoryDocumentStore({ [DOCUMENTS.directories]: [directory({ name: "a" }), directory({ name: "a" })] })
    );
    await expect(duplicated.directories.load()).rejects.toThrow('directories.json: 1.name: Duplicate directory name "a"');
  });

  it("serializes saves so the last call wins", async () => {
    const documents = new MemoryDocumentStore({ [DOCUMENTS.directories]: [] });
    const stores = createPipelineStores(documents);
    const first = [directory({ name: "a" })];
    const second = [directory({ name: "a" }), directory({ name: "b" })];
    await Promise.all([stores.directories.save(first), stores.directories.save(second)]);
    expect(documents.writes).toBe(2);
    expect((await stores.directories.load()).map((record) => record.name)).toEqual(["a", "b"]);
  });

  it("snapshots items at save time", async () => {
    const documents = new MemoryDocumentStore({ [DOCUMENTS.directories]: [] });
    const stores = createPipelineStores(documents);
    const records = [directory({ name: "a" })];
    const saving = stores.directories.save(records);
    records[0] = directory({ name: "changed" });
    await saving;
    expect((await stores.directories.load())[0].name).toBe("a");
  });
});

describe("FileDocumentStore", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "dirsubmit-store-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("writes pretty JSON with a trailing newline and reads it back", async () => {
    const store = new FileDocumentStore(dataDir);
    await store.write(DOCUMENTS.queue, [{ name: "a", url: "https://a", reason: "auth_unknown", queuedAt: "2024-01-01T00:00:00.000Z" }]);
    const raw = await readFile(path.join(dataDir, DOCUMENTS.queue), "utf8");
    expect(raw.endsWith("]\n")).toBe(true);
    expect(raw).toContain('\n  {\n    "name": "a",');
    await expect(store.read(DOCUMENTS.queue)).resolves.toEqual([
      { name: "a", url: "https://a", reason: "auth_unknown", queuedAt: "2024-01-01T00:00:00.000Z" }
    ]);
  });

  it("returns undefined for a missing document and aborts on invalid JSON", async () => {
    const store = new FileDocumentStore(dataDir);
    await expect(store.read(DOCUMENTS.plan)).resolves.toBeUndefined();
    await writeFile(path.join(dataDir, DOCUMENTS.plan), "[{", "utf8");
    await expect(store.read(DOCUMENTS.plan)).rejects.toBeInstanceOf(StoreCorruptionError);
  });
});

class FakeSqlClient implements SqlClient {
  readonly statements: string[] = [];
  private readonly rows = new Map<string, unknown>();

  async query(text: string, values: unknown[] = []): Promise<{ rows: Array<Record<string, unknown>> }> {
    this.statements.push(text.trim().split(/\s+/)[0]);
    if (text.includes("INSERT INTO pipeline_documents")) {
      this.rows.set(String(values[0]), JSON.parse(String(values[1])));
      return { rows: [] };
    }
    if (text.includes("SELECT payload")) {
      const payload = this.rows.get(String(values[0]));
      return { rows: payload === undefined ? [] : [{ payload }] };
    }
    return { rows: [] };
  }
}

describe("PostgresDocumentStore", () => {
  it("creates its table once and upserts JSON payloads", async () => {
    const client = new FakeSqlClient();
    const store = new PostgresDocumentStore(client);
    await store.write(DOCUMENTS.plan, [{ directoryName: "a" }]);
    await store.write(DOCUMENTS.plan, [{ directoryName: "b" }]);
    await expect(store.read(DOCUMENTS.plan)).resolves.toEqual([{ directoryName: "b" }]);
    await expect(store.read(DOCUMENTS.queue)).resolves.toBeUndefined();
    expect(client.statements).toEqual(["CREATE", "INSERT", "INSERT", "SELECT", "SELECT"]);
  });
});
