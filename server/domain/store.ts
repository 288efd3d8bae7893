import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { Pool } from "pg";
import type { z } from "zod";
import { StoreCorruptionError } from "./errors.js";
import {
  browserCheckQueueSchema,
  describeZodError,
  directoryCatalogSchema,
  submissionPlanSchema
} from "./schemas.js";
import type { BrowserCheckEntry, DirectoryRecord, SubmissionTarget } from "./types.js";

export const DOCUMENTS = {
  directories: "directories.json",
  plan: "submission_plan.json",
  queue: "browser_check_queue.json"
} as const;

export type DocumentName = (typeof DOCUMENTS)[keyof typeof DOCUMENTS];

/** Raw JSON documents by name. Typed collections sit on top of this. */
export interface DocumentStore {
  readonly kind: "file" | "postgres" | "memory";
  read(name: DocumentName): Promise<unknown | undefined>;
  write(name: DocumentName, value: unknown): Promise<void>;
  close?(): Promise<void>;
}

export class FileDocumentStore implements DocumentStore {
  readonly kind = "file";

  constructor(private readonly dataDir: string) {}

  async read(name: DocumentName): Promise<unknown | undefined> {
    let raw: string;
    try {
      raw = await readFile(path.join(this.dataDir, name), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new StoreCorruptionError(name, error instanceof Error ? error.message : "invalid JSON");
    }
  }

  async write(name: DocumentName, value: unknown): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const target = path.join(this.dataDir, name);
    const staging = `${target}.tmp`;
    await writeFile(staging, `${JSON.stringify(value, null, 2)}\n`, "utf8");
    await rename(staging, target);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
  end?(): Promise<void>;
}

export class PostgresDocumentStore implements DocumentStore {
  readonly kind = "postgres";
  private ready: Promise<void> | null = null;

  constructor(private readonly client: SqlClient) {}

  static fromUrl(databaseUrl: string): PostgresDocumentStore {
    const pool = new Pool({
      connectionString: databaseUrl,
      ssl: process.env.DATABASE_SSL === "disable" ? false : { rejectUnauthorized: false }
    });
    return new PostgresDocumentStore(pool);
  }

  private ensureTable(): Promise<void> {
    if (!this.ready) {
      this.ready = this.client
        .query(`
          CREATE TABLE IF NOT EXISTS pipeline_documents (
            name TEXT PRIMARY KEY,
            payload JSONB NOT NULL,
            updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
          )
        `)
        .then(() => undefined);
    }
    return this.ready;
  }

  async read(name: DocumentName): Promise<unknown | undefined> {
    await this.ensureTable();
    const result = await this.client.query("SELECT payload FROM pipeline_documents WHERE name = $1", [name]);
    return result.rows[0]?.payload;
  }

  async write(name: DocumentName, value: unknown): Promise<void> {
    await this.ensureTable();
    await this.client.query(
      `
        INSERT INTO pipeline_documents (name, payload, updated_at)
        VALUES ($1, $2::jsonb, NOW())
        ON CONFLICT (name)
        DO UPDATE SET payload = EXCLUDED.payload, updated_at = NOW()
      `,
      [name, JSON.stringify(value)]
    );
  }

  async close(): Promise<void> {
    await this.client.end?.();
  }
}

export class MemoryDocumentStore implements DocumentStore {
  readonly kind = "memory";
  readonly documents = new Map<DocumentName, string>();
  writes = 0;

  constructor(initial: Partial<Record<DocumentName, unknown>> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      if (isDocumentName(name)) this.documents.set(name, JSON.stringify(value));
    }
  }

  async read(name: DocumentName): Promise<unknown | undefined> {
    const raw = this.documents.get(name);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async write(name: DocumentName, value: unknown): Promise<void> {
    this.writes += 1;
    this.documents.set(name, JSON.stringify(value));
  }
}

function isDocumentName(value: string): value is DocumentName {
  return Object.values(DOCUMENTS).some((name) => name === value);
}

type CollectionSchema<T> = z.ZodType<T[], z.ZodTypeDef, unknown>;

/**
 * Read-all / write-back access to one JSON array document. Writes are serialized so autosaves from
 * concurrent workers land in order.
 */
export class JsonCollection<T> {
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(
    private readonly documents: DocumentStore,
    readonly name: DocumentName,
    private readonly schema: CollectionSchema<T>,
    private readonly whenMissing: "empty" | "error"
  ) {}

  async load(): Promise<T[]> {
    const raw = await this.documents.read(this.name);
    if (raw === undefined) {
      if (this.whenMissing === "empty") return [];
      throw new StoreCorruptionError(this.name, "document does not exist");
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreCorruptionError(this.name, describeZodError(parsed.error));
    }
    return parsed.data;
  }

  save(items: T[]): Promise<void> {
    const snapshot: unknown = JSON.parse(JSON.stringify(items));
    const next = this.pendingWrite.then(() => this.documents.write(this.name, snapshot));
    this.pendingWrite = next.catch(() => undefined);
    return next;
  }
}

export interface PipelineStores {
  documents: DocumentStore;
  directories: JsonCollection<DirectoryRecord>;
  plan: JsonCollection<SubmissionTarget>;
  queue: JsonCollection<BrowserCheckEntry>;
}

export function createPipelineStores(documents: DocumentStore): PipelineStores {
  return {
    documents,
    directories: new JsonCollection<DirectoryRecord>(documents, DOCUMENTS.directories, directoryCatalogSchema, "error"),
    plan: new JsonCollection<SubmissionTarget>(documents, DOCUMENTS.plan, submissionPlanSchema, "empty"),
    queue: new JsonCollection<BrowserCheckEntry>(documents, DOCUMENTS.queue, browserCheckQueueSchema, "empty")
  };
}

export function createDocumentStore(options: { dataDir: string; databaseUrl?: string }): DocumentStore {
  if (options.databaseUrl) {
    return PostgresDocumentStore.fromUrl(options.databaseUrl);
  }
  return new FileDocumentStore(options.dataDir);
}

/** Looks records up by key so stages can write results back by reference. */
export function indexBy<T>(items: T[], key: (item: T) => string): Map<string, number> {
  const index = new Map<string, number>();
  items.forEach((item, position) => index.set(key(item), position));
  return index;
}
