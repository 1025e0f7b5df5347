import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { SchemaError, isNotFound } from "../errors.js";
import { CHUNK_CATEGORIES } from "../knowledge/schema.js";
import { moduleLogger } from "../logger.js";
import { MemoryVectorStore, type IndexEntry } from "./vector-store.js";

const log = moduleLogger("file-store");

const StoreFileSchema = z.object({
  collection: z.string(),
  dimension: z.number().int().nonnegative(),
  entries: z.array(
    z.object({
      chunk: z.object({
        id: z.string(),
        category: z.enum(CHUNK_CATEGORIES),
        content: z.string(),
        metadata: z.record(z.string()),
      }),
      vector: z.array(z.number()),
    }),
  ),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

/**
 * On-disk vector store: one JSON file per collection under the storage path.
 *
 * Writes go to a temp file that is renamed over the old one, then the
 * in-memory array is swapped. A process that opens the same path later
 * sees the persisted vectors and can skip re-embedding.
 */
export class FileVectorStore extends MemoryVectorStore {
  readonly file: string;

  private constructor(
    readonly directory: string,
    collection: string,
  ) {
    super(collection);
    this.file = join(directory, `${collection}.json`);
  }

  /** Open (or prepare to create) the collection under `directory`. */
  static async open(
    directory: string,
    collection: string,
  ): Promise<FileVectorStore> {
    const store = new FileVectorStore(directory, collection);
    await store.load();
    return store;
  }

  override async replaceAll(entries: IndexEntry[]): Promise<void> {
    const payload: StoreFile = {
      collection: this.name,
      dimension: entries[0]?.vector.length ?? 0,
      entries,
    };
    await mkdir(this.directory, { recursive: true });
    const tmp = `${this.file}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(payload), "utf-8");
    await rename(tmp, this.file);
    await super.replaceAll(entries);
    log.info(
      { file: this.file, count: entries.length },
      "💾 Vector store persisted",
    );
  }

  private async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.file, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new SchemaError(`Vector store file ${this.file} is not valid JSON`, {
        cause: err,
      });
    }
    const parsed = StoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SchemaError(`Vector store file ${this.file} is malformed`, {
        cause: parsed.error,
      });
    }

    await super.replaceAll(parsed.data.entries);
    log.info(
      { file: this.file, count: parsed.data.entries.length },
      "📦 Vector store loaded from disk",
    );
  }
}
