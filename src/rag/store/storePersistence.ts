import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { SOURCE_KINDS } from "../types.js";
import type { StoreTag } from "../types.js";
import { VectorStore, type IndexEntry } from "./vectorStore.js";

export const INDEX_FILE = "index.json";
export const DOCSTORE_FILE = "docstore.json";

const indexSchema = z.object({
  version: z.literal(1),
  backend: z.string().min(1),
  dimension: z.number().int().positive(),
  generation: z.number().int().nonnegative(),
  ids: z.array(z.string()),
  vectors: z.array(z.array(z.number()))
});

const docstoreSchema = z.object({
  version: z.literal(1),
  generation: z.number().int().nonnegative(),
  documents: z.record(
    z.string(),
    z.object({
      text: z.string(),
      metadata: z.object({
        title: z.string(),
        sourceKind: z.enum(SOURCE_KINDS),
        documentId: z.string(),
        chunkIndex: z.number().int().nonnegative()
      })
    })
  )
});

type IndexFile = z.infer<typeof indexSchema>;
type DocstoreFile = z.infer<typeof docstoreSchema>;

export interface StorePersistence {
  /** `undefined` when nothing was persisted yet; throws on unreadable data. */
  load(): Promise<VectorStore | undefined>;
  save(store: VectorStore): Promise<void>;
}

/**
 * Durable layout: `<dir>/index.json` (tag, ids, vectors) and
 * `<dir>/docstore.json` (id → text + metadata). Both carry the store
 * generation; a pair with different generations is rejected on load.
 */
export class DirectoryStorePersistence implements StorePersistence {
  constructor(readonly dir: string) {}

  async load(): Promise<VectorStore | undefined> {
    const rawIndex = await readOptional(join(this.dir, INDEX_FILE));
    if (rawIndex === undefined) return undefined;
    const rawDocstore = await readFile(join(this.dir, DOCSTORE_FILE), "utf8");
    return fromFiles(indexSchema.parse(JSON.parse(rawIndex)), docstoreSchema.parse(JSON.parse(rawDocstore)));
  }

  async save(store: VectorStore): Promise<void> {
    const { index, docstore } = toFiles(store);
    await mkdir(this.dir, { recursive: true });
    const indexPath = join(this.dir, INDEX_FILE);
    const docstorePath = join(this.dir, DOCSTORE_FILE);
    await writeFile(indexPath + ".tmp", JSON.stringify(index), "utf8");
    await writeFile(docstorePath + ".tmp", JSON.stringify(docstore), "utf8");
    await rename(docstorePath + ".tmp", docstorePath);
    await rename(indexPath + ".tmp", indexPath);
  }
}

export class MemoryStorePersistence implements StorePersistence {
  private files?: { index: string; docstore: string };
  saves = 0;

  async load(): Promise<VectorStore | undefined> {
    if (!this.files) return undefined;
    return fromFiles(indexSchema.parse(JSON.parse(this.files.index)), docstoreSchema.parse(JSON.parse(this.files.docstore)));
  }

  async save(store: VectorStore): Promise<void> {
    const { index, docstore } = toFiles(store);
    this.files = { index: JSON.stringify(index), docstore: JSON.stringify(docstore) };
    this.saves++;
  }
}

function toFiles(store: VectorStore): { index: IndexFile; docstore: DocstoreFile } {
  const entries = store.snapshot();
  const documents: DocstoreFile["documents"] = {};
  for (const e of entries) {
    documents[e.id] = { text: e.chunk.text, metadata: { ...e.chunk.metadata } };
  }
  return {
    index: {
      version: 1,
      backend: store.tag.backend,
      dimension: store.tag.dimension,
      generation: store.generation,
      ids: entries.map((e) => e.id),
      vectors: entries.map((e) => [...e.vector])
    },
    docstore: { version: 1, generation: store.generation, documents }
  };
}

function fromFiles(index: IndexFile, docstore: DocstoreFile): VectorStore {
  if (index.generation !== docstore.generation) {
    throw new Error(`Index generation ${index.generation} does not match docstore generation ${docstore.generation}`);
  }
  if (index.ids.length !== index.vectors.length) {
    throw new Error(`Index has ${index.ids.length} ids but ${index.vectors.length} vectors`);
  }
  if (index.ids.length !== Object.keys(docstore.documents).length) {
    throw new Error("Index and docstore hold a different number of entries");
  }
  const entries: IndexEntry[] = index.ids.map((id, i) => {
    const doc = docstore.documents[id];
    if (!doc) throw new Error(`Docstore has no entry for index id ${id}`);
    return { id, vector: index.vectors[i], chunk: { text: doc.text, metadata: doc.metadata } };
  });
  const tag: StoreTag = { backend: index.backend, dimension: index.dimension };
  return new VectorStore(tag, entries, index.generation);
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (e) {
    if (isNotFound(e)) return undefined;
    throw e;
  }
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
