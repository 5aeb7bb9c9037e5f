import type { Chunk, EmbeddingProvider, Retriever, ScoredChunk } from "../types.js";
import { EmbeddingMismatchError } from "../errors.js";
import { WriteLock } from "../../locks/writeLock.js";
import { silentLogger, type Logger } from "../../logging/logger.js";
import type { StorePersistence } from "./storePersistence.js";
import { VectorStore } from "./vectorStore.js";
import { maximalMarginalRelevance } from "./vectorMath.js";

export type VectorStoreManagerOptions = {
  /** Omit for a purely in-memory store. */
  persistence?: StorePersistence;
  logger?: Logger;
  /** Relevance weight of diversity-aware search; 1 is plain similarity. */
  mmrLambda?: number;
};

export type VectorStoreStats = {
  entries: number;
  backend: string;
  dimension: number;
  persistFailures: number;
  /** The last persist failed and durable storage is behind memory. */
  dirty: boolean;
};

export const MIN_FETCH_K = 10;

/**
 * Owns the one vector store of a process: loads it lazily, appends to it
 * under a single-writer lock and persists after every append. Durable
 * storage is best effort; the in-memory store stays authoritative.
 */
export class VectorStoreManager implements Retriever {
  private store?: VectorStore;
  private initializing?: Promise<VectorStore>;
  private readonly lock = new WriteLock();
  private readonly logger: Logger;
  private persistFailures = 0;
  private dirty = false;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly opts: VectorStoreManagerOptions = {}
  ) {
    this.logger = (opts.logger ?? silentLogger()).child({ component: "vector-store" });
  }

  get embeddingProvider(): EmbeddingProvider {
    return this.embeddings;
  }

  /**
   * The store, loaded from durable storage on first use. A failed load starts
   * fresh. `seed` only applies when a new store gets created.
   */
  getOrCreate(seed?: readonly Chunk[]): Promise<VectorStore> {
    if (this.store) return Promise.resolve(this.store);
    if (!this.initializing) {
      this.initializing = this.initialize(seed).catch((e: unknown) => {
        this.initializing = undefined;
        throw e;
      });
    }
    return this.initializing;
  }

  async add(chunks: readonly Chunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const store = await this.getOrCreate();
    this.assertCompatible(store);
    const vectors = await this.embeddings.embedMany(chunks.map((c) => c.text));
    await this.lock.run(async () => {
      store.append(chunks, vectors);
      await this.persist(store);
    });
    this.logger.debug("store.add", { added: chunks.length, entries: store.size });
  }

  async similaritySearch(query: string, k: number): Promise<ScoredChunk[]> {
    const store = await this.getOrCreate();
    this.assertCompatible(store);
    const entries = store.snapshot();
    if (entries.length === 0 || k <= 0) return [];
    const queryVector = await this.embeddings.embed(query);
    return store.nearest(queryVector, k, entries).map((n) => ({ chunk: n.entry.chunk, distance: n.distance }));
  }

  /**
   * Over-fetches at least `max(10, 5k)` neighbours and keeps the `k` that
   * balance relevance against redundancy among themselves.
   */
  async diverseSearch(query: string, k: number, fetchK?: number): Promise<Chunk[]> {
    const store = await this.getOrCreate();
    this.assertCompatible(store);
    const entries = store.snapshot();
    if (entries.length === 0 || k <= 0) return [];
    const queryVector = await this.embeddings.embed(query);
    const candidates = store.nearest(queryVector, Math.max(fetchK ?? 0, MIN_FETCH_K, 5 * k), entries);
    const picked = maximalMarginalRelevance(
      queryVector,
      candidates.map((c) => c.entry.vector),
      k,
      this.opts.mmrLambda ?? 0.5
    );
    return picked.map((i) => candidates[i].entry.chunk);
  }

  retrieve(query: string, k: number): Promise<Chunk[]> {
    return this.diverseSearch(query, k);
  }

  /** Retries persistence if the last attempt failed. */
  async flush(): Promise<boolean> {
    const store = this.store;
    if (!store || !this.dirty) return true;
    return this.lock.run(() => this.persist(store));
  }

  stats(): VectorStoreStats {
    return {
      entries: this.store?.size ?? 0,
      backend: this.store?.tag.backend ?? this.embeddings.id,
      dimension: this.store?.tag.dimension ?? this.embeddings.dimension,
      persistFailures: this.persistFailures,
      dirty: this.dirty
    };
  }

  private async initialize(seed?: readonly Chunk[]): Promise<VectorStore> {
    const loaded = await this.tryLoad();
    if (loaded) {
      this.store = loaded;
      this.logger.info("store.loaded", { entries: loaded.size, backend: loaded.tag.backend });
      if (loaded.tag.backend !== this.embeddings.id || loaded.tag.dimension !== this.embeddings.dimension) {
        this.logger.error("store.backend.mismatch", {
          storeBackend: loaded.tag.backend,
          storeDimension: loaded.tag.dimension,
          activeBackend: this.embeddings.id,
          activeDimension: this.embeddings.dimension
        });
      }
      return loaded;
    }

    // Empty index from the provider's dimension; never embed an empty text list.
    const store = new VectorStore({ backend: this.embeddings.id, dimension: this.embeddings.dimension });
    if (seed?.length) {
      const vectors = await this.embeddings.embedMany(seed.map((c) => c.text));
      await this.lock.run(async () => {
        store.append(seed, vectors);
        await this.persist(store);
      });
    }
    this.store = store;
    this.logger.info("store.created", { entries: store.size, backend: store.tag.backend });
    return store;
  }

  private async tryLoad(): Promise<VectorStore | undefined> {
    if (!this.opts.persistence) return undefined;
    try {
      return await this.opts.persistence.load();
    } catch (e) {
      this.logger.warn("store.load.failed", { error: e });
      return undefined;
    }
  }

  private async persist(store: VectorStore): Promise<boolean> {
    if (!this.opts.persistence) return true;
    try {
      await this.opts.persistence.save(store);
      this.dirty = false;
      return true;
    } catch (e) {
      this.persistFailures++;
      this.dirty = true;
      this.logger.error("store.persist.failed", { error: e, failures: this.persistFailures });
      return false;
    }
  }

  private assertCompatible(store: VectorStore) {
    if (store.tag.backend !== this.embeddings.id || store.tag.dimension !== this.embeddings.dimension) {
      throw new EmbeddingMismatchError(store.tag, { backend: this.embeddings.id, dimension: this.embeddings.dimension });
    }
  }
}
