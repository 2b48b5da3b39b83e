import { join } from 'node:path';
import { readJsonVersioned, writeJsonAtomic } from '../lib/atomicJsonFile.js';
import {
  SNAPSHOT_SCHEMA_VERSION,
  ScanSnapshotSchema,
  SymbolUniverseSchema,
  UNIVERSE_SCHEMA_VERSION,
  type ScanSnapshot,
  type SymbolUniverse,
} from './schemas.js';

/** Persistence of the cached symbol universe, as seen by the symbol directory. */
export interface UniverseCacheStore {
  loadUniverse(): Promise<SymbolUniverse | null>;
  saveUniverse(universe: SymbolUniverse): Promise<void>;
}

/** Publication of scan snapshots, as seen by the coordinator and the HTTP layer. */
export interface SnapshotStore {
  publish(snapshot: ScanSnapshot): Promise<void>;
  latest(): ScanSnapshot | null;
}

export interface ResultStoreOptions {
  dataDir: string;
  snapshotFile?: string;
  universeFile?: string;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Durable store for the latest scan snapshot and the symbol-universe cache.
 *
 * `latest()` returns an in-memory pointer that is swapped only after the new
 * file has been renamed into place, so readers never wait on a scan and never
 * see a partially written snapshot.
 */
export class ResultStore implements UniverseCacheStore, SnapshotStore {
  readonly snapshotPath: string;
  readonly universePath: string;

  private current: ScanSnapshot | null = null;
  private snapshotWrites: Promise<void> = Promise.resolve();
  private universeWrites: Promise<void> = Promise.resolve();

  constructor(options: ResultStoreOptions) {
    this.snapshotPath = join(options.dataDir, options.snapshotFile ?? 'ath_results.json');
    this.universePath = join(options.dataDir, options.universeFile ?? 'all_symbols.json');
  }

  /** Load the last published snapshot from disk into memory (startup). */
  async load(): Promise<ScanSnapshot | null> {
    const result = await readJsonVersioned(this.snapshotPath, SNAPSHOT_SCHEMA_VERSION, ScanSnapshotSchema);
    if (result.status === 'ok') {
      this.current = deepFreeze(result.value);
      console.log(`[store] Loaded snapshot ${result.value.scanId} (${result.value.athCount} ATH stocks)`);
    } else if (result.status === 'invalid') {
      console.warn(`[store] Ignoring unreadable snapshot ${this.snapshotPath}: ${result.reason}`);
      this.current = null;
    }
    return this.current;
  }

  latest(): ScanSnapshot | null {
    return this.current;
  }

  /**
   * Atomically replace the published snapshot. Writes are serialized; a
   * failed write rejects with StorageError and leaves the previous snapshot
   * visible.
   */
  publish(snapshot: ScanSnapshot): Promise<void> {
    const frozen = deepFreeze(ScanSnapshotSchema.parse(snapshot));
    const write = this.snapshotWrites.then(async () => {
      await writeJsonAtomic(this.snapshotPath, SNAPSHOT_SCHEMA_VERSION, frozen);
      this.current = frozen;
      console.log(`[store] Results saved → ${this.snapshotPath}`);
    });
    // The caller observes failures through `write`; the queue itself keeps going.
    this.snapshotWrites = write.catch(() => undefined);
    return write;
  }

  async loadUniverse(): Promise<SymbolUniverse | null> {
    const result = await readJsonVersioned(this.universePath, UNIVERSE_SCHEMA_VERSION, SymbolUniverseSchema);
    if (result.status === 'ok') return deepFreeze(result.value);
    if (result.status === 'invalid') {
      console.warn(`[store] Ignoring unreadable symbol cache ${this.universePath}: ${result.reason}`);
    }
    return null;
  }

  saveUniverse(universe: SymbolUniverse): Promise<void> {
    const write = this.universeWrites.then(() =>
      writeJsonAtomic(this.universePath, UNIVERSE_SCHEMA_VERSION, universe),
    );
    this.universeWrites = write.catch(() => undefined);
    return write;
  }
}
