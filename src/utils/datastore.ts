/**
 * JSON Document Store
 *
 * Holds the three collections of the backing document in memory and rewrites
 * the whole document on every mutation.
 *
 * - Reads return versioned snapshot copies and never wait on writers.
 * - `compareAndSwap` replaces one collection if its version is unchanged. The
 *   candidate document is written to disk (temp file + rename) before it is
 *   committed in memory, so a failed write leaves the store unchanged.
 * - `update` serializes writers of a collection and retries the swap.
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import logger from './logger';
import { KeyedLock } from './locks';
import { StoreError } from './errors';
import type { CollectionItems, CollectionName, DataDocument } from '../types/models';

const DOCUMENT_LOCK = 'document';

const text = z.string().nullish().transform((value) => value ?? '');
const textList = z.array(z.string()).nullish().transform((value) => value ?? []);

const documentSchema = z.object({
  persons: z.array(z.object({
    firstName: text,
    lastName: text,
    address: text,
    city: text,
    zip: text,
    phone: text,
    email: text,
  })).nullish().transform((value) => value ?? []),
  firestations: z.array(z.object({
    address: text,
    station: z.union([z.string(), z.number()]).nullish().transform((value) => (value == null ? '' : String(value))),
  })).nullish().transform((value) => value ?? []),
  medicalrecords: z.array(z.object({
    firstName: text,
    lastName: text,
    birthdate: text,
    medications: textList,
    allergies: textList,
  })).nullish().transform((value) => value ?? []),
});

export interface CollectionSnapshot<K extends CollectionName> {
  version: number;
  items: CollectionItems[K][];
}

export interface DataStore {
  snapshot<K extends CollectionName>(name: K): CollectionSnapshot<K>;
  compareAndSwap<K extends CollectionName>(name: K, expectedVersion: number, next: CollectionItems[K][]): Promise<boolean>;
  /**
   * Apply `transform` to the current collection. Returning `null` means
   * "no change" and nothing is written. Resolves to whether a write happened.
   */
  update<K extends CollectionName>(
    name: K,
    transform: (current: CollectionItems[K][]) => CollectionItems[K][] | null
  ): Promise<boolean>;
  close(): Promise<void>;
}

export interface DataStoreOptions {
  /** Document read at startup and rewritten on every mutation. */
  dataFile: string;
  /** Initial document used when `dataFile` is missing, empty or unreadable. */
  seedFile: string;
}

export const parseDocument = (raw: string): DataDocument => {
  return documentSchema.parse(JSON.parse(raw));
};

const fileHasContent = async (filePath: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw new StoreError(`Cannot access data file ${filePath}`, { cause: error });
  }
};

/**
 * Write-then-rename so readers never observe a partial document.
 */
export const writeDocumentAtomically = async (filePath: string, document: DataDocument): Promise<void> => {
  const dir = path.dirname(filePath);
  const tmp = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmp, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw new StoreError(`Failed to write data file ${filePath}`, { cause: error });
  }
};

const countsOf = (document: DataDocument) => ({
  persons: document.persons.length,
  firestations: document.firestations.length,
  medicalrecords: document.medicalrecords.length,
});

export class JsonDataStore implements DataStore {
  private readonly locks = new KeyedLock();
  private readonly versions: Record<CollectionName, number> = {
    persons: 0,
    firestations: 0,
    medicalrecords: 0,
  };

  private constructor(
    private readonly dataFile: string,
    private document: DataDocument
  ) {}

  /**
   * Load the document from `dataFile`, falling back to `seedFile` (and writing
   * it to `dataFile`) when there is nothing usable yet.
   */
  static async open(options: DataStoreOptions): Promise<JsonDataStore> {
    const { dataFile, seedFile } = options;

    if (await fileHasContent(dataFile)) {
      try {
        const document = parseDocument(await fs.readFile(dataFile, 'utf-8'));
        logger.info('Data loaded from storage file', { dataFile, ...countsOf(document) });
        return new JsonDataStore(dataFile, document);
      } catch (error) {
        logger.warn('Storage file is unreadable, falling back to seed data', {
          dataFile,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    } else {
      logger.info('Storage file missing or empty, loading seed data', { dataFile, seedFile });
    }

    let document: DataDocument;
    try {
      document = parseDocument(await fs.readFile(seedFile, 'utf-8'));
    } catch (error) {
      logger.error('Seed data could not be loaded', { seedFile, error });
      throw new StoreError(`Cannot load seed data from ${seedFile}`, { cause: error });
    }

    await writeDocumentAtomically(dataFile, document);
    logger.info('Seed data copied to storage file', { dataFile, ...countsOf(document) });
    return new JsonDataStore(dataFile, document);
  }

  snapshot<K extends CollectionName>(name: K): CollectionSnapshot<K> {
    return {
      version: this.versions[name],
      items: structuredClone(this.document[name]),
    };
  }

  async compareAndSwap<K extends CollectionName>(
    name: K,
    expectedVersion: number,
    next: CollectionItems[K][]
  ): Promise<boolean> {
    return this.locks.run(DOCUMENT_LOCK, async () => {
      if (this.versions[name] !== expectedVersion) {
        logger.debug('Stale collection version, swap rejected', {
          collection: name,
          expectedVersion,
          currentVersion: this.versions[name]
        });
        return false;
      }

      const candidate: DataDocument = { ...this.document };
      candidate[name] = structuredClone(next);
      await writeDocumentAtomically(this.dataFile, candidate);

      this.document = candidate;
      this.versions[name] += 1;
      logger.debug('Collection written', { collection: name, size: next.length, version: this.versions[name] });
      return true;
    });
  }

  async update<K extends CollectionName>(
    name: K,
    transform: (current: CollectionItems[K][]) => CollectionItems[K][] | null
  ): Promise<boolean> {
    return this.locks.run(name, async () => {
      for (;;) {
        const { version, items } = this.snapshot(name);
        const next = transform(items);
        if (next === null) {
          return false;
        }
        if (await this.compareAndSwap(name, version, next)) {
          return true;
        }
      }
    });
  }

  /** Resolves once pending writes are on disk. */
  async close(): Promise<void> {
    await this.locks.run(DOCUMENT_LOCK, async () => undefined);
    logger.info('Data store closed', { dataFile: this.dataFile });
  }
}
