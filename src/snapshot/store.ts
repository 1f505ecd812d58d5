import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { priceSchema } from '../catalog/schema.js';
import { StoreError } from '../errors.js';
import { providerOf, type Catalog, type Item } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface SnapshotStore {
  /** Last saved catalog, or an empty one on the first run. */
  load(): Promise<Catalog>;
  /** Replaces the saved catalog. */
  save(catalog: Catalog): Promise<void>;
}

const itemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  provider: z.string(),
  inputPrice: z.number(),
  outputPrice: z.number(),
  contextLength: z.number().int().nonnegative(),
});

// Written by earlier releases: snake_case fields, prices as decimal strings.
const legacyItemSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  price_per_1k_input: priceSchema,
  price_per_1k_output: priceSchema,
  context_length: z.number().int().nonnegative().nullish(),
});

const snapshotFileSchema = z.union([
  z.array(itemSchema),
  z.array(legacyItemSchema).transform((rows) =>
    rows.map((row): Item => ({
      id: row.id,
      name: row.name || row.id,
      provider: providerOf(row.id),
      inputPrice: row.price_per_1k_input,
      outputPrice: row.price_per_1k_output,
      contextLength: row.context_length ?? 0,
    })),
  ),
]);

function toCatalog(items: Item[]): Catalog {
  return new Map(items.map((item) => [item.id, item]));
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Parses snapshot file contents. Blank contents mean no prior state. */
export function parseSnapshot(contents: string): Catalog {
  if (contents.trim() === '') return new Map();

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (err) {
    throw new StoreError('Snapshot is not valid JSON', { cause: err, recoverable: true });
  }

  const parsed = snapshotFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new StoreError('Snapshot does not match the expected format', {
      cause: parsed.error,
      recoverable: true,
    });
  }
  return toCatalog(parsed.data);
}

/** Items only, in catalog order, so an unchanged catalog serializes byte for byte the same. */
export function serializeSnapshot(catalog: Catalog): string {
  return `${JSON.stringify([...catalog.values()], null, 2)}\n`;
}

/** JSON file store; saves go through a temp file and a rename. */
export class FileSnapshotStore implements SnapshotStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<Catalog> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        logger.info({ file: this.filePath }, 'No previous snapshot found');
        return new Map();
      }
      throw new StoreError(`Could not read snapshot ${this.filePath}`, { cause: err });
    }

    try {
      return parseSnapshot(contents);
    } catch (err) {
      if (err instanceof StoreError && err.recoverable) {
        logger.warn({ file: this.filePath, err }, 'Ignoring unreadable snapshot, starting from empty state');
        return new Map();
      }
      throw err;
    }
  }

  async save(catalog: Catalog): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, serializeSnapshot(catalog), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        logger.warn({ file: tmpPath, err: rmErr }, 'Could not remove temporary snapshot');
      });
      throw new StoreError(`Could not write snapshot ${this.filePath}`, { cause: err });
    }
    logger.debug({ file: this.filePath, count: catalog.size }, 'Snapshot saved');
  }
}
