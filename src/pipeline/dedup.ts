import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

const csvRowsSchema = z.array(z.array(z.string()));

async function readIfExists(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return '';
    throw err;
  }
}

/**
 * Primary keys already persisted in one dataset.
 *
 * Loaded once per phase, after enumeration and before detail pages are
 * fetched, so work finished by an earlier (possibly interrupted) run is never
 * fetched again.
 */
export class DedupStore {
  private constructor(
    readonly keyColumn: string,
    private readonly keys: Set<string>,
  ) {}

  static empty(keyColumn: string): DedupStore {
    return new DedupStore(keyColumn, new Set());
  }

  /** A missing or zero-length file is an empty store. */
  static async load(filePath: string, keyColumn: string): Promise<DedupStore> {
    const content = await readIfExists(filePath);
    if (!content.trim()) return DedupStore.empty(keyColumn);

    const rows = csvRowsSchema.parse(
      parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true }),
    );
    const [header = [], ...data] = rows;
    const index = header.indexOf(keyColumn);
    if (index < 0) {
      throw new Error(`${filePath} has no "${keyColumn}" column`);
    }

    const keys = new Set<string>();
    for (const row of data) {
      const key = row[index];
      if (key) keys.add(key);
    }
    return new DedupStore(keyColumn, keys);
  }

  has(id: string): boolean {
    return this.keys.has(id);
  }

  add(id: string): void {
    this.keys.add(id);
  }

  get size(): number {
    return this.keys.size;
  }

  ids(): string[] {
    return [...this.keys];
  }
}
