import fs from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { datasetPath, type DatasetDefinition } from '../datasets.js';

async function isFresh(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size === 0;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return true;
    throw err;
  }
}

/**
 * Append `records` to the dataset's CSV file under `outputDir`, writing the
 * header first when the file is absent or empty.
 *
 * The writer trusts its caller for uniqueness: records must already be
 * filtered against the dataset's dedup store. Appending the same records
 * twice writes them twice.
 *
 * @returns number of data rows written
 */
export async function appendRecords<R, C extends string>(
  outputDir: string,
  dataset: DatasetDefinition<R, C>,
  records: readonly R[],
): Promise<number> {
  const filePath = datasetPath(outputDir, dataset);
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const fresh = await isFresh(filePath);
  if (!fresh && records.length === 0) return 0;

  const rows = records.map((record) => {
    const row = dataset.toRow(record);
    return dataset.columns.map((column) => row[column]);
  });
  const lines = [...(fresh ? [[...dataset.columns]] : []), ...rows];

  await fs.appendFile(filePath, stringify(lines), 'utf-8');
  return records.length;
}
