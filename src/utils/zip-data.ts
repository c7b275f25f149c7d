/**
 * ZIP Reference Data Loader
 *
 * Reads one file per tier from a data directory: <dir>/<tier_id>.csv, one
 * ZIP per row in the first column. Header rows and other junk values are
 * passed through; the index build skips them as malformed.
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { Logger } from 'pino';
import { DataUnavailableError, errorMessage } from './errors';
import { ZipSource } from './zip-index';
import { TierId } from '../types/tiers';
import { ZipRecord } from '../types/zips';

/**
 * First CSV column of every non-empty row
 *
 * @throws CsvError when the content is not valid CSV (e.g. an unclosed quote)
 */
export function parseZipFile(content: string, tier: TierId): ZipRecord[] {
  const rows: string[][] = parse(content, {
    bom: true,
    trim: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });

  const records: ZipRecord[] = [];
  for (const [first] of rows) {
    if (first) {
      records.push({ zip: first, tier });
    }
  }
  return records;
}

/**
 * @throws DataUnavailableError when the directory cannot be listed
 */
export async function readZipDirectory(
  dir: string,
  tiers: readonly TierId[],
  log: Logger
): Promise<ZipRecord[]> {
  let files: string[];
  try {
    files = await readdir(dir);
  } catch (error) {
    throw new DataUnavailableError(`ZIP data directory ${dir} is unreadable: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const records: ZipRecord[] = [];

  for (const tier of tiers) {
    const file = `${tier}.csv`;
    if (!files.includes(file)) {
      log.warn({ tier, dir }, 'No ZIP file for tier');
      continue;
    }

    let content: string;
    try {
      content = await readFile(path.join(dir, file), 'utf8');
    } catch (error) {
      throw new DataUnavailableError(`Cannot read ${file}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      records.push(...parseZipFile(content, tier));
    } catch (error) {
      throw new DataUnavailableError(`Cannot parse ${file}: ${errorMessage(error)}`, { cause: error });
    }
  }

  return records;
}

/**
 * ZipSource bound to a directory, for ZipIndexStore.reload()
 */
export function directorySource(dir: string, tiers: readonly TierId[], log: Logger): ZipSource {
  return () => readZipDirectory(dir, tiers, log);
}
