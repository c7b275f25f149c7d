import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { directorySource, parseZipFile, readZipDirectory } from './zip-data';
import { DataUnavailableError } from './errors';
import { ZipIndexStore } from './zip-index';
import { silentLogger } from '../test/fixtures';
import { TIER_IDS } from '../types/tiers';

describe('parseZipFile', () => {
  it('takes the first column of every non-empty row', () => {
    expect(parseZipFile('zip,city\r\n10001,New York\r\n\r\n"02134","Boston, MA"\r\n', 'tier_1')).toEqual([
      { zip: 'zip', tier: 'tier_1' },
      { zip: '10001', tier: 'tier_1' },
      { zip: '02134', tier: 'tier_1' },
    ]);
  });

  it('handles a byte order mark, padding and short rows', () => {
    expect(parseZipFile('\ufeffzip,city\n 30301 \n30302,Atlanta,GA\n', 'tier_2')).toEqual([
      { zip: 'zip', tier: 'tier_2' },
      { zip: '30301', tier: 'tier_2' },
      { zip: '30302', tier: 'tier_2' },
    ]);
  });

  it('drops rows with an empty first column', () => {
    expect(parseZipFile('zip\n,orphan\n60601\n', 'tier_3')).toEqual([
      { zip: 'zip', tier: 'tier_3' },
      { zip: '60601', tier: 'tier_3' },
    ]);
  });
});

describe('readZipDirectory', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'zips-'));
  });

  it('reads one file per tier', async () => {
    writeFileSync(path.join(dir, 'tier_1.csv'), 'zip\n10001\n');
    writeFileSync(path.join(dir, 'tier_2.csv'), 'zip\n30301\n');

    const records = await readZipDirectory(dir, TIER_IDS, silentLogger);

    expect(records).toEqual([
      { zip: 'zip', tier: 'tier_1' },
      { zip: '10001', tier: 'tier_1' },
      { zip: 'zip', tier: 'tier_2' },
      { zip: '30301', tier: 'tier_2' },
    ]);
  });

  it('fails with DataUnavailableError when the directory is missing', async () => {
    await expect(
      readZipDirectory(path.join(dir, 'missing'), TIER_IDS, silentLogger)
    ).rejects.toBeInstanceOf(DataUnavailableError);
  });

  it('fails with DataUnavailableError when a file is not valid CSV', async () => {
    writeFileSync(path.join(dir, 'tier_1.csv'), 'zip\n"10001\n');

    await expect(readZipDirectory(dir, TIER_IDS, silentLogger)).rejects.toThrow(
      /^Cannot parse tier_1\.csv: /
    );
  });

  it('feeds a store through directorySource', async () => {
    writeFileSync(path.join(dir, 'tier_1.csv'), 'zip\n10001\n10002\n');
    writeFileSync(path.join(dir, 'tier_2.csv'), 'zip\n10002\n');
    const store = new ZipIndexStore(TIER_IDS, silentLogger);

    const result = await store.reload(directorySource(dir, TIER_IDS, silentLogger), () => 1000);

    expect(result).toEqual({ ok: true, loaded: 2, skipped: 2, conflicts: 1, loaded_at: 1000 });
    expect(store.lookup('10002')).toBe('tier_1');
  });
});
