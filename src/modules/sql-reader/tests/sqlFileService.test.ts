import { describe, it, expect } from 'vitest';
import path from 'path';
import { SqlFileService, isSqlFileName } from '../services/sqlFileService';
import { SQL_DIR } from '../../../tests/testDb';

describe('SqlFileService', () => {
  const service = new SqlFileService(SQL_DIR);

  it('lists the .sql files in the directory sorted by name', async () => {
    expect(await service.listSqlFiles()).toEqual([
      'get_all_products.sql',
      'high_value_products.sql',
      'sales_summary.sql',
    ]);
  });

  it('reads a file by name', async () => {
    const file = await service.readSqlFile('get_all_products.sql');

    expect(file?.name).toBe('get_all_products.sql');
    expect(file?.content.startsWith('-- get_all_products.sql\n')).toBe(true);
    expect(file?.content).toContain('ORDER BY name;');
  });

  it('returns null for a file that does not exist', async () => {
    expect(await service.readSqlFile('missing.sql')).toBeNull();
  });

  it('returns null for names that leave the directory', async () => {
    expect(await service.readSqlFile('../sql/sales_summary.sql')).toBeNull();
    expect(await service.readSqlFile(path.join(SQL_DIR, 'sales_summary.sql'))).toBeNull();
  });

  it('returns an empty list for a directory without .sql files', async () => {
    expect(await new SqlFileService(__dirname).listSqlFiles()).toEqual([]);
  });
});

describe('isSqlFileName', () => {
  it.each<[string, boolean]>([
    ['sales_summary.sql', true],
    ['report-2025.v2.sql', true],
    ['notes.txt', false],
    ['.sql', false],
    ['nested/file.sql', false],
    ['..', false],
  ])('%s -> %s', (name, expected) => {
    expect(isSqlFileName(name)).toBe(expected);
  });
});
