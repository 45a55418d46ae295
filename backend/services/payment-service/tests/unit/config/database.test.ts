import { MIGRATIONS_TABLE, createKnex, migrationSource } from '../../../src/config/database';
import { buildAppConfig, validateConfig } from '../../../src/config';

describe('migrationSource', () => {
  test('lists the bundled migrations in order', async () => {
    await expect(migrationSource.getMigrations([])).resolves.toEqual(['001_baseline_orchestration']);
    expect(migrationSource.getMigrationName('001_baseline_orchestration')).toBe('001_baseline_orchestration');
  });

  test('loads a migration module with up and down', async () => {
    const migration = await migrationSource.getMigration('001_baseline_orchestration');

    expect(typeof migration.up).toBe('function');
    expect(typeof migration.down).toBe('function');
  });

  test('rejects an unknown migration name', async () => {
    await expect(migrationSource.getMigration('999_missing')).rejects.toThrow('Unknown migration: 999_missing');
  });
});

describe('createKnex', () => {
  test('builds a pg client from the database config without connecting', async () => {
    const db = createKnex(buildAppConfig(validateConfig({ DB_NAME: 'payments_test' })).database);

    expect(db.client.config.client).toBe('pg');
    expect(db.client.config.migrations.tableName).toBe(MIGRATIONS_TABLE);

    await db.destroy();
  });
});
