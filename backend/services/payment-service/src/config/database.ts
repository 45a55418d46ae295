import { Pool, QueryResult, QueryResultRow } from 'pg';
import knex, { Knex } from 'knex';
import { getAppConfig, DatabaseConfig } from './index';
import { logger } from '../utils/logger';
import * as baselineOrchestration from '../migrations/001_baseline_orchestration';

const log = logger.child({ component: 'Database' });

const SLOW_QUERY_MS = 1000;

let pool: Pool | null = null;

/**
 * Shared pg pool, created on first use from the validated config
 */
export function getPool(dbConfig: DatabaseConfig = getAppConfig().database): Pool {
  if (!pool) {
    pool = new Pool({
      host: dbConfig.host,
      port: dbConfig.port,
      database: dbConfig.database,
      user: dbConfig.user,
      password: dbConfig.password,
      ssl: dbConfig.ssl,
      min: dbConfig.pool.min,
      max: dbConfig.pool.max,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      log.error({ error: err }, 'Unexpected error on idle database client');
    });
  }
  return pool;
}

export async function query<R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  client: Pool = getPool()
): Promise<QueryResult<R>> {
  const start = Date.now();
  const res = await client.query<R>(text, params);
  const duration = Date.now() - start;
  if (duration > SLOW_QUERY_MS) {
    log.warn({ text, duration, rows: res.rowCount }, 'Slow query detected');
  }
  return res;
}

export function createKnex(dbConfig: DatabaseConfig): Knex {
  return knex({
    client: 'pg',
    connection: {
      host: dbConfig.host,
      port: dbConfig.port,
      database: dbConfig.database,
      user: dbConfig.user,
      password: dbConfig.password,
      ssl: dbConfig.ssl,
    },
    pool: {
      min: dbConfig.pool.min,
      max: dbConfig.pool.max,
    },
    migrations: {
      tableName: MIGRATIONS_TABLE,
      migrationSource,
    },
  });
}

export const MIGRATIONS_TABLE = 'knex_migrations_payment_orchestration';

const MIGRATIONS: Readonly<Record<string, Knex.Migration>> = {
  '001_baseline_orchestration': baselineOrchestration,
};

/**
 * Migrations are bundled with the code, so they run from dist/ without ts loaders
 */
export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(MIGRATIONS).sort();
  },
  getMigrationName(name) {
    return name;
  },
  async getMigration(name) {
    const migration = MIGRATIONS[name];
    if (!migration) {
      throw new Error(`Unknown migration: ${name}`);
    }
    return migration;
  },
};

export async function migrateLatest(db: Knex): Promise<void> {
  const [batch, applied]: [number, string[]] = await db.migrate.latest();
  log.info({ batch, applied }, applied.length > 0 ? 'Migrations applied' : 'Database schema up to date');
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    log.info('Database pool closed');
  }
}
