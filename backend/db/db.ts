import fs from 'fs';
import { Pool as PgPool } from 'pg';
import Database from 'better-sqlite3';
import type { SQL } from 'drizzle-orm';
import { drizzle as drizzlePg, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { drizzle as drizzleSqlite, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { StorageConfig } from '../utils/config';
import { StorageError } from '../utils/errors';
import { log } from '../utils/log';

// Pool configuration with timeouts and connection limits
const PG_POOL_CONFIG = {
  max: 5, // Maximum number of clients in the pool
  idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
  connectionTimeoutMillis: 5000, // Return an error after 5 seconds if connection not established
  maxUses: 100, // Close and replace a connection after it has been used 100 times
};

export type StorageBackend =
  | { kind: 'postgres'; db: NodePgDatabase; pool: PgPool }
  | { kind: 'sqlite'; db: BetterSQLite3Database; client: Database.Database };

export type Row = Record<string, unknown>;

/**
 * Dialect-neutral query surface. Chosen once from the backend when the
 * connection is built; storage code never branches on the engine again.
 */
export interface SqlExecutor {
  readonly dialect: StorageBackend['kind'];
  all(query: SQL): Promise<Row[]>;
  /** Returns the number of affected rows. */
  run(query: SQL): Promise<number>;
  applySchema(): Promise<void>;
  close(): Promise<void>;
}

function readSchema(kind: StorageBackend['kind']): string {
  const file = new URL(`./sql/schema.${kind}.sql`, import.meta.url);
  return fs.readFileSync(file, 'utf8');
}

export function createStorageBackend(config: StorageConfig): StorageBackend {
  if (config.kind === 'postgres') {
    const pool = new PgPool({ connectionString: config.databaseUrl, ...PG_POOL_CONFIG });

    pool.on('error', (err) => {
      log(`PostgreSQL Pool error: ${err.message}`, 'db', 'error');
    });

    pool.on('connect', (client) => {
      // Set statement timeout on each client to prevent long queries
      client.query('SET statement_timeout = 30000').catch((err: Error) => {
        log(`Failed to set statement timeout: ${err.message}`, 'db', 'warn');
      });
    });

    log('PostgreSQL connection pool initialized', 'db');
    return { kind: 'postgres', db: drizzlePg(pool), pool };
  }

  const client = new Database(config.path);
  if (config.path !== ':memory:') {
    client.pragma('journal_mode = WAL');
  }
  log(`SQLite database opened at ${config.path}`, 'db');
  return { kind: 'sqlite', db: drizzleSqlite(client), client };
}

async function guard<T>(action: string, fn: () => Promise<T> | T): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`Query execution error during ${action}: ${message}`, 'db', 'error');
    throw new StorageError(`Database ${action} failed: ${message}`, { cause: error });
  }
}

export function createSqlExecutor(backend: StorageBackend): SqlExecutor {
  switch (backend.kind) {
    case 'postgres': {
      const { db, pool } = backend;
      return {
        dialect: 'postgres',
        all: (query) => guard('query', async () => (await db.execute<Row>(query)).rows),
        run: (query) => guard('write', async () => (await db.execute(query)).rowCount ?? 0),
        applySchema: () => guard('schema migration', async () => {
          await pool.query(readSchema('postgres'));
        }),
        close: () => pool.end(),
      };
    }
    case 'sqlite': {
      const { db, client } = backend;
      return {
        dialect: 'sqlite',
        all: (query) => guard('query', () => db.all<Row>(query)),
        run: (query) => guard('write', () => db.run(query).changes),
        applySchema: () => guard('schema migration', () => {
          client.exec(readSchema('sqlite'));
        }),
        close: async () => {
          client.close();
        },
      };
    }
  }
}

export function openDatabase(config: StorageConfig): SqlExecutor {
  return createSqlExecutor(createStorageBackend(config));
}
