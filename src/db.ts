import { Pool, type PoolClient, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';

export function poolConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    host: env.POSTGRES_HOST || 'localhost',
    port: parseInt(env.POSTGRES_PORT || '5432', 10),
    user: env.POSTGRES_USER || 'etl',
    password: env.POSTGRES_PASSWORD || 'etlpass',
    database: env.POSTGRES_DB || 'etldb',
    max: parseInt(env.POSTGRES_POOL_MAX || '5', 10),
    application_name: 'sales-star-etl',
  };
}

let pool: Pool | null = null;

// Created on first use so the CLI and tests never open one.
function getPool(): Pool {
  pool ??= new Pool(poolConfig());
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  client?: PoolClient
): Promise<QueryResult<T>> {
  if (client) {
    return client.query<T>(text, params);
  }
  return getPool().query<T>(text, params);
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
  }
}
