import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle, type NeonDatabase } from 'drizzle-orm/neon-serverless';
import ws from "ws";
import * as schema from "@shared/schema";

// Configure Neon for long-lived CLI and scheduler processes
neonConfig.webSocketConstructor = ws;
neonConfig.useSecureWebSocket = true;
neonConfig.pipelineConnect = false;

const isProduction = process.env.NODE_ENV === 'production';

let pool: Pool | null = null;
let database: NeonDatabase<typeof schema> | null = null;

/**
 * Create the pool on first use so importing storage never requires a
 * DATABASE_URL (the in-memory store covers that case).
 */
export function getPool(): Pool {
  if (pool) return pool;

  if (!process.env.DATABASE_URL) {
    throw new Error(
      "DATABASE_URL must be set. Did you forget to provision a database?",
    );
  }

  pool = new Pool({
    connectionString: process.env.DATABASE_URL,
    max: isProduction ? 5 : 10,
    idleTimeoutMillis: isProduction ? 60000 : 30000,
    connectionTimeoutMillis: isProduction ? 30000 : 15000,
  });

  pool.on('error', (err: Error) => {
    console.error('[Database Pool] Error:', err.message);
  });

  return pool;
}

export function getDb(): NeonDatabase<typeof schema> {
  if (!database) {
    database = drizzle({ client: getPool(), schema });
  }
  return database;
}

export async function testDatabaseConnection(): Promise<boolean> {
  try {
    const client = await getPool().connect();
    await client.query('SELECT 1');
    client.release();
    return true;
  } catch (error) {
    console.error('[Database] Connection test failed:', error instanceof Error ? error.message : error);
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    database = null;
  }
}
