import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

// Each service passes its own connection string; there is no shared singleton pool.
export const createDb = (connectionString: string): { db: Database; pool: Pool } => {
    const pool = new Pool({ connectionString });
    return { db: drizzle(pool, { schema }), pool };
};

export {
    webserviceConfigs,
    webserviceConfigHistory,
} from './schema';
export type { WebserviceConfigRow, WebserviceConfigHistoryRow } from './schema';
export { eq, and, ne, desc, asc } from 'drizzle-orm';
