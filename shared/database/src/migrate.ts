import 'dotenv/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Client } from 'pg';
import { logger } from '@generic-interface/service-template';

export const DEFAULT_MIGRATIONS_DIR = path.join('shared', 'database', 'migrations');

export interface Migration {
    name: string;
    sql: string;
}

type Queryable = Pick<Client, 'query'>;

/** Reads every .sql file in the directory, in file name order. */
export const loadMigrations = async (dir: string): Promise<Migration[]> => {
    const files = (await fs.readdir(dir)).filter((file) => file.endsWith('.sql')).sort();
    const migrations: Migration[] = [];
    for (const file of files) {
        migrations.push({ name: file, sql: await fs.readFile(path.join(dir, file), 'utf8') });
    }
    return migrations;
};

// Statements are idempotent, so every run applies all files inside one transaction.
export const applyMigrations = async (client: Queryable, migrations: Migration[]): Promise<void> => {
    await client.query('BEGIN');
    try {
        for (const migration of migrations) {
            logger.info(`Applying migration: ${migration.name}`);
            await client.query(migration.sql);
        }
        await client.query('COMMIT');
    } catch (err) {
        await client.query('ROLLBACK');
        throw err;
    }
};

const main = async (): Promise<void> => {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
        throw new Error('DATABASE_URL is not set');
    }
    const dir = path.resolve(process.argv[2] ?? DEFAULT_MIGRATIONS_DIR);

    const client = new Client({ connectionString });
    await client.connect();
    try {
        await applyMigrations(client, await loadMigrations(dir));
        logger.info('Migrations applied successfully.');
    } finally {
        await client.end();
    }
};

if (require.main === module) {
    main().catch((err: unknown) => {
        logger.error('Migration failed', { error: err instanceof Error ? err.message : String(err) });
        process.exitCode = 1;
    });
}
