import { pgTable, serial, bigserial, varchar, text, timestamp, integer, smallint } from 'drizzle-orm/pg-core';

// GenericInterface webservice definitions. The config column holds the YAML block.
export const webserviceConfigs = pgTable('gi_webservice_config', {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 200 }).notNull().unique(),
    config: text('config').notNull(),
    valid_id: smallint('valid_id').notNull().default(1),
    create_time: timestamp('create_time', { withTimezone: true }).defaultNow().notNull(),
    create_by: integer('create_by').notNull(),
    change_time: timestamp('change_time', { withTimezone: true }).defaultNow().notNull(),
    change_by: integer('change_by').notNull(),
});

// Snapshots of every distinct config revision
export const webserviceConfigHistory = pgTable('gi_webservice_config_history', {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    config_id: integer('config_id').notNull().references(() => webserviceConfigs.id, { onDelete: 'cascade' }),
    config: text('config').notNull(),
    config_md5: varchar('config_md5', { length: 32 }).notNull(),
    create_time: timestamp('create_time', { withTimezone: true }).defaultNow().notNull(),
    create_by: integer('create_by').notNull(),
    change_time: timestamp('change_time', { withTimezone: true }).defaultNow().notNull(),
    change_by: integer('change_by').notNull(),
});

export type WebserviceConfigRow = typeof webserviceConfigs.$inferSelect;
export type WebserviceConfigHistoryRow = typeof webserviceConfigHistory.$inferSelect;
