import {
    Database,
    WebserviceConfigHistoryRow,
    WebserviceConfigRow,
    and,
    asc,
    desc,
    eq,
    ne,
    webserviceConfigHistory,
    webserviceConfigs,
} from '@generic-interface/database';
import { componentLogger } from '@generic-interface/service-template';
import { WebserviceError, errorMessage } from '../errors';
import {
    VALID_ID_ACTIVE,
    WebserviceConfig,
    WebserviceConfigData,
    WebserviceConfigHistory,
    WebserviceInput,
    invokerNames,
} from '../types';
import { WebserviceRepository } from './WebserviceRepository';
import { configMD5, decodeConfig, encodeConfig } from './configCodec';

const log = componentLogger('webservice-repository');

const toWebservice = (row: WebserviceConfigRow, config: WebserviceConfigData): WebserviceConfig => ({
    ID: row.id,
    Name: row.name,
    Config: config,
    ValidID: row.valid_id,
    CreateTime: row.create_time,
    CreateBy: row.create_by,
    ChangeTime: row.change_time,
    ChangeBy: row.change_by,
});

const toHistory = (row: WebserviceConfigHistoryRow): WebserviceConfigHistory => ({
    ID: row.id,
    ConfigID: row.config_id,
    Config: row.config,
    ConfigMD5: row.config_md5,
    CreateTime: row.create_time,
    CreateBy: row.create_by,
    ChangeTime: row.change_time,
    ChangeBy: row.change_by,
});

const notFound = (id: number): WebserviceError =>
    new WebserviceError({ code: 'CONFIG_NOT_FOUND', message: `webservice with id ${id} not found` });

/** PostgreSQL storage; the config block is kept as YAML text. */
export class DrizzleWebserviceRepository implements WebserviceRepository {
    constructor(private readonly db: Database) {}

    async getByName(name: string): Promise<WebserviceConfig | undefined> {
        const [row] = await this.db.select().from(webserviceConfigs).where(eq(webserviceConfigs.name, name)).limit(1);
        return row ? toWebservice(row, decodeConfig(row.config)) : undefined;
    }

    async getById(id: number): Promise<WebserviceConfig | undefined> {
        const [row] = await this.db.select().from(webserviceConfigs).where(eq(webserviceConfigs.id, id)).limit(1);
        return row ? toWebservice(row, decodeConfig(row.config)) : undefined;
    }

    async list(): Promise<WebserviceConfig[]> {
        const rows = await this.db.select().from(webserviceConfigs).orderBy(asc(webserviceConfigs.name));
        return rows.map((row) => this.toListEntry(row));
    }

    async listValid(): Promise<WebserviceConfig[]> {
        const rows = await this.db
            .select()
            .from(webserviceConfigs)
            .where(eq(webserviceConfigs.valid_id, VALID_ID_ACTIVE))
            .orderBy(asc(webserviceConfigs.name));
        return rows.map((row) => this.toListEntry(row));
    }

    async getValidWebservicesForField(): Promise<WebserviceConfig[]> {
        const valid = await this.listValid();
        return valid.filter((ws) => invokerNames(ws).length > 0);
    }

    async create(input: WebserviceInput, userId: number): Promise<number> {
        const yaml = encodeConfig(input.Config);
        const now = new Date();

        const [created] = await this.db
            .insert(webserviceConfigs)
            .values({
                name: input.Name,
                config: yaml,
                valid_id: input.ValidID,
                create_time: now,
                create_by: userId,
                change_time: now,
                change_by: userId,
            })
            .returning({ id: webserviceConfigs.id });

        await this.recordHistory(created.id, yaml, userId);
        return created.id;
    }

    async update(input: WebserviceInput, userId: number): Promise<void> {
        if (input.ID === undefined) {
            throw new WebserviceError({ code: 'CONFIG_INVALID', message: 'webservice id is required for update' });
        }
        const yaml = encodeConfig(input.Config);

        const updated = await this.db
            .update(webserviceConfigs)
            .set({
                name: input.Name,
                config: yaml,
                valid_id: input.ValidID,
                change_time: new Date(),
                change_by: userId,
            })
            .where(eq(webserviceConfigs.id, input.ID))
            .returning({ id: webserviceConfigs.id });

        if (updated.length === 0) {
            throw notFound(input.ID);
        }
        await this.recordHistory(input.ID, yaml, userId);
    }

    async delete(id: number): Promise<void> {
        await this.db.transaction(async (tx) => {
            await tx.delete(webserviceConfigHistory).where(eq(webserviceConfigHistory.config_id, id));
            const deleted = await tx
                .delete(webserviceConfigs)
                .where(eq(webserviceConfigs.id, id))
                .returning({ id: webserviceConfigs.id });
            if (deleted.length === 0) {
                throw notFound(id);
            }
        });
    }

    async exists(name: string): Promise<boolean> {
        const rows = await this.db
            .select({ id: webserviceConfigs.id })
            .from(webserviceConfigs)
            .where(eq(webserviceConfigs.name, name))
            .limit(1);
        return rows.length > 0;
    }

    async existsExcluding(name: string, excludeId: number): Promise<boolean> {
        const rows = await this.db
            .select({ id: webserviceConfigs.id })
            .from(webserviceConfigs)
            .where(and(eq(webserviceConfigs.name, name), ne(webserviceConfigs.id, excludeId)))
            .limit(1);
        return rows.length > 0;
    }

    async getHistory(configId: number): Promise<WebserviceConfigHistory[]> {
        const rows = await this.db
            .select()
            .from(webserviceConfigHistory)
            .where(eq(webserviceConfigHistory.config_id, configId))
            .orderBy(desc(webserviceConfigHistory.create_time), desc(webserviceConfigHistory.id));
        return rows.map(toHistory);
    }

    async getHistoryEntry(historyId: number): Promise<WebserviceConfigHistory | undefined> {
        const [row] = await this.db
            .select()
            .from(webserviceConfigHistory)
            .where(eq(webserviceConfigHistory.id, historyId))
            .limit(1);
        return row ? toHistory(row) : undefined;
    }

    async restoreFromHistory(historyId: number, userId: number): Promise<void> {
        const entry = await this.getHistoryEntry(historyId);
        if (!entry) {
            throw new WebserviceError({ code: 'HISTORY_NOT_FOUND', message: `history entry ${historyId} not found` });
        }

        const updated = await this.db
            .update(webserviceConfigs)
            .set({ config: entry.Config, change_time: new Date(), change_by: userId })
            .where(eq(webserviceConfigs.id, entry.ConfigID))
            .returning({ id: webserviceConfigs.id });

        if (updated.length === 0) {
            throw notFound(entry.ConfigID);
        }
        await this.recordHistory(entry.ConfigID, entry.Config, userId);
    }

    private toListEntry(row: WebserviceConfigRow): WebserviceConfig {
        try {
            return toWebservice(row, decodeConfig(row.config));
        } catch (err) {
            log.warn('Stored webservice config could not be parsed', { webservice: row.name, error: errorMessage(err) });
            return toWebservice(row, {});
        }
    }

    /** Stores a snapshot unless this config already has one with the same checksum. History is best effort. */
    private async recordHistory(configId: number, yaml: string, userId: number): Promise<void> {
        const md5 = configMD5(yaml);
        try {
            const existing = await this.db
                .select({ id: webserviceConfigHistory.id })
                .from(webserviceConfigHistory)
                .where(and(eq(webserviceConfigHistory.config_id, configId), eq(webserviceConfigHistory.config_md5, md5)))
                .limit(1);
            if (existing.length > 0) {
                return;
            }

            const now = new Date();
            await this.db.insert(webserviceConfigHistory).values({
                config_id: configId,
                config: yaml,
                config_md5: md5,
                create_time: now,
                create_by: userId,
                change_time: now,
                change_by: userId,
            });
        } catch (err) {
            log.warn('Failed to record webservice config history', { config_id: configId, error: errorMessage(err) });
        }
    }
}
