import { WebserviceConfig, WebserviceConfigHistory, WebserviceInput } from '../types';

/**
 * Storage for webservice definitions and their configuration history.
 * Lookups resolve to `undefined` when nothing matches; writes against a
 * missing row reject with a `CONFIG_NOT_FOUND` or `HISTORY_NOT_FOUND` WebserviceError.
 */
export interface WebserviceRepository {
    getByName(name: string): Promise<WebserviceConfig | undefined>;
    getById(id: number): Promise<WebserviceConfig | undefined>;
    list(): Promise<WebserviceConfig[]>;
    listValid(): Promise<WebserviceConfig[]>;
    /** Valid definitions with at least one invoker. */
    getValidWebservicesForField(): Promise<WebserviceConfig[]>;

    /** Returns the new id. */
    create(input: WebserviceInput, userId: number): Promise<number>;
    /** `input.ID` selects the row. */
    update(input: WebserviceInput, userId: number): Promise<void>;
    delete(id: number): Promise<void>;

    exists(name: string): Promise<boolean>;
    existsExcluding(name: string, excludeId: number): Promise<boolean>;

    /** Newest first. */
    getHistory(configId: number): Promise<WebserviceConfigHistory[]>;
    getHistoryEntry(historyId: number): Promise<WebserviceConfigHistory | undefined>;
    restoreFromHistory(historyId: number, userId: number): Promise<void>;
}
