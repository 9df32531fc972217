import { componentLogger } from '@generic-interface/service-template';
import { Clock, TTLCache } from '../cache/ttlCache';
import { WebserviceError, errorMessage } from '../errors';
import { formatValue, isPlainObject } from '../payload';
import { GenericInterfaceService } from '../service/GenericInterfaceService';
import { Payload, PayloadValue } from '../types';

const log = componentLogger('webservice-field');

export const DEFAULT_FIELD_CACHE_TTL_SECONDS = 60;
export const DEFAULT_SEPARATOR = ' - ';

const RESULT_KEYS = ['items', 'Items', 'results', 'Results', 'data', 'Data'];

/** Settings of a dropdown/multiselect field backed by webservice invokers. */
export interface FieldConfig {
    Webservice: string;
    InvokerSearch: string;
    InvokerGet: string;
    StoredValue: string;
    DisplayedValues: string[];
    DisplayedValuesSeparator: string;
    SearchKeys: string[];
    AutocompleteMinLength: number;
    Limit: number;
    /** Seconds. */
    CacheTTL: number;
}

export interface AutocompleteResult {
    StoredValue: string;
    DisplayValue: string;
    Data?: Payload;
    // Aliases read by older frontends.
    value: string;
    label: string;
}

const splitList = (value: string): string[] => value.split(',').map((part) => part.trim());

const positiveInt = (value: unknown): number | undefined => {
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : undefined;
};

const stringOption = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

/** Reads a dynamic field's stored settings, filling in defaults for anything missing or invalid. */
export const parseFieldConfigFromMap = (raw: Record<string, unknown>): FieldConfig => {
    const displayed = stringOption(raw.DisplayedValues);
    const searchKeys = stringOption(raw.SearchKeys);

    return {
        Webservice: stringOption(raw.Webservice) ?? '',
        InvokerSearch: stringOption(raw.InvokerSearch) ?? '',
        InvokerGet: stringOption(raw.InvokerGet) ?? '',
        StoredValue: stringOption(raw.StoredValue) ?? '',
        DisplayedValues: displayed !== undefined ? splitList(displayed) : [],
        DisplayedValuesSeparator: stringOption(raw.DisplayedValuesSeparator) || DEFAULT_SEPARATOR,
        SearchKeys: searchKeys !== undefined ? splitList(searchKeys) : [],
        AutocompleteMinLength: positiveInt(raw.AutocompleteMinLength) ?? 3,
        Limit: positiveInt(raw.Limit) ?? 20,
        CacheTTL: positiveInt(raw.CacheTTL) ?? DEFAULT_FIELD_CACHE_TTL_SECONDS,
    };
};

export const buildDisplayValue = (data: Payload, config: FieldConfig): string => {
    const parts: string[] = [];
    for (const field of config.DisplayedValues) {
        const value = data[field];
        if (value === undefined || value === null) continue;
        const text = formatValue(value);
        if (text !== '') parts.push(text);
    }
    return parts.join(config.DisplayedValuesSeparator || DEFAULT_SEPARATOR);
};

const findItems = (data: Payload): PayloadValue[] => {
    for (const key of RESULT_KEYS) {
        const value = data[key];
        if (Array.isArray(value)) return value;
    }
    return Object.keys(data).length > 0 ? [data] : [];
};

export const parseSearchResults = (data: Payload | undefined, config: FieldConfig): AutocompleteResult[] => {
    if (!data) return [];

    const results: AutocompleteResult[] = [];
    for (const item of findItems(data)) {
        if (!isPlainObject(item)) continue;

        const stored = item[config.StoredValue];
        const storedValue = stored === undefined ? '' : formatValue(stored);
        if (storedValue === '') continue;

        const displayValue = buildDisplayValue(item, config);
        results.push({ StoredValue: storedValue, DisplayValue: displayValue, Data: item, value: storedValue, label: displayValue });
    }

    return config.Limit > 0 ? results.slice(0, config.Limit) : results;
};

/** Autocomplete and display lookups for fields whose options come from a webservice. */
export class WebserviceFieldService {
    private readonly cache: TTLCache<string, AutocompleteResult[]>;

    constructor(
        private readonly service: GenericInterfaceService,
        now?: Clock
    ) {
        this.cache = new TTLCache(DEFAULT_FIELD_CACHE_TTL_SECONDS * 1000, now);
    }

    async search(config: FieldConfig, term: string): Promise<AutocompleteResult[]> {
        if (term.length < config.AutocompleteMinLength) {
            return [];
        }

        const key = `${config.Webservice}:${config.InvokerSearch}:${term.toLowerCase()}`;
        const cached = this.cache.get(key);
        if (cached) return cached;

        const response = await this.service.invoke(config.Webservice, config.InvokerSearch, {
            SearchTerms: term,
            Limit: config.Limit,
        });
        if (!response.success) {
            throw new WebserviceError({
                code: 'TRANSPORT_FAILED',
                message: `webservice returned error: ${response.error ?? `HTTP ${response.statusCode}`}`,
                webservice: config.Webservice,
                invoker: config.InvokerSearch,
            });
        }

        const results = parseSearchResults(response.data, config);
        const ttlSeconds = config.CacheTTL > 0 ? config.CacheTTL : DEFAULT_FIELD_CACHE_TTL_SECONDS;
        this.cache.set(key, results, ttlSeconds * 1000);
        return results;
    }

    /** Human readable label for a stored value; the stored value itself when it cannot be resolved. */
    async getDisplayValue(config: FieldConfig, storedValue: string): Promise<string> {
        if (storedValue === '') return '';
        if (config.InvokerGet === '') return storedValue;

        try {
            const response = await this.service.invoke(config.Webservice, config.InvokerGet, {
                [config.StoredValue]: storedValue,
            });
            if (!response.success || !response.data) {
                return storedValue;
            }
            return buildDisplayValue(response.data, config);
        } catch (err) {
            log.warn('Display value lookup failed', {
                webservice: config.Webservice,
                invoker: config.InvokerGet,
                error: errorMessage(err),
            });
            return storedValue;
        }
    }

    async getMultipleDisplayValues(config: FieldConfig, storedValues: string[]): Promise<Record<string, string>> {
        const result: Record<string, string> = {};
        for (const value of storedValues) {
            result[value] = await this.getDisplayValue(config, value);
        }
        return result;
    }

    /** Drops cached searches of one webservice, or all of them. */
    clearCache(webservice?: string): void {
        if (!webservice) {
            this.cache.clear();
            return;
        }
        const prefix = `${webservice}:`;
        this.cache.invalidateMatching((key) => key.startsWith(prefix));
    }
}
