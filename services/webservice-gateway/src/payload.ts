import { Payload, PayloadValue } from './types';

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Converts an arbitrary decoded value (JSON.parse, YAML, request bodies) into the
 * payload value union. `undefined` and functions become `null`, dates become ISO strings.
 */
export const toPayloadValue = (value: unknown): PayloadValue => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'bigint') return value.toString();
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return value.map(toPayloadValue);
    if (isPlainObject(value)) return toPayload(value);
    return null;
};

export const toPayload = (value: Record<string, unknown>): Payload => {
    const out: Payload = {};
    for (const [key, entry] of Object.entries(value)) {
        // defineProperty keeps a decoded "__proto__" key as own data.
        Object.defineProperty(out, key, { value: toPayloadValue(entry), enumerable: true, writable: true, configurable: true });
    }
    return out;
};

/** Text form used for query parameters, path placeholders and XML element content. */
export const formatValue = (value: PayloadValue | undefined): string => {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
};

export const hasKey = (data: Payload, key: string): boolean => Object.prototype.hasOwnProperty.call(data, key);
