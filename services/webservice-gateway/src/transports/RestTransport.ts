import { AxiosRequestConfig } from 'axios';
import { componentLogger } from '@generic-interface/service-template';
import { Transport, TransportCallOptions, TransportRequest, TransportResponse } from './Transport';
import { applyAuth, resolveAuth } from './auth';
import {
    CONNECTION_TEST_TIMEOUT_MS,
    DEFAULT_TIMEOUT_MS,
    HttpClient,
    applyAdditionalHeaders,
    buildHttpsAgent,
    buildProxy,
    createHttpClient,
    getHeader,
    isSuccessStatus,
    normalizeHeaders,
    parseTimeout,
    send,
    toBuffer,
} from './http';
import { WebserviceError, errorMessage } from '../errors';
import { formatValue, hasKey, isPlainObject, toPayload, toPayloadValue } from '../payload';
import { Payload, TRANSPORT_TYPES, TransportHTTPConfig } from '../types';

const log = componentLogger('rest-transport');

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);
const PLACEHOLDER = /:(\w+)/g;

export interface RestTransportOptions {
    client?: HttpClient;
    defaultTimeoutMs?: number;
}

/** Replaces `:name` placeholders with values from `data`; unknown names stay as they are. */
export const substitutePlaceholders = (path: string, data: Payload): string =>
    path.replace(PLACEHOLDER, (match: string, name: string) => (hasKey(data, name) ? formatValue(data[name]) : match));

export const buildPath = (config: TransportHTTPConfig, request: TransportRequest): string => {
    if (request.path) {
        return substitutePlaceholders(request.path, request.data);
    }

    const mapping = config.InvokerControllerMapping?.[request.operation];
    if (mapping) {
        return substitutePlaceholders(mapping.Controller ?? '', request.data);
    }

    return `/${request.operation}`;
};

export const determineMethod = (config: TransportHTTPConfig, request: TransportRequest): string => {
    if (request.method) {
        return request.method.toUpperCase();
    }

    const command = config.InvokerControllerMapping?.[request.operation]?.Command;
    if (command) {
        return command.toUpperCase();
    }

    if (config.DefaultCommand) {
        return config.DefaultCommand.toUpperCase();
    }

    return 'GET';
};

const appendQuery = (url: string, data: Payload): string => {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (err) {
        throw new WebserviceError({ code: 'TRANSPORT_FAILED', message: `failed to parse URL: ${errorMessage(err)}`, cause: err });
    }
    for (const [key, value] of Object.entries(data)) {
        parsed.searchParams.set(key, formatValue(value));
    }
    parsed.searchParams.sort();
    return parsed.toString();
};

/** Decodes a JSON object body; a top-level array is exposed as `{ items }`. */
export const decodeJsonBody = (body: Buffer, contentType: string | undefined): Payload | undefined => {
    if (body.length === 0 || !contentType?.includes('application/json')) {
        return undefined;
    }

    let decoded: unknown;
    try {
        decoded = JSON.parse(body.toString('utf8'));
    } catch {
        return undefined;
    }

    if (isPlainObject(decoded)) return toPayload(decoded);
    if (Array.isArray(decoded)) return { items: decoded.map(toPayloadValue) };
    return undefined;
};

export class RestTransport implements Transport {
    readonly type = TRANSPORT_TYPES.REST;
    private readonly client: HttpClient;
    private readonly defaultTimeoutMs: number;

    constructor(options: RestTransportOptions = {}) {
        this.client = options.client ?? createHttpClient();
        this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    async execute(config: TransportHTTPConfig, request: TransportRequest, options: TransportCallOptions = {}): Promise<TransportResponse> {
        const baseUrl = (config.Host ?? '').replace(/\/$/, '');
        const method = determineMethod(config, request);
        let url = baseUrl + buildPath(config, request);

        let body: string | undefined;
        if (BODY_METHODS.has(method)) {
            body = JSON.stringify(request.data);
        } else if (Object.keys(request.data).length > 0) {
            url = appendQuery(url, request.data);
        }

        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            'Accept': 'application/json',
        };
        applyAdditionalHeaders(headers, config.AdditionalHeaders);
        applyAuth(headers, resolveAuth(config.Authentication));

        log.debug('Executing REST request', { method, url, operation: request.operation });

        const response = await send(this.client, {
            method,
            url,
            headers,
            data: body,
            timeout: parseTimeout(config.Timeout, this.defaultTimeoutMs),
            signal: options.signal,
            proxy: buildProxy(config.Proxy),
            httpsAgent: buildHttpsAgent(config.SSL),
        });

        const raw = toBuffer(response.data);
        const responseHeaders = normalizeHeaders(response.headers);
        const result: TransportResponse = {
            success: isSuccessStatus(response.status),
            raw,
            statusCode: response.status,
            headers: responseHeaders,
        };

        const data = decodeJsonBody(raw, getHeader(responseHeaders, 'content-type'));
        if (data) {
            result.data = data;
        }

        if (!result.success && !result.error) {
            result.error = `HTTP ${response.status}: ${raw.toString('utf8')}`;
        }

        return result;
    }

    /** Sends a request as given, without path resolution, auth or query handling. */
    async executeRaw(
        method: string,
        url: string,
        headers: Record<string, string> = {},
        body?: Buffer | string,
        options: TransportCallOptions = {}
    ): Promise<TransportResponse> {
        const request: AxiosRequestConfig = {
            method,
            url,
            headers: { ...headers },
            data: body !== undefined && body.length > 0 ? body : undefined,
            timeout: this.defaultTimeoutMs,
            signal: options.signal,
        };
        const response = await send(this.client, request);

        const raw = toBuffer(response.data);
        const result: TransportResponse = {
            success: isSuccessStatus(response.status),
            raw,
            statusCode: response.status,
            headers: normalizeHeaders(response.headers),
        };

        if (raw.length > 0) {
            try {
                const decoded: unknown = JSON.parse(raw.toString('utf8'));
                if (isPlainObject(decoded)) {
                    result.data = toPayload(decoded);
                }
            } catch {
                // not JSON; the raw body is still returned
            }
        }

        return result;
    }

    async testConnection(config: TransportHTTPConfig, options: TransportCallOptions = {}): Promise<void> {
        const headers: Record<string, string> = {};
        applyAuth(headers, resolveAuth(config.Authentication));

        try {
            await send(this.client, {
                method: 'HEAD',
                url: config.Host ?? '',
                headers,
                timeout: CONNECTION_TEST_TIMEOUT_MS,
                signal: options.signal,
                proxy: buildProxy(config.Proxy),
                httpsAgent: buildHttpsAgent(config.SSL),
            });
        } catch (err) {
            throw new WebserviceError({
                code: 'TRANSPORT_FAILED',
                message: `connection failed: ${errorMessage(err)}`,
                cause: err,
            });
        }
    }
}
