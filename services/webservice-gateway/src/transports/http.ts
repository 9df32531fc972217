import axios, { AxiosInstance, AxiosProxyConfig, AxiosRequestConfig, AxiosResponse } from 'axios';
import fs from 'fs';
import https from 'https';
import path from 'path';
import { WebserviceError, errorMessage } from '../errors';
import { isPlainObject } from '../payload';
import { ProxyConfig, SSLConfig } from '../types';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const CONNECTION_TEST_TIMEOUT_MS = 10_000;

/** The slice of axios the transports call. Instances are created once and never mutated. */
export type HttpClient = Pick<AxiosInstance, 'request'>;

export const createHttpClient = (): HttpClient =>
    axios.create({
        // Every status is data for the caller; only network level failures reject.
        validateStatus: () => true,
        responseType: 'arraybuffer',
        transformResponse: [(data: unknown) => data],
    });

/**
 * Per-call timeout from the string-encoded `Timeout` setting (seconds, fractions allowed).
 * Empty, negative or unparsable values fall back to the transport default; `0` disables it.
 */
export const parseTimeout = (timeout: string | undefined, fallbackMs: number): number => {
    if (timeout === undefined || timeout.trim() === '') return fallbackMs;
    const seconds = Number(timeout);
    if (!Number.isFinite(seconds) || seconds < 0) return fallbackMs;
    return Math.round(seconds * 1000);
};

/** Sets a header, replacing any existing entry that differs only by case. */
export const setHeader = (headers: Record<string, string>, name: string, value: string): void => {
    const lower = name.toLowerCase();
    for (const key of Object.keys(headers)) {
        if (key.toLowerCase() === lower) delete headers[key];
    }
    headers[name] = value;
};

export const getHeader = (headers: Record<string, string>, name: string): string | undefined => {
    const lower = name.toLowerCase();
    const key = Object.keys(headers).find((k) => k.toLowerCase() === lower);
    return key === undefined ? undefined : headers[key];
};

export const applyAdditionalHeaders = (headers: Record<string, string>, additional: Record<string, string> | undefined): void => {
    for (const [name, value] of Object.entries(additional ?? {})) {
        setHeader(headers, name, value);
    }
};

export const normalizeHeaders = (headers: unknown): Record<string, string> => {
    const out: Record<string, string> = {};
    if (!isPlainObject(headers)) return out;
    for (const [name, value] of Object.entries(headers)) {
        if (typeof value === 'string') {
            out[name] = value;
        } else if (typeof value === 'number' || typeof value === 'boolean') {
            out[name] = String(value);
        } else if (Array.isArray(value)) {
            out[name] = value.map(String).join(', ');
        }
    }
    return out;
};

export const toBuffer = (data: unknown): Buffer => {
    if (Buffer.isBuffer(data)) return data;
    if (typeof data === 'string') return Buffer.from(data, 'utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    return Buffer.alloc(0);
};

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

export const buildProxy = (proxy: ProxyConfig | undefined): AxiosProxyConfig | undefined => {
    if (proxy?.UseProxy !== '1' || !proxy.ProxyHost) return undefined;

    const port = Number(proxy.ProxyPort);
    return {
        protocol: 'http',
        host: proxy.ProxyHost,
        port: Number.isInteger(port) && port > 0 ? port : 80,
        auth: proxy.ProxyUser ? { username: proxy.ProxyUser, password: proxy.ProxyPassword ?? '' } : undefined,
    };
};

const readCaDir = (dir: string): Buffer[] =>
    fs.readdirSync(dir)
        .filter((file) => /\.(pem|crt|cer)$/i.test(file))
        .map((file) => fs.readFileSync(path.join(dir, file)));

// One agent per distinct SSL settings; files are read when the settings are first seen.
const httpsAgents = new Map<string, https.Agent>();

const sslKey = (ssl: SSLConfig): string =>
    JSON.stringify(Object.entries(ssl).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

/** TLS agent for the stored SSL settings; undefined when they match Node's defaults. */
export const buildHttpsAgent = (ssl: SSLConfig | undefined): https.Agent | undefined => {
    if (!ssl) return undefined;
    const hasFiles = Boolean(ssl.SSLCAFile || ssl.SSLCADir || ssl.SSLCertFile || ssl.SSLKeyFile);
    if (!hasFiles && ssl.SSLVerifyCert !== '0' && ssl.SSLVerifyHostname !== '0') return undefined;

    const key = sslKey(ssl);
    const cached = httpsAgents.get(key);
    if (cached) return cached;

    const agent = createHttpsAgent(ssl);
    httpsAgents.set(key, agent);
    return agent;
};

const createHttpsAgent = (ssl: SSLConfig): https.Agent => {
    try {
        const ca: Buffer[] = [];
        if (ssl.SSLCAFile) ca.push(fs.readFileSync(ssl.SSLCAFile));
        if (ssl.SSLCADir) ca.push(...readCaDir(ssl.SSLCADir));

        return new https.Agent({
            rejectUnauthorized: ssl.SSLVerifyCert !== '0',
            checkServerIdentity: ssl.SSLVerifyHostname === '0' ? () => undefined : undefined,
            ca: ca.length > 0 ? ca : undefined,
            cert: ssl.SSLCertFile ? fs.readFileSync(ssl.SSLCertFile) : undefined,
            key: ssl.SSLKeyFile ? fs.readFileSync(ssl.SSLKeyFile) : undefined,
        });
    } catch (err) {
        throw new WebserviceError({
            code: 'TRANSPORT_FAILED',
            message: `failed to load SSL settings: ${errorMessage(err)}`,
            cause: err,
        });
    }
};

/** Sends the request; anything that prevents a response is raised as TRANSPORT_FAILED. */
export const send = async (client: HttpClient, request: AxiosRequestConfig): Promise<AxiosResponse<unknown>> => {
    try {
        return await client.request<unknown>(request);
    } catch (err) {
        throw new WebserviceError({
            code: 'TRANSPORT_FAILED',
            message: `request failed: ${errorMessage(err)}`,
            details: axios.isAxiosError(err) ? { code: err.code } : undefined,
            cause: err,
        });
    }
};
