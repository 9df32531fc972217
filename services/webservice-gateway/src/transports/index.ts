import { Transport } from './Transport';
import { RestTransport } from './RestTransport';
import { SoapTransport } from './SoapTransport';
import { HttpClient } from './http';

export interface DefaultTransportOptions {
    client?: HttpClient;
    defaultTimeoutMs?: number;
}

/** The transports every service instance starts with. */
export const createDefaultTransports = (options: DefaultTransportOptions = {}): Transport[] => [
    new RestTransport(options),
    new SoapTransport(options),
];

export * from './Transport';
export * from './RestTransport';
export * from './SoapTransport';
export { HttpClient, createHttpClient, parseTimeout, DEFAULT_TIMEOUT_MS } from './http';
export { AuthScheme, resolveAuth, applyAuth, DEFAULT_API_KEY_HEADER } from './auth';
