import { Payload, TransportHTTPConfig } from '../types';

export interface TransportRequest {
    /** Invoker/operation name. */
    operation: string;
    data: Payload;
    /** Overrides the configured HTTP verb. */
    method?: string;
    /** Overrides the configured controller path; may contain `:name` placeholders. */
    path?: string;
}

export interface TransportResponse {
    success: boolean;
    data?: Payload;
    raw: Buffer;
    statusCode: number;
    headers: Record<string, string>;
    error?: string;
}

export interface TransportCallOptions {
    signal?: AbortSignal;
}

/**
 * Executes one request against one remote endpoint.
 *
 * A rejected promise means the call could not be made at all (network, abort,
 * timeout, malformed config). HTTP error statuses, SOAP faults and unparsable
 * bodies resolve with `success: false` and `error` set, so callers must check both.
 */
export interface Transport {
    readonly type: string;
    execute(config: TransportHTTPConfig, request: TransportRequest, options?: TransportCallOptions): Promise<TransportResponse>;
    /** Resolves when the remote host answers at all, whatever the status. */
    testConnection(config: TransportHTTPConfig, options?: TransportCallOptions): Promise<void>;
}
