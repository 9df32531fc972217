import { v4 as uuidv4 } from 'uuid';
import { componentLogger } from '@generic-interface/service-template';
import { Clock, TTLCache } from '../cache/ttlCache';
import { WebserviceError, errorMessage } from '../errors';
import { applyMapping } from '../mapping';
import { WebserviceRepository } from '../repository/WebserviceRepository';
import { Transport, TransportRequest, TransportResponse, createDefaultTransports } from '../transports';
import {
    MappingConfig,
    Payload,
    WebserviceConfig,
    WebserviceConfigHistory,
    WebserviceInput,
    getInvoker,
    isValid,
    requesterHost,
    transportConfig,
    transportType,
} from '../types';

const log = componentLogger('generic-interface');

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export interface GenericInterfaceServiceOptions {
    repository: WebserviceRepository;
    /** Replaces the default REST and SOAP transports. */
    transports?: Transport[];
    cacheTtlMs?: number;
    now?: Clock;
}

export interface InvokeOptions {
    signal?: AbortSignal;
}

/** Runs requester invokers of stored webservice definitions against their remote systems. */
export class GenericInterfaceService {
    private readonly repository: WebserviceRepository;
    private readonly transports = new Map<string, Transport>();
    private readonly byName: TTLCache<string, WebserviceConfig>;
    private readonly byId: TTLCache<number, WebserviceConfig>;
    // Bumped on every invalidation; reads that straddle a write are not cached.
    private generation = 0;

    constructor(options: GenericInterfaceServiceOptions) {
        this.repository = options.repository;
        const ttl = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
        this.byName = new TTLCache(ttl, options.now);
        this.byId = new TTLCache(ttl, options.now);

        for (const transport of options.transports ?? createDefaultTransports()) {
            this.registerTransport(transport);
        }
    }

    registerTransport(transport: Transport): void {
        this.transports.set(transport.type, transport);
        log.debug('Registered transport', { transport: transport.type });
    }

    getTransport(type: string): Transport {
        const transport = this.transports.get(type);
        if (!transport) {
            throw new WebserviceError({ code: 'TRANSPORT_NOT_REGISTERED', message: `transport type "${type}" not registered` });
        }
        return transport;
    }

    async invoke(webservice: string, invoker: string, data: Payload, options: InvokeOptions = {}): Promise<TransportResponse> {
        return this.run(webservice, invoker, { operation: invoker, data }, options);
    }

    /** Like `invoke`, with the controller path and HTTP verb chosen by the caller. */
    async invokeWithController(
        webservice: string,
        invoker: string,
        controller: string,
        method: string,
        data: Payload,
        options: InvokeOptions = {}
    ): Promise<TransportResponse> {
        return this.run(webservice, invoker, { operation: invoker, data, method, path: controller }, options);
    }

    async getWebservice(name: string): Promise<WebserviceConfig | undefined> {
        const cached = this.byName.get(name);
        if (cached) return cached;

        const generation = this.generation;
        const ws = await this.repository.getByName(name);
        if (ws) this.remember(ws, generation);
        return ws;
    }

    async getWebserviceById(id: number): Promise<WebserviceConfig | undefined> {
        const cached = this.byId.get(id);
        if (cached) return cached;

        const generation = this.generation;
        const ws = await this.repository.getById(id);
        if (ws) this.remember(ws, generation);
        return ws;
    }

    listWebservices(): Promise<WebserviceConfig[]> {
        return this.repository.list();
    }

    listValidWebservices(): Promise<WebserviceConfig[]> {
        return this.repository.listValid();
    }

    getWebservicesForField(): Promise<WebserviceConfig[]> {
        return this.repository.getValidWebservicesForField();
    }

    async createWebservice(input: WebserviceInput, userId: number): Promise<number> {
        const id = await this.repository.create(input, userId);
        this.invalidateCache();
        return id;
    }

    async updateWebservice(input: WebserviceInput, userId: number): Promise<void> {
        await this.repository.update(input, userId);
        this.invalidateCache();
    }

    async deleteWebservice(id: number): Promise<void> {
        await this.repository.delete(id);
        this.invalidateCache();
    }

    webserviceExists(name: string): Promise<boolean> {
        return this.repository.exists(name);
    }

    webserviceExistsExcluding(name: string, excludeId: number): Promise<boolean> {
        return this.repository.existsExcluding(name, excludeId);
    }

    getHistory(configId: number): Promise<WebserviceConfigHistory[]> {
        return this.repository.getHistory(configId);
    }

    getHistoryEntry(historyId: number): Promise<WebserviceConfigHistory | undefined> {
        return this.repository.getHistoryEntry(historyId);
    }

    async restoreFromHistory(historyId: number, userId: number): Promise<void> {
        await this.repository.restoreFromHistory(historyId, userId);
        this.invalidateCache();
    }

    /** Checks that the remote host of a stored definition answers. */
    async testConnection(id: number, options: InvokeOptions = {}): Promise<void> {
        const ws = await this.getWebserviceById(id);
        if (!ws) {
            throw new WebserviceError({ code: 'CONFIG_NOT_FOUND', message: `webservice with id ${id} not found` });
        }
        const transport = this.getTransport(transportType(ws));
        await transport.testConnection(transportConfig(ws), { signal: options.signal });
    }

    invalidateCache(): void {
        this.generation++;
        this.byName.clear();
        this.byId.clear();
    }

    private remember(ws: WebserviceConfig, generation: number): void {
        if (generation !== this.generation) return;
        this.byName.set(ws.Name, ws);
        this.byId.set(ws.ID, ws);
    }

    private async resolve(name: string): Promise<WebserviceConfig> {
        let ws: WebserviceConfig | undefined;
        try {
            ws = await this.getWebservice(name);
        } catch (err) {
            throw new WebserviceError({
                code: 'CONFIG_LOOKUP_FAILED',
                message: `failed to load webservice "${name}": ${errorMessage(err)}`,
                webservice: name,
                cause: err,
            });
        }
        if (!ws) {
            throw new WebserviceError({ code: 'CONFIG_NOT_FOUND', message: `webservice "${name}" not found`, webservice: name });
        }
        return ws;
    }

    private map(direction: 'inbound' | 'outbound', mapping: MappingConfig, data: Payload, webservice: string, invoker: string): Payload {
        try {
            return applyMapping(mapping, data);
        } catch (err) {
            throw new WebserviceError({
                code: 'MAPPING_FAILED',
                message: `${direction} mapping error: ${errorMessage(err)}`,
                webservice,
                invoker,
                cause: err,
            });
        }
    }

    private async run(webservice: string, invoker: string, request: TransportRequest, options: InvokeOptions): Promise<TransportResponse> {
        const ws = await this.resolve(webservice);
        if (!isValid(ws)) {
            throw new WebserviceError({
                code: 'CONFIG_INACTIVE',
                message: `webservice "${webservice}" is not valid/active`,
                webservice,
            });
        }

        const invokerConfig = getInvoker(ws, invoker);
        if (!invokerConfig) {
            throw new WebserviceError({
                code: 'INVOKER_NOT_FOUND',
                message: `invoker "${invoker}" not found in webservice "${webservice}"`,
                webservice,
                invoker,
            });
        }

        const type = transportType(ws);
        const transport = this.getTransport(type);

        const outbound = invokerConfig.MappingOutbound;
        if (outbound?.Type) {
            request = { ...request, data: this.map('outbound', outbound, request.data, webservice, invoker) };
        }

        const invocationId = uuidv4();
        log.debug('Invoking webservice', {
            invocation_id: invocationId,
            webservice,
            invoker,
            transport: type,
            host: requesterHost(ws),
        });

        let response: TransportResponse;
        try {
            response = await transport.execute(transportConfig(ws), request, { signal: options.signal });
        } catch (err) {
            log.warn('Webservice invocation failed', { invocation_id: invocationId, webservice, invoker, error: errorMessage(err) });
            throw new WebserviceError({
                code: 'TRANSPORT_FAILED',
                message: `transport execution error: ${errorMessage(err)}`,
                webservice,
                invoker,
                cause: err,
            });
        }

        log.debug('Webservice responded', {
            invocation_id: invocationId,
            status_code: response.statusCode,
            success: response.success,
        });

        const inbound = invokerConfig.MappingInbound;
        if (inbound?.Type && response.data) {
            response.data = this.map('inbound', inbound, response.data, webservice, invoker);
        }

        return response;
    }
}
