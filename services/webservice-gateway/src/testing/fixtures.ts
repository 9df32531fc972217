import { Transport, TransportCallOptions, TransportRequest, TransportResponse } from '../transports';
import { Payload, TRANSPORT_TYPES, TransportHTTPConfig, WebserviceInput } from '../types';

/** Transport double whose calls are jest mocks. */
export class FakeTransport implements Transport {
    readonly execute = jest.fn<Promise<TransportResponse>, [TransportHTTPConfig, TransportRequest, TransportCallOptions?]>();
    readonly testConnection = jest.fn<Promise<void>, [TransportHTTPConfig, TransportCallOptions?]>();

    constructor(readonly type: string = TRANSPORT_TYPES.REST) {
        this.testConnection.mockResolvedValue(undefined);
    }
}

export const okResponse = (data?: Payload, statusCode = 200): TransportResponse => ({
    success: true,
    data,
    raw: Buffer.from(data === undefined ? '' : JSON.stringify(data)),
    statusCode,
    headers: { 'content-type': 'application/json' },
});

export const errorResponse = (statusCode: number, body: string): TransportResponse => ({
    success: false,
    raw: Buffer.from(body),
    statusCode,
    headers: {},
    error: `HTTP ${statusCode}: ${body}`,
});

export const crmWebservice = (overrides: Partial<WebserviceInput> = {}): WebserviceInput => ({
    Name: 'Crm',
    ValidID: 1,
    Config: {
        Description: 'Customer directory',
        Requester: {
            Transport: {
                Type: TRANSPORT_TYPES.REST,
                Config: { Host: 'https://crm.example.test', Timeout: '10' },
            },
            Invoker: {
                Search: { Type: 'Generic::Search' },
                Get: {
                    Type: 'Generic::Get',
                    MappingOutbound: { Type: 'Simple', Config: { KeyMapDefault: { MapTo: '1' }, KeyMap: { id: 'CustomerID' } } },
                    MappingInbound: { Type: 'Simple', Config: { KeyMap: { FullName: 'name', Town: 'city' } } },
                },
            },
        },
    },
    ...overrides,
});
