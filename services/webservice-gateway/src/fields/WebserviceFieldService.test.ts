import { WebserviceFieldService, buildDisplayValue, parseFieldConfigFromMap } from './WebserviceFieldService';
import { GenericInterfaceService } from '../service/GenericInterfaceService';
import { InMemoryWebserviceRepository } from '../testing/InMemoryWebserviceRepository';
import { FakeTransport, errorResponse, okResponse } from '../testing/fixtures';
import { TRANSPORT_TYPES } from '../types';

const fieldConfig = parseFieldConfigFromMap({
    Webservice: 'Directory',
    InvokerSearch: 'Search',
    InvokerGet: 'Get',
    StoredValue: 'id',
    DisplayedValues: 'name, city',
    AutocompleteMinLength: 2,
    CacheTTL: '30',
});

describe('WebserviceFieldService', () => {
    let now: number;
    let transport: FakeTransport;
    let fields: WebserviceFieldService;

    beforeEach(() => {
        now = 0;
        const repository = new InMemoryWebserviceRepository([
            {
                Name: 'Directory',
                ValidID: 1,
                Config: {
                    Requester: {
                        Transport: { Type: TRANSPORT_TYPES.REST, Config: { Host: 'https://directory.example.test' } },
                        Invoker: { Search: {}, Get: {} },
                    },
                },
            },
        ]);
        transport = new FakeTransport();
        const service = new GenericInterfaceService({ repository, transports: [transport] });
        fields = new WebserviceFieldService(service, () => now);
    });

    describe('parseFieldConfigFromMap', () => {
        it('should fill in defaults', () => {
            expect(parseFieldConfigFromMap({})).toEqual({
                Webservice: '',
                InvokerSearch: '',
                InvokerGet: '',
                StoredValue: '',
                DisplayedValues: [],
                DisplayedValuesSeparator: ' - ',
                SearchKeys: [],
                AutocompleteMinLength: 3,
                Limit: 20,
                CacheTTL: 60,
            });
        });

        it('should accept numeric strings and ignore invalid numbers', () => {
            const config = parseFieldConfigFromMap({ AutocompleteMinLength: '2', Limit: -1, CacheTTL: 1.5, SearchKeys: 'name,email' });

            expect(config.AutocompleteMinLength).toBe(2);
            expect(config.Limit).toBe(20);
            expect(config.CacheTTL).toBe(60);
            expect(config.SearchKeys).toEqual(['name', 'email']);
        });
    });

    describe('buildDisplayValue', () => {
        it('should join the displayed fields that have a value', () => {
            expect(buildDisplayValue({ name: 'Ada', city: null }, fieldConfig)).toBe('Ada');
            expect(buildDisplayValue({ name: 'Ada', city: 'London' }, { ...fieldConfig, DisplayedValuesSeparator: ' / ' })).toBe(
                'Ada / London'
            );
        });
    });

    describe('search', () => {
        it('should not call the webservice for short terms', async () => {
            expect(await fields.search(fieldConfig, 'A')).toEqual([]);
            expect(transport.execute).not.toHaveBeenCalled();
        });

        it('should turn the result list into options', async () => {
            transport.execute.mockResolvedValueOnce(
                okResponse({
                    items: [{ id: 1, name: 'Ada', city: 'London' }, { name: 'No id' }, { id: 2, name: 'Alan' }, 'skipped'],
                })
            );

            const results = await fields.search(fieldConfig, 'Ad');

            expect(transport.execute.mock.calls[0][1].data).toEqual({ SearchTerms: 'Ad', Limit: 20 });
            expect(results).toEqual([
                {
                    StoredValue: '1',
                    DisplayValue: 'Ada - London',
                    Data: { id: 1, name: 'Ada', city: 'London' },
                    value: '1',
                    label: 'Ada - London',
                },
                { StoredValue: '2', DisplayValue: 'Alan', Data: { id: 2, name: 'Alan' }, value: '2', label: 'Alan' },
            ]);
        });

        it('should treat a single object reply as one result and apply the limit', async () => {
            transport.execute
                .mockResolvedValueOnce(okResponse({ id: 5, name: 'Solo' }))
                .mockResolvedValueOnce(okResponse({ Results: [{ id: 1 }, { id: 2 }] }));

            expect((await fields.search(fieldConfig, 'solo')).map((r) => r.StoredValue)).toEqual(['5']);
            expect((await fields.search({ ...fieldConfig, Limit: 1 }, 'many')).map((r) => r.StoredValue)).toEqual(['1']);
        });

        it('should cache results per lower-cased term for the configured seconds', async () => {
            transport.execute.mockResolvedValue(okResponse({ items: [{ id: 1, name: 'Ada' }] }));

            await fields.search(fieldConfig, 'Ada');
            await fields.search(fieldConfig, 'ADA');
            expect(transport.execute).toHaveBeenCalledTimes(1);

            now += 30_000;
            await fields.search(fieldConfig, 'ada');
            expect(transport.execute).toHaveBeenCalledTimes(2);
        });

        it('should clear the cache of one webservice', async () => {
            transport.execute.mockResolvedValue(okResponse({ items: [] }));

            await fields.search(fieldConfig, 'Ada');
            fields.clearCache('Other');
            await fields.search(fieldConfig, 'Ada');
            expect(transport.execute).toHaveBeenCalledTimes(1);

            fields.clearCache('Directory');
            await fields.search(fieldConfig, 'Ada');
            expect(transport.execute).toHaveBeenCalledTimes(2);
        });

        it('should fail when the webservice reports an error', async () => {
            transport.execute.mockResolvedValueOnce(errorResponse(503, 'busy'));

            await expect(fields.search(fieldConfig, 'Ada')).rejects.toMatchObject({
                code: 'TRANSPORT_FAILED',
                message: 'webservice returned error: HTTP 503: busy',
            });
        });
    });

    describe('display values', () => {
        it('should resolve the label through the get invoker', async () => {
            transport.execute.mockResolvedValueOnce(okResponse({ id: '1', name: 'Ada', city: 'London' }));

            expect(await fields.getDisplayValue(fieldConfig, '1')).toBe('Ada - London');
            expect(transport.execute.mock.calls[0][1].data).toEqual({ id: '1' });
        });

        it('should fall back to the stored value', async () => {
            transport.execute.mockRejectedValueOnce(new Error('timeout')).mockResolvedValueOnce(errorResponse(404, 'gone'));

            expect(await fields.getDisplayValue(fieldConfig, '1')).toBe('1');
            expect(await fields.getDisplayValue(fieldConfig, '2')).toBe('2');
            expect(await fields.getDisplayValue({ ...fieldConfig, InvokerGet: '' }, '3')).toBe('3');
            expect(await fields.getDisplayValue(fieldConfig, '')).toBe('');
            expect(transport.execute).toHaveBeenCalledTimes(2);
        });

        it('should resolve several values in order', async () => {
            transport.execute
                .mockResolvedValueOnce(okResponse({ name: 'Ada' }))
                .mockResolvedValueOnce(okResponse({ name: 'Alan', city: 'Wilmslow' }));

            expect(await fields.getMultipleDisplayValues(fieldConfig, ['1', '2'])).toEqual({ '1': 'Ada', '2': 'Alan - Wilmslow' });
        });
    });
});
