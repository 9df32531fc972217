import request from 'supertest';
import { Express } from 'express';
import { createService } from '@generic-interface/service-template';
import { createWebserviceHandlers } from './index';
import { createRouter } from '../routes';
import { WebserviceError } from '../errors';
import { WebserviceFieldService } from '../fields/WebserviceFieldService';
import { GenericInterfaceService } from '../service/GenericInterfaceService';
import { InMemoryWebserviceRepository } from '../testing/InMemoryWebserviceRepository';
import { FakeTransport, crmWebservice, errorResponse, okResponse } from '../testing/fixtures';

describe('Webservice Gateway Handlers', () => {
    let transport: FakeTransport;
    let app: Express;

    beforeEach(() => {
        const repository = new InMemoryWebserviceRepository([crmWebservice(), crmWebservice({ Name: 'Retired', ValidID: 2 })]);
        transport = new FakeTransport();
        const service = new GenericInterfaceService({ repository, transports: [transport] });
        const fieldService = new WebserviceFieldService(service);

        app = createService('webservice-gateway-test');
        app.use(createRouter(createWebserviceHandlers({ service, fieldService })));
    });

    describe('webservice administration', () => {
        it('should list all or only valid webservices', async () => {
            const all = await request(app).get('/webservices');
            const valid = await request(app).get('/webservices?valid=1');

            expect(all.status).toBe(200);
            expect(all.body.data.map((ws: { Name: string }) => ws.Name)).toEqual(['Crm', 'Retired']);
            expect(valid.body.data.map((ws: { Name: string }) => ws.Name)).toEqual(['Crm']);
        });

        it('should filter the list by validity', async () => {
            const valid = await request(app).get('/webservices?valid=valid');
            const invalid = await request(app).get('/webservices?valid=invalid');

            expect(valid.body.data.map((ws: { Name: string }) => ws.Name)).toEqual(['Crm']);
            expect(invalid.body.data.map((ws: { Name: string }) => ws.Name)).toEqual(['Retired']);
        });

        it('should search names and descriptions case-insensitively', async () => {
            await request(app).post('/webservices').send({ name: 'Billing', description: 'Invoice archive' });

            const byName = await request(app).get('/webservices?search=BILL');
            const byDescription = await request(app).get('/webservices?search=directory');
            const combined = await request(app).get('/webservices?search=directory&valid=invalid');

            expect(byName.body.data.map((ws: { Name: string }) => ws.Name)).toEqual(['Billing']);
            expect(byDescription.body.data.map((ws: { Name: string }) => ws.Name)).toEqual(['Crm', 'Retired']);
            expect(combined.body.data.map((ws: { Name: string }) => ws.Name)).toEqual(['Retired']);
        });

        it('should validate the id and report missing definitions', async () => {
            const invalid = await request(app).get('/webservices/abc');
            const missing = await request(app).get('/webservices/99');

            expect(invalid.status).toBe(400);
            expect(invalid.body).toEqual({ success: false, error: 'Invalid webservice ID' });
            expect(missing.status).toBe(404);
            expect(missing.body).toEqual({ success: false, error: 'Webservice not found' });
        });

        it('should create a definition with the default config', async () => {
            const created = await request(app)
                .post('/webservices')
                .set('x-user-id', '7')
                .send({ name: ' Billing ', description: 'Invoices' });

            expect(created.status).toBe(201);
            expect(created.body).toEqual({ success: true, data: { id: 3, name: 'Billing' }, message: 'Webservice created successfully' });

            const stored = await request(app).get('/webservices/3');
            expect(stored.body.data).toMatchObject({
                Name: 'Billing',
                ValidID: 1,
                CreateBy: 7,
                Config: {
                    Description: 'Invoices',
                    Debugger: { DebugThreshold: 'error', TestMode: '0' },
                    Requester: { Transport: { Type: 'HTTP::REST' } },
                },
            });
        });

        it('should reject missing names, duplicates and invalid configs', async () => {
            const unnamed = await request(app).post('/webservices').send({});
            const duplicate = await request(app).post('/webservices').send({ name: 'Crm' });
            const invalid = await request(app).post('/webservices').send({ name: 'Broken', config: { Requester: 'nope' } });

            expect(unnamed.status).toBe(400);
            expect(unnamed.body.error).toBe('Name is required');
            expect(duplicate.status).toBe(409);
            expect(duplicate.body.error).toBe('A webservice with this name already exists');
            expect(invalid.status).toBe(400);
            expect(invalid.body.code).toBe('CONFIG_INVALID');
            expect(invalid.body.error).toMatch(/^invalid webservice configuration: /);
        });

        it('should update the description and keep the rest of the config', async () => {
            const updated = await request(app).put('/webservices/1').send({ name: 'Crm', description: 'Updated' });

            expect(updated.status).toBe(200);
            expect(updated.body).toEqual({ success: true, message: 'Webservice updated successfully' });

            const stored = await request(app).get('/webservices/1');
            expect(stored.body.data.Config.Description).toBe('Updated');
            expect(stored.body.data.Config.Requester.Transport.Config).toEqual({ Host: 'https://crm.example.test', Timeout: '10' });
            expect(stored.body.data.ValidID).toBe(1);
        });

        it('should refuse renaming onto another definition or updating a missing one', async () => {
            const clash = await request(app).put('/webservices/1').send({ name: 'Retired' });
            const missing = await request(app).put('/webservices/99').send({ name: 'Ghost' });

            expect(clash.status).toBe(409);
            expect(missing.status).toBe(404);
            expect(missing.body.error).toBe('Webservice not found');
        });

        it('should delete a definition once', async () => {
            const deleted = await request(app).delete('/webservices/2');
            const again = await request(app).delete('/webservices/2');

            expect(deleted.body).toEqual({ success: true, message: 'Webservice deleted successfully' });
            expect(again.status).toBe(404);
            expect(again.body).toEqual({ success: false, error: 'webservice with id 2 not found', code: 'CONFIG_NOT_FOUND' });
        });
    });

    describe('connection test', () => {
        it('should report success', async () => {
            const res = await request(app).post('/webservices/1/test');

            expect(res.body).toEqual({ success: true, message: 'Connection test successful' });
            expect(transport.testConnection).toHaveBeenCalledTimes(1);
        });

        it('should report an unreachable host in the body', async () => {
            transport.testConnection.mockRejectedValueOnce(
                new WebserviceError({ code: 'TRANSPORT_FAILED', message: 'connection failed: ECONNREFUSED' })
            );

            const res = await request(app).post('/webservices/1/test');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({ success: false, error: 'Connection test failed: connection failed: ECONNREFUSED' });
        });
    });

    describe('history', () => {
        it('should list and restore snapshots of the same webservice', async () => {
            await request(app).put('/webservices/1').send({ name: 'Crm', description: 'Changed' });

            const history = await request(app).get('/webservices/1/history');
            expect(history.body.data.map((h: { ID: number }) => h.ID)).toEqual([3, 1]);

            const restored = await request(app).post('/webservices/1/history/1/restore').set('x-user-id', '4');
            expect(restored.body).toEqual({ success: true, message: 'Configuration restored successfully' });

            const stored = await request(app).get('/webservices/1');
            expect(stored.body.data.Config.Description).toBe('Customer directory');
            expect(stored.body.data.ChangeBy).toBe(4);
        });

        it('should not restore a snapshot of another webservice', async () => {
            const res = await request(app).post('/webservices/1/history/2/restore');

            expect(res.status).toBe(404);
            expect(res.body.error).toBe('History entry not found');
        });

        it('should validate the history id and the webservice', async () => {
            const invalid = await request(app).post('/webservices/1/history/latest/restore');
            const missing = await request(app).get('/webservices/99/history');

            expect(invalid.status).toBe(400);
            expect(invalid.body.error).toBe('Invalid history ID');
            expect(missing.status).toBe(404);
        });
    });

    describe('handleInvoke', () => {
        it('should return the transport response', async () => {
            transport.execute.mockResolvedValueOnce(okResponse({ items: [] }));

            const res = await request(app).post('/invoke/Crm/Search').send({ data: { SearchTerms: 'Ada' } });

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                success: true,
                data: { status_code: 200, headers: { 'content-type': 'application/json' }, data: { items: [] } },
            });
            expect(transport.execute.mock.calls[0][1]).toEqual({ operation: 'Search', data: { SearchTerms: 'Ada' } });
        });

        it('should pass the controller and method through', async () => {
            transport.execute.mockResolvedValueOnce(okResponse());

            await request(app).post('/invoke/Crm/Search').send({ controller: '/customers', method: 'POST' });

            expect(transport.execute.mock.calls[0][1]).toEqual({ operation: 'Search', data: {}, method: 'POST', path: '/customers' });
        });

        it('should report remote errors as an unsuccessful response', async () => {
            transport.execute.mockResolvedValueOnce(errorResponse(500, 'down'));

            const res = await request(app).post('/invoke/Crm/Search').send({});

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                success: false,
                data: { status_code: 500, headers: {}, data: null },
                error: 'HTTP 500: down',
            });
        });

        it('should map invocation failures to status codes', async () => {
            transport.execute.mockRejectedValueOnce(new Error('socket hang up'));

            const badData = await request(app).post('/invoke/Crm/Search').send({ data: [1] });
            const unknown = await request(app).post('/invoke/Nope/Search').send({});
            const inactive = await request(app).post('/invoke/Retired/Search').send({});
            const failed = await request(app).post('/invoke/Crm/Search').send({});

            expect(badData.status).toBe(400);
            expect(badData.body.error).toBe('data must be an object');
            expect(unknown.status).toBe(404);
            expect(unknown.body.code).toBe('CONFIG_NOT_FOUND');
            expect(inactive.status).toBe(409);
            expect(failed.status).toBe(502);
            expect(failed.body).toEqual({
                success: false,
                error: 'transport execution error: socket hang up',
                code: 'TRANSPORT_FAILED',
            });
        });
    });

    describe('field lookups', () => {
        it('should return autocomplete options', async () => {
            transport.execute.mockResolvedValueOnce(okResponse({ items: [{ id: 1, name: 'Ada' }] }));

            const res = await request(app)
                .post('/fields/autocomplete')
                .send({ config: { Webservice: 'Crm', InvokerSearch: 'Search', StoredValue: 'id', DisplayedValues: 'name' }, term: 'Ada' });

            expect(res.body).toEqual({
                success: true,
                data: [{ StoredValue: '1', DisplayValue: 'Ada', Data: { id: 1, name: 'Ada' }, value: '1', label: 'Ada' }],
            });
        });

        it('should require a searchable field config', async () => {
            const missing = await request(app).post('/fields/autocomplete').send({ term: 'Ada' });
            const unconfigured = await request(app).post('/fields/autocomplete').send({ config: { Webservice: 'Crm' }, term: 'Ada' });

            expect(missing.body).toEqual({ success: false, error: 'Field config is required' });
            expect(unconfigured.status).toBe(400);
            expect(unconfigured.body.error).toBe('Field is not configured for webservice search');
        });

        it('should resolve display values through the mapped get invoker', async () => {
            transport.execute.mockResolvedValueOnce(okResponse({ FullName: 'Ada Lovelace' }));

            const res = await request(app)
                .post('/fields/display')
                .send({ config: { Webservice: 'Crm', InvokerGet: 'Get', StoredValue: 'id', DisplayedValues: 'name' }, values: ['7', 3] });

            expect(res.body).toEqual({ success: true, data: { '7': 'Ada Lovelace' } });
            expect(transport.execute.mock.calls[0][1].data).toEqual({ id: '7', CustomerID: '7' });
        });
    });
});
