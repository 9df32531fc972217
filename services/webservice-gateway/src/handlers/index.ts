import { Request, Response } from 'express';
import { componentLogger } from '@generic-interface/service-template';
import { WebserviceFieldService, parseFieldConfigFromMap } from '../fields/WebserviceFieldService';
import { GenericInterfaceService } from '../service/GenericInterfaceService';
import { errorMessage, httpStatusFor, isWebserviceError } from '../errors';
import { isPlainObject, toPayload } from '../payload';
import { TRANSPORT_TYPES, VALID_ID_ACTIVE, WebserviceConfigData } from '../types';
import { parseConfig } from '../validation';

const log = componentLogger('webservice-handlers');

export const DEFAULT_USER_ID = 1;

export interface HandlerDeps {
    service: GenericInterfaceService;
    fieldService: WebserviceFieldService;
}

type Handler = (req: Request, res: Response) => Promise<void>;

const parseId = (raw: string | undefined): number | undefined => {
    if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
    const id = Number(raw);
    return id > 0 ? id : undefined;
};

const userIdFrom = (req: Request): number => parseId(req.header('x-user-id')) ?? DEFAULT_USER_ID;

const bodyOf = (req: Request): Record<string, unknown> => {
    const body: unknown = req.body;
    return isPlainObject(body) ? body : {};
};

const optionalString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const validIdFrom = (value: unknown, fallback: number): number =>
    typeof value === 'number' && Number.isInteger(value) ? value : fallback;

const fail = (res: Response, status: number, error: string): void => {
    res.status(status).json({ success: false, error });
};

const sendError = (res: Response, err: unknown, context: string): void => {
    const status = httpStatusFor(err);
    if (status >= 500) {
        log.error(context, { error: errorMessage(err) });
    }
    res.status(status).json({
        success: false,
        error: errorMessage(err),
        code: isWebserviceError(err) ? err.code : undefined,
    });
};

/** Config stored when a definition is created without one. */
export const defaultWebserviceConfig = (description?: string, remoteSystem?: string): WebserviceConfigData => ({
    Description: description,
    RemoteSystem: remoteSystem,
    Debugger: { DebugThreshold: 'error', TestMode: '0' },
    Requester: { Transport: { Type: TRANSPORT_TYPES.REST } },
});

export const createWebserviceHandlers = ({ service, fieldService }: HandlerDeps) => {
    const handleListWebservices: Handler = async (req, res) => {
        const valid = optionalString(req.query.valid) ?? 'all';
        const search = optionalString(req.query.search)?.toLowerCase() ?? '';
        try {
            const all =
                valid === '1' || valid === 'valid' ? await service.listValidWebservices() : await service.listWebservices();
            const webservices = all.filter(
                (ws) =>
                    (valid !== 'invalid' || ws.ValidID !== VALID_ID_ACTIVE) &&
                    (search === '' ||
                        ws.Name.toLowerCase().includes(search) ||
                        (ws.Config.Description ?? '').toLowerCase().includes(search))
            );
            res.json({ success: true, data: webservices });
        } catch (error) {
            sendError(res, error, 'Error listing webservices');
        }
    };

    const handleGetWebservice: Handler = async (req, res) => {
        const id = parseId(req.params.id);
        if (id === undefined) {
            return fail(res, 400, 'Invalid webservice ID');
        }
        try {
            const ws = await service.getWebserviceById(id);
            if (!ws) {
                return fail(res, 404, 'Webservice not found');
            }
            res.json({ success: true, data: ws });
        } catch (error) {
            sendError(res, error, 'Error fetching webservice');
        }
    };

    const handleCreateWebservice: Handler = async (req, res) => {
        const body = bodyOf(req);
        const name = optionalString(body.name)?.trim() ?? '';
        if (name === '') {
            return fail(res, 400, 'Name is required');
        }

        try {
            if (await service.webserviceExists(name)) {
                return fail(res, 409, 'A webservice with this name already exists');
            }

            const config =
                body.config === undefined || body.config === null
                    ? defaultWebserviceConfig(optionalString(body.description), optionalString(body.remote_system))
                    : parseConfig(body.config);

            const id = await service.createWebservice(
                { Name: name, Config: config, ValidID: validIdFrom(body.valid_id, VALID_ID_ACTIVE) },
                userIdFrom(req)
            );
            res.status(201).json({ success: true, data: { id, name }, message: 'Webservice created successfully' });
        } catch (error) {
            sendError(res, error, 'Error creating webservice');
        }
    };

    const handleUpdateWebservice: Handler = async (req, res) => {
        const id = parseId(req.params.id);
        if (id === undefined) {
            return fail(res, 400, 'Invalid webservice ID');
        }
        const body = bodyOf(req);
        const name = optionalString(body.name)?.trim() ?? '';
        if (name === '') {
            return fail(res, 400, 'Name is required');
        }

        try {
            if (await service.webserviceExistsExcluding(name, id)) {
                return fail(res, 409, 'A webservice with this name already exists');
            }
            const existing = await service.getWebserviceById(id);
            if (!existing) {
                return fail(res, 404, 'Webservice not found');
            }

            const config: WebserviceConfigData =
                body.config === undefined || body.config === null
                    ? {
                          ...existing.Config,
                          Description: optionalString(body.description),
                          RemoteSystem: optionalString(body.remote_system),
                      }
                    : parseConfig(body.config);

            await service.updateWebservice(
                { ID: id, Name: name, Config: config, ValidID: validIdFrom(body.valid_id, existing.ValidID) },
                userIdFrom(req)
            );
            res.json({ success: true, message: 'Webservice updated successfully' });
        } catch (error) {
            sendError(res, error, 'Error updating webservice');
        }
    };

    const handleDeleteWebservice: Handler = async (req, res) => {
        const id = parseId(req.params.id);
        if (id === undefined) {
            return fail(res, 400, 'Invalid webservice ID');
        }
        try {
            await service.deleteWebservice(id);
            res.json({ success: true, message: 'Webservice deleted successfully' });
        } catch (error) {
            sendError(res, error, 'Error deleting webservice');
        }
    };

    const handleTestWebservice: Handler = async (req, res) => {
        const id = parseId(req.params.id);
        if (id === undefined) {
            return fail(res, 400, 'Invalid webservice ID');
        }
        try {
            await service.testConnection(id);
            res.json({ success: true, message: 'Connection test successful' });
        } catch (error) {
            if (isWebserviceError(error) && error.code === 'TRANSPORT_FAILED') {
                res.json({ success: false, error: `Connection test failed: ${error.message}` });
                return;
            }
            sendError(res, error, 'Error testing webservice');
        }
    };

    const handleGetHistory: Handler = async (req, res) => {
        const id = parseId(req.params.id);
        if (id === undefined) {
            return fail(res, 400, 'Invalid webservice ID');
        }
        try {
            const ws = await service.getWebserviceById(id);
            if (!ws) {
                return fail(res, 404, 'Webservice not found');
            }
            const history = await service.getHistory(id);
            res.json({ success: true, data: history });
        } catch (error) {
            sendError(res, error, 'Error fetching webservice history');
        }
    };

    const handleRestoreHistory: Handler = async (req, res) => {
        const id = parseId(req.params.id);
        if (id === undefined) {
            return fail(res, 400, 'Invalid webservice ID');
        }
        const historyId = parseId(req.params.historyId);
        if (historyId === undefined) {
            return fail(res, 400, 'Invalid history ID');
        }
        try {
            const entry = await service.getHistoryEntry(historyId);
            if (!entry || entry.ConfigID !== id) {
                return fail(res, 404, 'History entry not found');
            }
            await service.restoreFromHistory(historyId, userIdFrom(req));
            res.json({ success: true, message: 'Configuration restored successfully' });
        } catch (error) {
            sendError(res, error, 'Error restoring webservice history');
        }
    };

    const handleInvoke: Handler = async (req, res) => {
        const { webservice, invoker } = req.params;
        const body = bodyOf(req);
        if (body.data !== undefined && !isPlainObject(body.data)) {
            return fail(res, 400, 'data must be an object');
        }
        const data = isPlainObject(body.data) ? toPayload(body.data) : {};
        const controller = optionalString(body.controller);
        const method = optionalString(body.method);

        try {
            const response =
                controller !== undefined || method !== undefined
                    ? await service.invokeWithController(webservice, invoker, controller ?? '', method ?? '', data)
                    : await service.invoke(webservice, invoker, data);

            res.json({
                success: response.success,
                data: {
                    status_code: response.statusCode,
                    headers: response.headers,
                    data: response.data ?? null,
                },
                error: response.error,
            });
        } catch (error) {
            sendError(res, error, 'Error invoking webservice');
        }
    };

    const handleAutocomplete: Handler = async (req, res) => {
        const body = bodyOf(req);
        if (!isPlainObject(body.config)) {
            return fail(res, 400, 'Field config is required');
        }
        const config = parseFieldConfigFromMap(body.config);
        if (config.Webservice === '' || config.InvokerSearch === '') {
            return fail(res, 400, 'Field is not configured for webservice search');
        }

        try {
            const results = await fieldService.search(config, optionalString(body.term) ?? '');
            res.json({ success: true, data: results });
        } catch (error) {
            sendError(res, error, 'Error running autocomplete search');
        }
    };

    const handleDisplayValues: Handler = async (req, res) => {
        const body = bodyOf(req);
        if (!isPlainObject(body.config)) {
            return fail(res, 400, 'Field config is required');
        }
        const values = Array.isArray(body.values) ? body.values.filter((v: unknown): v is string => typeof v === 'string') : [];

        try {
            const display = await fieldService.getMultipleDisplayValues(parseFieldConfigFromMap(body.config), values);
            res.json({ success: true, data: display });
        } catch (error) {
            sendError(res, error, 'Error resolving display values');
        }
    };

    return {
        handleListWebservices,
        handleGetWebservice,
        handleCreateWebservice,
        handleUpdateWebservice,
        handleDeleteWebservice,
        handleTestWebservice,
        handleGetHistory,
        handleRestoreHistory,
        handleInvoke,
        handleAutocomplete,
        handleDisplayValues,
    };
};

export type WebserviceHandlers = ReturnType<typeof createWebserviceHandlers>;
