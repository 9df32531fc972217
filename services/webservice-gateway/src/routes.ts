import { Router } from 'express';
import { WebserviceHandlers } from './handlers';

export const createRouter = (handlers: WebserviceHandlers): Router => {
    const router = Router();

    router.get('/webservices', handlers.handleListWebservices);
    router.post('/webservices', handlers.handleCreateWebservice);
    router.get('/webservices/:id', handlers.handleGetWebservice);
    router.put('/webservices/:id', handlers.handleUpdateWebservice);
    router.delete('/webservices/:id', handlers.handleDeleteWebservice);

    router.post('/webservices/:id/test', handlers.handleTestWebservice);
    router.get('/webservices/:id/history', handlers.handleGetHistory);
    router.post('/webservices/:id/history/:historyId/restore', handlers.handleRestoreHistory);

    router.post('/invoke/:webservice/:invoker', handlers.handleInvoke);

    router.post('/fields/autocomplete', handlers.handleAutocomplete);
    router.post('/fields/display', handlers.handleDisplayValues);

    return router;
};
