import { Hono } from 'hono';

import { type HistoryController } from './history.controller.js';

export const createHistoryRouter = (historyController: HistoryController) => {
    const app = new Hono();

    app.get('/stats', async (c) => c.json(await historyController.getStats()));

    app.get('/search', async (c) => c.json(await historyController.search(c.req.query())));

    app.get('/by-date', async (c) => c.json(await historyController.getByDate(c.req.query())));

    app.get('/top', async (c) => c.json(await historyController.getTopScored(c.req.query())));

    app.get('/lookup', async (c) => c.json(await historyController.lookup(c.req.query())));

    return app;
};
