import { type Context, Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';

import { type DeduplicateFlashesController } from './deduplicate-flashes.controller.js';
import { type RecordFlashesController } from './record-flashes.controller.js';

const readJsonBody = async (c: Context): Promise<unknown> => {
    try {
        return await c.req.json();
    } catch (error) {
        throw new HTTPException(400, { cause: error, message: 'Request body is not valid JSON' });
    }
};

export const createFlashesRouter = (
    deduplicateFlashesController: DeduplicateFlashesController,
    recordFlashesController: RecordFlashesController,
) => {
    const app = new Hono();

    app.post('/deduplicate', async (c) => {
        const response = await deduplicateFlashesController.deduplicate(await readJsonBody(c));

        return c.json(response);
    });

    app.post('/history', async (c) => {
        const response = await recordFlashesController.record(await readJsonBody(c));

        return c.json(response, 201);
    });

    return app;
};
