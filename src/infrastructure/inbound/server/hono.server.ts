import { serve } from '@hono/node-server';
import { Hono } from 'hono';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Application
import {
    type ServerConfiguration,
    type ServerPort,
} from '../../../application/ports/inbound/server.port.js';

import { createErrorHandlerMiddleware } from './error-handler.middleware.js';
import { type DeduplicateFlashesController } from './flashes/deduplicate-flashes.controller.js';
import { createFlashesRouter } from './flashes/flashes.routes.js';
import { type RecordFlashesController } from './flashes/record-flashes.controller.js';
import { createHealthRouter } from './health/health.routes.js';
import { type HistoryController } from './history/history.controller.js';
import { createHistoryRouter } from './history/history.routes.js';

export class HonoServer implements ServerPort {
    private app: Hono;
    private server: null | ReturnType<typeof serve> = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly deduplicateFlashesController: DeduplicateFlashesController,
        private readonly recordFlashesController: RecordFlashesController,
        private readonly historyController: HistoryController,
    ) {
        this.app = new Hono();
        this.setupGlobalMiddleware();
        this.registerRoutes();
    }

    public async request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response> {
        const body = options?.body;
        const init: RequestInit = {
            body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
            headers: options?.headers,
            method: options?.method,
        };
        return this.app.request(path, init);
    }

    public async start(config: ServerConfiguration): Promise<void> {
        return new Promise((resolve) => {
            this.logger.debug('Starting server', { host: config.host, port: config.port });

            this.server = serve(
                { fetch: this.app.fetch, hostname: config.host, port: config.port },
                (info) => {
                    this.logger.info('Server listening', { host: config.host, port: info.port });
                    resolve();
                },
            );
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;

        this.logger.info('Stopping server');
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        this.server = null;
        this.logger.info('Server stopped');
    }

    private registerRoutes(): void {
        this.app.route('/', createHealthRouter());
        this.app.route(
            '/flashes',
            createFlashesRouter(this.deduplicateFlashesController, this.recordFlashesController),
        );
        this.app.route('/history', createHistoryRouter(this.historyController));
    }

    private setupGlobalMiddleware(): void {
        this.app.onError(createErrorHandlerMiddleware(this.logger));
    }
}
