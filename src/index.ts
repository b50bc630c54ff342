import { createContainer } from './di/container.js';

const start = async () => {
    const container = createContainer();
    const logger = container.get('Logger');
    const config = container.get('Configuration');
    const database = container.get('Database');
    const server = container.get('Server');
    const worker = container.get('Worker');

    const shutdown = async (signal: string) => {
        logger.info('app:shutdown', { signal });
        try {
            await server.stop();
            await worker.stop();
            await database.disconnect();
            process.exit(0);
        } catch (error) {
            logger.error('app:shutdown:error', { error });
            process.exit(1);
        }
    };

    try {
        logger.info('app:start', { env: config.getInboundConfiguration().env });

        const { host, port } = config.getInboundConfiguration().http;

        await database.connect();
        await worker.initialize();
        await server.start({
            host,
            port,
        });

        process.once('SIGINT', (signal) => void shutdown(signal));
        process.once('SIGTERM', (signal) => void shutdown(signal));

        logger.info('app:ready', { host, port });
    } catch (error) {
        logger.error('app:error', { error });
        process.exit(1);
    }
};

void start();
