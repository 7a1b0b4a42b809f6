import { createApp } from './app';
import { config } from './config/env';
import { buildServices } from './container';
import { logger } from './lib/logger';

const services = buildServices(config);
const app = createApp(services);

const server = app.listen(config.PORT, '0.0.0.0', () => {
    logger.info({ port: config.PORT, storage: services.storage }, `Server is running at http://0.0.0.0:${config.PORT}`);
});

const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
        if (err) {
            logger.error({ err }, 'Error while closing the server');
            process.exit(1);
        }
        process.exit(0);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
