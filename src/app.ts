import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createPaymentController } from './controllers/paymentController';
import { AppServices } from './container';
import { logger } from './lib/logger';
import { createRequireAuth } from './middleware/authMiddleware';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createRateLimiter } from './middleware/rateLimiter';
import { apiRouter } from './routes';
import { paymentWebhookRoutes } from './routes/paymentRoutes';

export interface AppOptions {
    /** Exact origins or patterns allowed by CORS; empty allows any origin. */
    allowedOrigins?: (string | RegExp)[];
    rateLimit?: { windowMs: number; maxRequests: number } | false;
    accessLog?: boolean;
}

const DEFAULT_ORIGINS: (string | RegExp)[] = ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000', 'http://127.0.0.1:3001'];

export const createApp = (services: AppServices, options: AppOptions = {}): Express => {
    const app: Express = express();
    const allowedOrigins = options.allowedOrigins ?? DEFAULT_ORIGINS;

    app.use(
        cors({
            origin: (origin, callback) => {
                // Allow requests with no origin (like mobile apps or curl)
                if (!origin || allowedOrigins.length === 0) return callback(null, true);

                const isAllowed = allowedOrigins.some((o) => (typeof o === 'string' ? o === origin : o.test(origin)));
                if (isAllowed) {
                    callback(null, true);
                } else {
                    logger.warn({ origin }, 'CORS rejected origin');
                    callback(null, false);
                }
            },
            credentials: true,
        }),
    );
    app.use(helmet());
    if (options.accessLog !== false) {
        app.use(morgan('combined', { stream: { write: (line: string) => logger.info({ module: 'access' }, line.trim()) } }));
    }
    if (options.rateLimit !== false) {
        app.use('/api', createRateLimiter(options.rateLimit ?? { windowMs: 60_000, maxRequests: 100 }));
    }

    // Before express.json(): signature checks need the raw body.
    app.use('/api/payments', paymentWebhookRoutes(createPaymentController(services.payments, services.wallet)));

    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    app.get('/', (req: Request, res: Response) => {
        res.json({ message: 'Scheduling API is running' });
    });

    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            service: 'scheduling-api',
            storage: services.storage,
        });
    });

    app.use('/api', apiRouter(services, createRequireAuth(services.verifyToken)));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
};
