import { RequestHandler, Router } from 'express';
import { createAppointmentController } from '../controllers/appointmentController';
import { createPaymentController } from '../controllers/paymentController';
import { createQueueController } from '../controllers/queueController';
import { createStaffGoalController } from '../controllers/staffGoalController';
import { AppServices } from '../container';
import { appointmentRoutes } from './appointmentRoutes';
import { paymentRoutes, walletRoutes } from './paymentRoutes';
import { queueRoutes } from './queueRoutes';
import { staffRoutes } from './staffRoutes';

export const apiRouter = (services: AppServices, requireAuth: RequestHandler): Router => {
    const router = Router();
    const payments = createPaymentController(services.payments, services.wallet);

    // Add a root route for /api to avoid 404 HTML pages
    router.get('/', (req, res) => {
        res.json({ message: 'Scheduling API is online', version: '1.0.0' });
    });

    router.use('/appointments', appointmentRoutes(createAppointmentController(services.scheduling), requireAuth));
    router.use('/payments', paymentRoutes(payments, requireAuth));
    router.use('/wallet', walletRoutes(payments, requireAuth));
    router.use('/queue', queueRoutes(createQueueController(services.queue), requireAuth));
    router.use('/staff', staffRoutes(createStaffGoalController(services.goals, services.clock), requireAuth));

    return router;
};
