import express, { RequestHandler, Router } from 'express';
import { PaymentController } from '../controllers/paymentController';

// Webhooks need the untouched body, so this router is mounted before express.json().
export const paymentWebhookRoutes = (controller: PaymentController): Router => {
    const router = Router();
    router.post('/webhook/:provider', express.raw({ type: '*/*', limit: '1mb' }), controller.handleWebhook);
    return router;
};

export const paymentRoutes = (controller: PaymentController, requireAuth: RequestHandler): Router => {
    const router = Router();
    router.post('/intent', requireAuth, controller.createPaymentIntent);
    router.post('/wallet', requireAuth, controller.payWithWallet);
    return router;
};

export const walletRoutes = (controller: PaymentController, requireAuth: RequestHandler): Router => {
    const router = Router();
    router.get('/', requireAuth, controller.getWallet);
    return router;
};
