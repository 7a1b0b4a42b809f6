import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { currentUser } from '../middleware/authMiddleware';
import { validateBody } from '../middleware/validate';
import { PaymentService } from '../services/paymentService';
import { WalletService } from '../services/walletService';
import { WebhookVerificationError } from '../utils/errors';

const intentSchema = z.object({
    appointment_id: z.string().min(1),
    provider: z.string().min(1).optional(),
});

const walletPaymentSchema = z.object({ appointment_id: z.string().min(1) });

const SIGNATURE_HEADERS = ['stripe-signature', 'x-webhook-signature'];

export const createPaymentController = (payments: PaymentService, wallet: WalletService) => ({
    createPaymentIntent: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { appointment_id, provider } = validateBody(intentSchema, req.body);
            const data = await payments.createPaymentIntent(currentUser(req).id, appointment_id, provider);
            res.status(201).json({ status: 'success', message: 'Payment intent created', data });
        } catch (error) {
            next(error);
        }
    },

    payWithWallet: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { appointment_id } = validateBody(walletPaymentSchema, req.body);
            const data = await payments.payWithWallet(currentUser(req).id, appointment_id);
            res.status(200).json({ status: 'success', message: 'Appointment paid from wallet', data });
        } catch (error) {
            next(error);
        }
    },

    // Mounted behind express.raw so the signature can be checked against the exact bytes.
    handleWebhook: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const rawBody = Buffer.isBuffer(req.body) ? req.body.toString('utf8') : '';
            let body: unknown;
            try {
                body = rawBody ? JSON.parse(rawBody) : {};
            } catch {
                throw new WebhookVerificationError('Webhook body is not valid JSON');
            }

            const signature = SIGNATURE_HEADERS.map((h) => req.get(h)).find((v) => v !== undefined);
            const outcome = await payments.handleWebhook(req.params.provider, {
                rawBody,
                body,
                ...(signature ? { signature } : {}),
            });
            res.status(200).json({ status: 'success', message: 'Webhook processed', data: outcome });
        } catch (error) {
            next(error);
        }
    },

    getWallet: async (req: Request, res: Response, next: NextFunction) => {
        try {
            const data = await wallet.getWallet(currentUser(req).id);
            res.status(200).json({ status: 'success', message: 'Wallet retrieved successfully', data });
        } catch (error) {
            next(error);
        }
    },
});

export type PaymentController = ReturnType<typeof createPaymentController>;
