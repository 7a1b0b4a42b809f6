import Stripe from 'stripe';
import { PaymentMetadata } from '../../types';
import { WebhookVerificationError } from '../../utils/errors';
import { NormalizedWebhook, PaymentIntent, PaymentProvider, WebhookPayload } from './paymentProvider';

export interface StripeProviderOptions {
    secretKey: string;
    webhookSecret?: string;
    currency: string;
    timeoutMs: number;
}

export class StripePaymentProvider implements PaymentProvider {
    readonly name = 'stripe';
    private readonly stripe: Stripe;

    constructor(private readonly options: StripeProviderOptions, client?: Stripe) {
        this.stripe = client ?? new Stripe(options.secretKey, { timeout: options.timeoutMs, maxNetworkRetries: 1 });
    }

    async createIntent(userId: string, amount: number, metadata: PaymentMetadata): Promise<PaymentIntent> {
        const intent = await this.stripe.paymentIntents.create({
            amount: Math.round(amount * 100),
            currency: this.options.currency,
            metadata: { ...metadata, user_id: userId },
            automatic_payment_methods: { enabled: true },
        });
        return {
            provider_payment_id: intent.id,
            ...(intent.client_secret ? { client_secret: intent.client_secret } : {}),
        };
    }

    async handleWebhook(payload: WebhookPayload): Promise<NormalizedWebhook | null> {
        if (!this.options.webhookSecret) throw new Error('STRIPE_WEBHOOK_SECRET is not set');
        if (!payload.signature) throw new WebhookVerificationError('Missing Stripe signature header');

        let event: Stripe.Event;
        try {
            event = this.stripe.webhooks.constructEvent(payload.rawBody, payload.signature, this.options.webhookSecret);
        } catch (err) {
            throw new WebhookVerificationError(err instanceof Error ? err.message : 'Invalid Stripe signature');
        }

        switch (event.type) {
            case 'payment_intent.succeeded':
                return this.normalize(event.data.object, 'succeeded');
            case 'payment_intent.payment_failed':
                return this.normalize(event.data.object, 'failed');
            default:
                return null;
        }
    }

    private normalize(intent: Stripe.PaymentIntent, status: NormalizedWebhook['status']): NormalizedWebhook {
        return {
            provider_payment_id: intent.id,
            status,
            amount: intent.amount / 100,
            metadata: { ...intent.metadata },
        };
    }
}
