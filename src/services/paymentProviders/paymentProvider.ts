import { PaymentMetadata } from '../../types';

export interface PaymentIntent {
    provider_payment_id: string;
    client_secret?: string;
}

export interface WebhookPayload {
    /** Raw request body, needed for signature verification. */
    rawBody: string | Buffer;
    signature?: string;
    body: unknown;
}

export interface NormalizedWebhook {
    provider_payment_id: string;
    status: 'succeeded' | 'failed';
    amount: number;
    metadata: PaymentMetadata;
}

export interface PaymentProvider {
    readonly name: string;
    createIntent(userId: string, amount: number, metadata: PaymentMetadata): Promise<PaymentIntent>;
    /** Returns null for events that do not concern a payment outcome. */
    handleWebhook(payload: WebhookPayload): Promise<NormalizedWebhook | null>;
}
