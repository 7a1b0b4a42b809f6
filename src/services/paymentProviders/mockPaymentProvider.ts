import { randomUUID } from 'crypto';
import { z } from 'zod';
import { paymentMetadataSchema, PaymentMetadata } from '../../types';
import { NormalizedWebhook, PaymentIntent, PaymentProvider, WebhookPayload } from './paymentProvider';

const mockEventSchema = z.object({
    provider_payment_id: z.string(),
    status: z.enum(['succeeded', 'failed']),
    amount: z.coerce.number(),
    metadata: paymentMetadataSchema.default({}),
});

// Local/dev provider: intents are fabricated and webhooks carry the normalized shape as-is
export class MockPaymentProvider implements PaymentProvider {
    readonly name = 'mock';

    async createIntent(_userId: string, _amount: number, _metadata: PaymentMetadata): Promise<PaymentIntent> {
        const id = `mock_pi_${randomUUID()}`;
        return { provider_payment_id: id, client_secret: `${id}_secret` };
    }

    async handleWebhook(payload: WebhookPayload): Promise<NormalizedWebhook | null> {
        const parsed = mockEventSchema.safeParse(payload.body);
        return parsed.success ? parsed.data : null;
    }
}
