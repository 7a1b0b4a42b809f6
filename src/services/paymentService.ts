import { randomUUID } from 'crypto';
import { createModuleLogger, Logger } from '../lib/logger';
import { SchedulingOp, SchedulingRepository } from '../repositories/schedulingRepository';
import { Appointment, Establishment, Payment, PaymentMetadata, Service, UserDebt } from '../types';
import { PAYABLE_STATUSES } from '../utils/appointmentStateMachine';
import { ExternalServiceError, ForbiddenError, NotFoundError, StateError, ValidationError } from '../utils/errors';
import { percentOf, roundMoney, sumMoney } from '../utils/money';
import { notifySafely, NotificationService } from './notificationService';
import { NormalizedWebhook, PaymentProvider, WebhookPayload } from './paymentProviders/paymentProvider';
import { WalletService } from './walletService';

export interface PaymentOptions {
    platformFeePercent: number;
    gatewayFeePercent: number;
    /** Used when a service demands a deposit but the establishment has no percentage set. */
    fallbackDepositPercent: number;
    providerTimeoutMs: number;
    defaultProvider: string;
}

export interface ChargeBreakdown {
    own_charge: number;
    debt_total: number;
    amount: number;
    debts: UserDebt[];
    is_deposit: boolean;
}

export interface PaymentIntentResult {
    payment_id: string;
    amount: number;
    provider: string;
    provider_payment_id: string;
    client_secret?: string;
}

export type WebhookOutcome =
    | { handled: false; reason: 'ignored_event' | 'unknown_payment' | 'provider_mismatch' }
    | { handled: true; duplicate: boolean; payment_id: string; status: Payment['status'] };

/**
 * Amount owed for an appointment: its own charge (the deposit share when a
 * deposit is awaited, otherwise the full price) plus every pending debt the
 * user has at the same establishment.
 */
export const computeCharge = (
    appointment: Appointment,
    establishment: Establishment,
    service: Service | null,
    debts: UserDebt[],
    fallbackDepositPercent: number,
    { depositAllowed = true }: { depositAllowed?: boolean } = {},
): ChargeBreakdown => {
    const total = appointment.total_price;
    let ownCharge = total;
    const isDeposit = depositAllowed && appointment.status === 'awaiting_deposit';

    if (isDeposit) {
        let depositPercent = establishment.deposit_percent;
        if (service?.deposit_required && depositPercent === 0) depositPercent = fallbackDepositPercent;
        const deposit = percentOf(total, depositPercent);
        ownCharge = deposit > 0 ? deposit : total;
    }

    const debtTotal = sumMoney(debts.map((d) => d.amount));
    return { own_charge: ownCharge, debt_total: debtTotal, amount: roundMoney(ownCharge + debtTotal), debts, is_deposit: isDeposit };
};

const withTimeout = async <T>(work: Promise<T>, ms: number, service: string): Promise<T> => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ExternalServiceError(service, `timed out after ${ms}ms`)), ms);
    });
    try {
        return await Promise.race([work, timeout]);
    } catch (err) {
        if (err instanceof ExternalServiceError) throw err;
        throw new ExternalServiceError(service, err instanceof Error ? err.message : 'request failed', err);
    } finally {
        clearTimeout(timer);
    }
};

export class PaymentService {
    private readonly providers = new Map<string, PaymentProvider>();

    constructor(
        private readonly repository: SchedulingRepository,
        private readonly wallet: WalletService,
        private readonly notifications: NotificationService,
        providers: PaymentProvider[],
        private readonly options: PaymentOptions,
        private readonly log: Logger = createModuleLogger('payments'),
    ) {
        for (const provider of providers) this.providers.set(provider.name, provider);
    }

    getProvider(name: string): PaymentProvider {
        const provider = this.providers.get(name);
        if (!provider) throw new NotFoundError('Payment provider', name);
        return provider;
    }

    /**
     * Creates a provider intent covering the appointment charge and any pending
     * debts. Accrued cash fees of the establishment are withheld from its net
     * share of this payment, never added to what the customer pays.
     */
    async createPaymentIntent(userId: string, appointmentId: string, providerName = this.options.defaultProvider): Promise<PaymentIntentResult> {
        const { appointment, establishment, service } = await this.loadPayable(userId, appointmentId);
        const provider = this.getProvider(providerName);

        const debts = await this.repository.listPendingDebts(userId, appointment.establishment_id);
        const charge = computeCharge(appointment, establishment, service, debts, this.options.fallbackDepositPercent);
        if (charge.amount <= 0) {
            throw new ValidationError('INVALID_AMOUNT', 'Nothing to charge for this appointment');
        }

        const recoveredFees = roundMoney(Math.min(Math.max(establishment.pending_platform_fees, 0), charge.amount));
        const metadata: PaymentMetadata = {
            appointment_id: appointment.id,
            user_id: userId,
            establishment_id: appointment.establishment_id,
            debt_ids: debts.map((d) => d.id).join(','),
            is_deposit: String(charge.is_deposit),
            recovered_fees: recoveredFees.toFixed(2),
        };

        const intent = await withTimeout(provider.createIntent(userId, charge.amount, metadata), this.options.providerTimeoutMs, provider.name);

        const payment = this.buildPayment(appointment, charge.amount, recoveredFees, {
            status: 'pending',
            provider: provider.name,
            provider_payment_id: intent.provider_payment_id,
            metadata,
            gatewayFeePercent: this.options.gatewayFeePercent,
        });
        await this.repository.commit([{ kind: 'insert_payment', payment }]);

        this.log.info({ appointmentId, paymentId: payment.id, amount: charge.amount, debts: debts.length }, 'Payment intent created');

        return {
            payment_id: payment.id,
            amount: charge.amount,
            provider: provider.name,
            provider_payment_id: intent.provider_payment_id,
            ...(intent.client_secret ? { client_secret: intent.client_secret } : {}),
        };
    }

    /**
     * Ops for settling an appointment from the wallet: the full price plus
     * pending debts is withdrawn, the debts are cleared and a succeeded payment
     * is recorded. Throws InsufficientFundsError before anything is written.
     */
    async buildWalletSettlement(
        appointment: Appointment,
        establishment: Establishment,
        debts: UserDebt[],
    ): Promise<{ ops: SchedulingOp[]; payment: Payment }> {
        const charge = computeCharge(appointment, establishment, null, debts, this.options.fallbackDepositPercent, { depositAllowed: false });
        const recoveredFees = roundMoney(Math.min(Math.max(establishment.pending_platform_fees, 0), charge.amount));

        const ops: SchedulingOp[] = [
            await this.wallet.debitOp(appointment.user_id, charge.amount, `Payment for appointment ${appointment.id}`, appointment.id),
        ];
        if (debts.length > 0) ops.push({ kind: 'settle_debts', debt_ids: debts.map((d) => d.id) });
        if (recoveredFees > 0) ops.push({ kind: 'adjust_platform_fees', establishment_id: establishment.id, delta: -recoveredFees });

        const payment = this.buildPayment(appointment, charge.amount, recoveredFees, {
            status: 'succeeded',
            provider: 'wallet',
            provider_payment_id: null,
            metadata: { debt_ids: debts.map((d) => d.id).join(','), recovered_fees: recoveredFees.toFixed(2) },
            gatewayFeePercent: 0,
        });
        ops.push({ kind: 'insert_payment', payment });
        return { ops, payment };
    }

    async payWithWallet(userId: string, appointmentId: string): Promise<Payment> {
        const { appointment, establishment } = await this.loadPayable(userId, appointmentId);
        const debts = await this.repository.listPendingDebts(userId, appointment.establishment_id);
        const { ops, payment } = await this.buildWalletSettlement(appointment, establishment, debts);

        await this.repository.commit([
            { kind: 'transition_appointment', appointment_id: appointment.id, from: appointment.status, to: 'confirmed' },
            ...ops,
        ]);

        this.log.info({ appointmentId, amount: payment.amount }, 'Appointment paid from wallet');
        await notifySafely(this.notifications, this.log, userId, 'Payment received', `We received ${payment.amount.toFixed(2)} from your wallet.`, 'payment', {
            appointment_id: appointment.id,
        });
        return payment;
    }

    /**
     * Applies a provider webhook. Safe under redelivery: an already succeeded
     * payment is a no-op, and the payment status write is a compare-and-set so
     * two concurrent deliveries cannot both apply the side effects.
     */
    async handleWebhook(providerName: string, payload: WebhookPayload): Promise<WebhookOutcome> {
        const provider = this.getProvider(providerName);
        const event = await provider.handleWebhook(payload);
        if (!event) return { handled: false, reason: 'ignored_event' };

        const payment = await this.repository.findPaymentByProviderId(event.provider_payment_id);
        if (!payment) {
            this.log.warn({ providerPaymentId: event.provider_payment_id }, 'Webhook for unknown payment');
            return { handled: false, reason: 'unknown_payment' };
        }
        if (payment.provider !== provider.name) {
            // only the provider that issued the intent may settle it
            this.log.warn({ paymentId: payment.id, expected: payment.provider, received: provider.name }, 'Webhook from a different provider');
            return { handled: false, reason: 'provider_mismatch' };
        }

        if (payment.status === 'succeeded' || payment.status === event.status) {
            return { handled: true, duplicate: true, payment_id: payment.id, status: payment.status };
        }

        if (event.status === 'failed') {
            await this.repository.commit([{ kind: 'transition_payment', payment_id: payment.id, from: payment.status, to: 'failed' }]);
            this.log.warn({ paymentId: payment.id }, 'Payment failed at provider');
            return { handled: true, duplicate: false, payment_id: payment.id, status: 'failed' };
        }

        const ops = await this.successOps(payment, event);
        await this.repository.commit(ops);

        this.log.info({ paymentId: payment.id, appointmentId: payment.appointment_id }, 'Payment confirmed');
        await notifySafely(this.notifications, this.log, payment.user_id, 'Payment confirmed', 'Your appointment is confirmed.', 'payment', {
            payment_id: payment.id,
        });
        return { handled: true, duplicate: false, payment_id: payment.id, status: 'succeeded' };
    }

    private async successOps(payment: Payment, event: NormalizedWebhook): Promise<SchedulingOp[]> {
        const ops: SchedulingOp[] = [{ kind: 'transition_payment', payment_id: payment.id, from: payment.status, to: 'succeeded' }];

        if (payment.appointment_id) {
            const appointment = await this.repository.getAppointment(payment.appointment_id);
            if (appointment && PAYABLE_STATUSES.includes(appointment.status)) {
                ops.push({ kind: 'transition_appointment', appointment_id: appointment.id, from: appointment.status, to: 'confirmed' });
            } else if (appointment) {
                this.log.warn({ appointmentId: appointment.id, status: appointment.status }, 'Payment succeeded for an appointment that is no longer payable');
            }
        }

        // The stored metadata is authoritative; the provider echo is only a fallback.
        const metadata = { ...event.metadata, ...payment.metadata };
        const debtIds = (metadata.debt_ids ?? '').split(',').map((id) => id.trim()).filter((id) => id.length > 0);
        if (debtIds.length > 0) ops.push({ kind: 'settle_debts', debt_ids: debtIds });

        // Another payment may have recovered the same fees since this intent was tagged.
        const tagged = Number(metadata.recovered_fees ?? 0);
        if (Number.isFinite(tagged) && tagged > 0) {
            const establishment = await this.repository.getEstablishment(payment.establishment_id);
            const recovered = roundMoney(Math.min(tagged, Math.max(establishment?.pending_platform_fees ?? 0, 0)));
            if (recovered > 0) {
                ops.push({ kind: 'adjust_platform_fees', establishment_id: payment.establishment_id, delta: -recovered });
            }
        }
        return ops;
    }

    private async loadPayable(userId: string, appointmentId: string) {
        const appointment = await this.repository.getAppointment(appointmentId);
        if (!appointment) throw new NotFoundError('Appointment', appointmentId);
        if (appointment.user_id !== userId) throw new ForbiddenError('Appointment belongs to another user');
        if (!PAYABLE_STATUSES.includes(appointment.status)) {
            throw new StateError(`Appointment is ${appointment.status} and cannot be paid`);
        }

        const [establishment, service] = await Promise.all([
            this.repository.getEstablishment(appointment.establishment_id),
            this.repository.getService(appointment.service_id),
        ]);
        if (!establishment) throw new NotFoundError('Establishment', appointment.establishment_id);
        return { appointment, establishment, service };
    }

    private buildPayment(
        appointment: Appointment,
        amount: number,
        recoveredFees: number,
        fields: Pick<Payment, 'status' | 'provider' | 'provider_payment_id' | 'metadata'> & { gatewayFeePercent: number },
    ): Payment {
        const platformFee = roundMoney(percentOf(amount, this.options.platformFeePercent) + recoveredFees);
        const gatewayFee = percentOf(amount, fields.gatewayFeePercent);
        return {
            id: randomUUID(),
            user_id: appointment.user_id,
            establishment_id: appointment.establishment_id,
            appointment_id: appointment.id,
            amount,
            platform_fee: platformFee,
            gateway_fee: gatewayFee,
            net_amount: roundMoney(amount - platformFee - gatewayFee),
            status: fields.status,
            provider: fields.provider,
            provider_payment_id: fields.provider_payment_id,
            metadata: fields.metadata,
            created_at: new Date().toISOString(),
        };
    }
}
