import { randomUUID } from 'crypto';
import { createModuleLogger, Logger } from '../lib/logger';
import { AppointmentFilter, SchedulingOp, SchedulingRepository } from '../repositories/schedulingRepository';
import { Appointment, AppointmentProduct, AppointmentStatus, Establishment, PaymentMethod, PaymentType, UserDebt } from '../types';
import { assertTransition, initialStatus } from '../utils/appointmentStateMachine';
import { validateSlot } from '../utils/availability';
import { ForbiddenError, NotFoundError, ValidationError } from '../utils/errors';
import { percentOf, sumMoney } from '../utils/money';
import { addMinutes, formatTime12, minutesBetween, parseInstant, timeOfDay } from '../utils/timeUtils';
import { notifySafely, NotificationService } from './notificationService';
import { PaymentService } from './paymentService';
import { SettlementService } from './settlementService';

// Longest bookable service; bounds the lookback when loading a staff member's appointments.
export const MAX_APPOINTMENT_MINUTES = 24 * 60;

export interface ProductLine {
    product_id: string;
    quantity: number;
}

export interface CreateAppointmentInput {
    establishment_id: string;
    staff_id: string;
    service_id: string;
    bundle_id?: string | null;
    scheduled_at: string;
    payment_method?: PaymentMethod;
    payment_type?: PaymentType;
    /** Retail products sold with the service; added to total_price. */
    products?: ProductLine[];
}

type PricedLine = Omit<AppointmentProduct, 'id' | 'appointment_id'>;

export interface EstablishmentAppointmentFilter {
    date?: string;
    staffId?: string;
    status?: AppointmentStatus;
}

export interface SchedulingOptions {
    lateCancellationWindowMinutes: number;
}

export interface SchedulingDeps {
    repository: SchedulingRepository;
    payments: PaymentService;
    settlement: SettlementService;
    notifications: NotificationService;
    options: SchedulingOptions;
    clock?: () => Date;
    log?: Logger;
}

/**
 * Owns the transactional boundary for appointments: every operation reads
 * what it needs, builds one batch of ops and commits it. Notifications go
 * out only after the batch is stored.
 */
export class SchedulingService {
    private readonly repository: SchedulingRepository;
    private readonly payments: PaymentService;
    private readonly settlement: SettlementService;
    private readonly notifications: NotificationService;
    private readonly options: SchedulingOptions;
    private readonly clock: () => Date;
    private readonly log: Logger;

    constructor(deps: SchedulingDeps) {
        this.repository = deps.repository;
        this.payments = deps.payments;
        this.settlement = deps.settlement;
        this.notifications = deps.notifications;
        this.options = deps.options;
        this.clock = deps.clock ?? (() => new Date());
        this.log = deps.log ?? createModuleLogger('appointments');
    }

    async createAppointment(userId: string, input: CreateAppointmentInput): Promise<Appointment> {
        const [establishment, staff, service] = await Promise.all([
            this.repository.getEstablishment(input.establishment_id),
            this.repository.getStaffMember(input.staff_id),
            this.repository.getService(input.service_id),
        ]);
        if (!establishment) throw new NotFoundError('Establishment', input.establishment_id);
        if (!staff) throw new NotFoundError('Staff member', input.staff_id);
        if (!service) throw new NotFoundError('Service', input.service_id);

        const start = parseInstant(input.scheduled_at);
        const end = addMinutes(start, service.duration_minutes);
        const [blocks, existingAppointments] = await Promise.all([
            this.repository.listStaffBlocks(staff.id, start, end),
            this.repository.listStaffAppointments(staff.id, addMinutes(start, -MAX_APPOINTMENT_MINUTES), end),
        ]);

        const decision = validateSlot({ establishment, staff, service, scheduledAt: start, blocks, existingAppointments });
        if (!decision.ok) {
            this.log.info({ userId, staffId: staff.id, code: decision.code }, 'Booking rejected');
            throw new ValidationError(decision.code, decision.message);
        }

        const lines = await this.priceProducts(establishment.id, input.products ?? []);
        const paymentMethod = input.payment_method ?? 'card';
        const appointment: Appointment = {
            id: randomUUID(),
            user_id: userId,
            establishment_id: establishment.id,
            staff_id: staff.id,
            service_id: service.id,
            bundle_id: input.bundle_id ?? null,
            scheduled_at: decision.start.toISOString(),
            duration_minutes: service.duration_minutes,
            status: initialStatus(service, establishment),
            payment_type: input.payment_type ?? 'single',
            payment_method: paymentMethod,
            total_price: sumMoney([service.price, ...lines.map((l) => l.unit_price * l.quantity)]),
            cancel_reason: null,
            created_at: this.clock().toISOString(),
        };

        const ops: SchedulingOp[] = [{ kind: 'insert_appointment', appointment }];
        if (lines.length > 0) {
            ops.push({
                kind: 'insert_appointment_products',
                items: lines.map((line) => ({ id: randomUUID(), appointment_id: appointment.id, ...line })),
            });
        }
        if (paymentMethod === 'wallet') {
            // Paid in full up front, so no deposit stage.
            appointment.status = 'confirmed';
            const debts = await this.repository.listPendingDebts(userId, establishment.id);
            const settlement = await this.payments.buildWalletSettlement(appointment, establishment, debts);
            ops.push(...settlement.ops);
        }

        await this.repository.commit(ops);
        this.log.info({ appointmentId: appointment.id, userId, status: appointment.status }, 'Appointment created');

        await notifySafely(
            this.notifications,
            this.log,
            userId,
            'Appointment booked',
            `${service.name} on ${appointment.scheduled_at.slice(0, 10)} at ${formatTime12(timeOfDay(decision.start))} UTC`,
            'appointment',
            { appointment_id: appointment.id },
        );
        return appointment;
    }

    /**
     * Moves an appointment to `status`. Cancellation and no-show route through
     * their own operations so their fees apply; completion runs settlement.
     * Asking for the status the appointment already has changes nothing.
     */
    async updateAppointmentStatus(appointmentId: string, status: AppointmentStatus, actorId?: string): Promise<Appointment> {
        const appointment = await this.requireAppointment(appointmentId);
        const establishment = await this.requireEstablishment(appointment.establishment_id);
        if (actorId) await this.assertCanManage(establishment, actorId);

        if (appointment.status === status) return appointment;

        switch (status) {
            case 'cancelled':
                await this.cancel(appointment, establishment, null);
                return this.requireAppointment(appointmentId);
            case 'no_show':
                return this.noShow(appointment, establishment);
            case 'completed':
                return this.complete(appointment, establishment);
            default:
                assertTransition(appointment.status, status);
                await this.repository.commit([{ kind: 'transition_appointment', appointment_id: appointment.id, from: appointment.status, to: status }]);
                this.log.info({ appointmentId, from: appointment.status, to: status }, 'Appointment status updated');
                await this.notifyStatus(appointment, status);
                return { ...appointment, status };
        }
    }

    async cancelAppointment(appointmentId: string, userId: string, reason: string | null = null): Promise<boolean> {
        const appointment = await this.requireAppointment(appointmentId);
        if (appointment.status === 'cancelled') return true;

        const establishment = await this.requireEstablishment(appointment.establishment_id);
        if (appointment.user_id !== userId && establishment.owner_id !== userId) {
            throw new ForbiddenError('Only the customer or the establishment owner can cancel this appointment');
        }
        await this.cancel(appointment, establishment, reason);
        return true;
    }

    async markNoShow(appointmentId: string, actorId?: string): Promise<Appointment> {
        const appointment = await this.requireAppointment(appointmentId);
        const establishment = await this.requireEstablishment(appointment.establishment_id);
        if (actorId) await this.assertCanManage(establishment, actorId);
        if (appointment.status === 'no_show') return appointment;
        return this.noShow(appointment, establishment);
    }

    async listByUser(userId: string, status?: AppointmentStatus): Promise<Appointment[]> {
        const filter: AppointmentFilter = { user_id: userId };
        if (status) filter.status = status;
        return this.repository.listAppointments(filter);
    }

    async listByEstablishment(establishmentId: string, filter: EstablishmentAppointmentFilter = {}, actorId?: string): Promise<Appointment[]> {
        if (actorId) await this.assertCanManage(await this.requireEstablishment(establishmentId), actorId);
        const query: AppointmentFilter = { establishment_id: establishmentId };
        if (filter.date) query.date = filter.date;
        if (filter.staffId) query.staff_id = filter.staffId;
        if (filter.status) query.status = filter.status;
        return this.repository.listAppointments(query);
    }

    private async complete(appointment: Appointment, establishment: Establishment): Promise<Appointment> {
        assertTransition(appointment.status, 'completed');
        const settlementOps = await this.settlement.prepare(appointment, establishment, this.clock());

        // The guard on the prior status makes a concurrent second completion fail as a whole.
        await this.repository.commit([
            { kind: 'transition_appointment', appointment_id: appointment.id, from: appointment.status, to: 'completed' },
            ...settlementOps,
        ]);
        this.log.info({ appointmentId: appointment.id, ops: settlementOps.length }, 'Appointment completed and settled');

        await this.notifyStatus(appointment, 'completed');
        return { ...appointment, status: 'completed' };
    }

    private async cancel(appointment: Appointment, establishment: Establishment, reason: string | null): Promise<void> {
        assertTransition(appointment.status, 'cancelled');

        const ops: SchedulingOp[] = [
            { kind: 'transition_appointment', appointment_id: appointment.id, from: appointment.status, to: 'cancelled', cancel_reason: reason },
        ];

        const now = this.clock();
        const scheduledAt = parseInstant(appointment.scheduled_at);
        const isLate = now < scheduledAt && minutesBetween(now, scheduledAt) < this.options.lateCancellationWindowMinutes;
        if (isLate && establishment.cancellation_fee_fixed > 0) {
            ops.push({ kind: 'insert_debt', debt: this.debtFor(appointment, establishment.cancellation_fee_fixed, now) });
        }

        await this.repository.commit(ops);
        this.log.info({ appointmentId: appointment.id, lateFee: ops.length > 1 }, 'Appointment cancelled');
        await this.notifyStatus(appointment, 'cancelled');
    }

    private async noShow(appointment: Appointment, establishment: Establishment): Promise<Appointment> {
        assertTransition(appointment.status, 'no_show');

        const ops: SchedulingOp[] = [{ kind: 'transition_appointment', appointment_id: appointment.id, from: appointment.status, to: 'no_show' }];
        const fee = percentOf(appointment.total_price, establishment.no_show_fee_percent);
        if (fee > 0) {
            ops.push({ kind: 'insert_debt', debt: this.debtFor(appointment, fee, this.clock()) });
        }

        await this.repository.commit(ops);
        this.log.info({ appointmentId: appointment.id, fee }, 'Appointment marked as no-show');
        await this.notifyStatus(appointment, 'no_show');
        return { ...appointment, status: 'no_show' };
    }

    private async priceProducts(establishmentId: string, requested: ProductLine[]): Promise<PricedLine[]> {
        if (requested.length === 0) return [];
        const found = await this.repository.listProducts(establishmentId, [...new Set(requested.map((l) => l.product_id))]);
        const byId = new Map(found.filter((p) => p.active).map((p) => [p.id, p]));

        return requested.map((line) => {
            const product = byId.get(line.product_id);
            if (!product) throw new NotFoundError('Product', line.product_id);
            if (!Number.isInteger(line.quantity) || line.quantity < 1) {
                throw new ValidationError('INVALID_AMOUNT', `Invalid quantity ${line.quantity} for product ${product.id}`);
            }
            return { product_id: product.id, quantity: line.quantity, unit_price: product.price };
        });
    }

    private debtFor(appointment: Appointment, amount: number, now: Date): UserDebt {
        return {
            id: randomUUID(),
            user_id: appointment.user_id,
            establishment_id: appointment.establishment_id,
            appointment_id: appointment.id,
            amount,
            status: 'pending',
            created_at: now.toISOString(),
        };
    }

    private async notifyStatus(appointment: Appointment, status: AppointmentStatus): Promise<void> {
        const messages: Partial<Record<AppointmentStatus, [string, string]>> = {
            confirmed: ['Appointment confirmed', 'Your appointment is confirmed.'],
            completed: ['Thanks for visiting', 'Your appointment is complete.'],
            cancelled: ['Appointment cancelled', 'Your appointment has been cancelled.'],
            no_show: ['Missed appointment', 'You were marked as a no-show for your appointment.'],
        };
        const message = messages[status];
        if (!message) return;
        await notifySafely(this.notifications, this.log, appointment.user_id, message[0], message[1], 'appointment', {
            appointment_id: appointment.id,
            status,
        });
    }

    /** The owner and active staff of the establishment may run its appointments. */
    private async assertCanManage(establishment: Establishment, actorId: string): Promise<void> {
        if (establishment.owner_id === actorId) return;
        const staff = await this.repository.findStaffByUser(establishment.id, actorId);
        if (!staff?.is_active) {
            throw new ForbiddenError('Only the establishment owner or its staff can manage its appointments');
        }
    }

    private async requireAppointment(id: string): Promise<Appointment> {
        const appointment = await this.repository.getAppointment(id);
        if (!appointment) throw new NotFoundError('Appointment', id);
        return appointment;
    }

    private async requireEstablishment(id: string): Promise<Establishment> {
        const establishment = await this.repository.getEstablishment(id);
        if (!establishment) throw new NotFoundError('Establishment', id);
        return establishment;
    }
}
