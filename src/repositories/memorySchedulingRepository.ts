import { randomUUID } from 'crypto';
import {
    Appointment,
    AppointmentProduct,
    Establishment,
    Payment,
    Product,
    Profile,
    QueueEntry,
    Service,
    StaffBlock,
    StaffGoal,
    StaffMember,
    UserDebt,
    UserWallet,
    WalletTransaction,
} from '../types';
import { ConcurrencyError, InsufficientFundsError, NotFoundError, ValidationError } from '../utils/errors';
import { roundMoney } from '../utils/money';
import { addMinutes, dateKey, intervalsOverlap, isDateWithin, parseInstant } from '../utils/timeUtils';
import { ACTIVE_QUEUE_STATUSES, AppointmentFilter, SchedulingOp, SchedulingRepository } from './schedulingRepository';

export interface MemorySeed {
    establishments: Establishment[];
    staff: StaffMember[];
    services: Service[];
    products: Product[];
    profiles: Profile[];
    blocks: StaffBlock[];
    appointments: Appointment[];
    debts: UserDebt[];
    wallets: UserWallet[];
    goals: StaffGoal[];
    payments: Payment[];
    queue: QueueEntry[];
}

interface MemoryState extends MemorySeed {
    appointmentProducts: AppointmentProduct[];
    transactions: WalletTransaction[];
}

const emptyState = (): MemoryState => ({
    establishments: [],
    staff: [],
    services: [],
    products: [],
    profiles: [],
    blocks: [],
    appointments: [],
    debts: [],
    wallets: [],
    goals: [],
    payments: [],
    queue: [],
    appointmentProducts: [],
    transactions: [],
});

const copy = <T>(value: T): T => structuredClone(value);

const appointmentEnd = (appt: Appointment): Date => addMinutes(parseInstant(appt.scheduled_at), appt.duration_minutes);

/**
 * Process-local repository. Used when Supabase is not configured and by the
 * test suite. `commit` applies a batch to a copy of the state and swaps it in
 * only when every op succeeded, so a failing batch leaves nothing behind.
 */
export class MemorySchedulingRepository implements SchedulingRepository {
    private state: MemoryState;

    constructor(seed: Partial<MemorySeed> = {}) {
        this.state = { ...emptyState(), ...copy(seed) };
    }

    async getEstablishment(id: string) {
        return copy(this.state.establishments.find((e) => e.id === id) ?? null);
    }

    async getStaffMember(id: string) {
        return copy(this.state.staff.find((s) => s.id === id) ?? null);
    }

    async findStaffByUser(establishmentId: string, userId: string) {
        return copy(this.state.staff.find((s) => s.establishment_id === establishmentId && s.user_id === userId) ?? null);
    }

    async getService(id: string) {
        return copy(this.state.services.find((s) => s.id === id) ?? null);
    }

    async getProfile(userId: string) {
        return copy(this.state.profiles.find((p) => p.id === userId) ?? null);
    }

    async listProducts(establishmentId: string, ids: string[]) {
        return copy(this.state.products.filter((p) => p.establishment_id === establishmentId && ids.includes(p.id)));
    }

    async listStaffBlocks(staffId: string, from: Date, to: Date) {
        return copy(
            this.state.blocks.filter(
                (b) => b.staff_id === staffId && intervalsOverlap(from, to, parseInstant(b.start_at), parseInstant(b.end_at)),
            ),
        );
    }

    async listStaffAppointments(staffId: string, from: Date, to: Date) {
        return copy(
            this.state.appointments.filter((a) => {
                if (a.staff_id !== staffId || a.status === 'cancelled') return false;
                const start = parseInstant(a.scheduled_at).getTime();
                return start >= from.getTime() && start < to.getTime();
            }),
        );
    }

    async getAppointment(id: string) {
        return copy(this.state.appointments.find((a) => a.id === id) ?? null);
    }

    async listAppointmentProducts(appointmentId: string) {
        return copy(this.state.appointmentProducts.filter((p) => p.appointment_id === appointmentId));
    }

    async listAppointments(filter: AppointmentFilter) {
        const matches = this.state.appointments.filter(
            (a) =>
                (!filter.user_id || a.user_id === filter.user_id) &&
                (!filter.establishment_id || a.establishment_id === filter.establishment_id) &&
                (!filter.staff_id || a.staff_id === filter.staff_id) &&
                (!filter.status || a.status === filter.status) &&
                (!filter.date || dateKey(parseInstant(a.scheduled_at)) === filter.date),
        );
        return copy(matches.sort((a, b) => parseInstant(a.scheduled_at).getTime() - parseInstant(b.scheduled_at).getTime()));
    }

    async countCompletedAppointments(userId: string, excludeAppointmentId: string) {
        return this.state.appointments.filter(
            (a) => a.user_id === userId && a.status === 'completed' && a.id !== excludeAppointmentId,
        ).length;
    }

    async listCompletedStaffAppointments(staffId: string, startDate: string, endDate: string) {
        return copy(
            this.state.appointments.filter(
                (a) =>
                    a.staff_id === staffId &&
                    a.status === 'completed' &&
                    isDateWithin(parseInstant(a.scheduled_at), startDate, endDate),
            ),
        );
    }

    async listPendingDebts(userId: string, establishmentId: string) {
        return copy(
            this.state.debts.filter(
                (d) => d.user_id === userId && d.establishment_id === establishmentId && d.status === 'pending',
            ),
        );
    }

    async listActiveGoals(staffId: string, at: Date) {
        return copy(this.state.goals.filter((g) => g.staff_id === staffId && isDateWithin(at, g.start_date, g.end_date)));
    }

    async getWallet(userId: string) {
        return copy(this.state.wallets.find((w) => w.user_id === userId) ?? null);
    }

    async listWalletTransactions(userId: string) {
        const wallet = this.state.wallets.find((w) => w.user_id === userId);
        if (!wallet) return [];
        return copy(this.state.transactions.filter((t) => t.wallet_id === wallet.id).reverse());
    }

    async getPayment(id: string) {
        return copy(this.state.payments.find((p) => p.id === id) ?? null);
    }

    async findPaymentByProviderId(providerPaymentId: string) {
        return copy(this.state.payments.find((p) => p.provider_payment_id === providerPaymentId) ?? null);
    }

    async getQueueEntry(id: string) {
        return copy(this.state.queue.find((q) => q.id === id) ?? null);
    }

    async findActiveQueueEntry(establishmentId: string, userId: string) {
        return copy(
            this.state.queue.find(
                (q) => q.establishment_id === establishmentId && q.user_id === userId && ACTIVE_QUEUE_STATUSES.includes(q.status),
            ) ?? null,
        );
    }

    async listActiveQueueEntries(establishmentId: string) {
        return copy(
            this.state.queue
                .filter((q) => q.establishment_id === establishmentId && ACTIVE_QUEUE_STATUSES.includes(q.status))
                .sort((a, b) => a.position - b.position),
        );
    }

    async commit(ops: SchedulingOp[]): Promise<void> {
        const draft = copy(this.state);
        for (const op of ops) {
            applyOp(draft, op);
        }
        this.state = draft;
    }
}

const find = <T extends { id: string }>(rows: T[], id: string, entity: string): T => {
    const row = rows.find((r) => r.id === id);
    if (!row) throw new NotFoundError(entity, id);
    return row;
};

const walletFor = (state: MemoryState, userId: string): UserWallet => {
    let wallet = state.wallets.find((w) => w.user_id === userId);
    if (!wallet) {
        wallet = { id: randomUUID(), user_id: userId, balance: 0 };
        state.wallets.push(wallet);
    }
    return wallet;
};

const applyOp = (state: MemoryState, op: SchedulingOp): void => {
    switch (op.kind) {
        case 'insert_appointment': {
            const incoming = op.appointment;
            const start = parseInstant(incoming.scheduled_at);
            const end = appointmentEnd(incoming);
            const clash = state.appointments.some(
                (a) =>
                    a.staff_id === incoming.staff_id &&
                    a.status !== 'cancelled' &&
                    intervalsOverlap(start, end, parseInstant(a.scheduled_at), appointmentEnd(a)),
            );
            if (clash) {
                throw new ValidationError('TIME_CONFLICT', 'time conflict with another appointment');
            }
            state.appointments.push(incoming);
            return;
        }
        case 'insert_appointment_products':
            state.appointmentProducts.push(...op.items);
            return;
        case 'transition_appointment': {
            const appt = find(state.appointments, op.appointment_id, 'Appointment');
            if (appt.status !== op.from) {
                throw new ConcurrencyError(`Appointment ${appt.id} is ${appt.status}, expected ${op.from}`);
            }
            appt.status = op.to;
            if (op.cancel_reason !== undefined) appt.cancel_reason = op.cancel_reason;
            return;
        }
        case 'insert_debt':
            state.debts.push(op.debt);
            return;
        case 'settle_debts':
            for (const debt of state.debts) {
                if (op.debt_ids.includes(debt.id) && debt.status === 'pending') debt.status = 'paid';
            }
            return;
        case 'adjust_platform_fees': {
            const est = find(state.establishments, op.establishment_id, 'Establishment');
            est.pending_platform_fees = Math.max(roundMoney(est.pending_platform_fees + op.delta), 0);
            return;
        }
        case 'wallet_credit':
        case 'wallet_debit': {
            const wallet = walletFor(state, op.user_id);
            if (op.kind === 'wallet_debit' && wallet.balance < op.amount) {
                throw new InsufficientFundsError(wallet.balance, op.amount);
            }
            const signed = op.kind === 'wallet_debit' ? -op.amount : op.amount;
            wallet.balance = roundMoney(wallet.balance + signed);
            state.transactions.push({
                id: randomUUID(),
                wallet_id: wallet.id,
                type: op.kind === 'wallet_debit' ? 'payment' : op.tx_type,
                amount: op.amount,
                description: op.description,
                reference_id: op.reference_id,
                created_at: new Date().toISOString(),
            });
            return;
        }
        case 'increment_goal': {
            const goal = find(state.goals, op.goal_id, 'StaffGoal');
            goal.current_value = roundMoney(goal.current_value + op.delta);
            return;
        }
        case 'set_goal_value':
            find(state.goals, op.goal_id, 'StaffGoal').current_value = op.value;
            return;
        case 'insert_payment':
            state.payments.push(op.payment);
            return;
        case 'transition_payment': {
            const payment = find(state.payments, op.payment_id, 'Payment');
            if (payment.status !== op.from) {
                throw new ConcurrencyError(`Payment ${payment.id} is ${payment.status}, expected ${op.from}`);
            }
            payment.status = op.to;
            return;
        }
        case 'insert_queue_entry':
            state.queue.push(op.entry);
            return;
        case 'update_queue_entry': {
            const entry = find(state.queue, op.entry_id, 'QueueEntry');
            if (entry.status !== op.from) {
                throw new ConcurrencyError(`Queue entry ${entry.id} is ${entry.status}, expected ${op.from}`);
            }
            Object.assign(entry, op.patch);
            return;
        }
        case 'shift_queue_positions':
            for (const entry of state.queue) {
                if (entry.establishment_id === op.establishment_id && entry.status === 'waiting' && entry.position > op.after_position) {
                    entry.position -= 1;
                }
            }
            return;
    }
};
