import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { z, ZodType, ZodTypeDef } from 'zod';
import {
    appointmentProductSchema,
    appointmentSchema,
    establishmentSchema,
    paymentSchema,
    productSchema,
    profileSchema,
    queueEntrySchema,
    serviceSchema,
    staffBlockSchema,
    staffGoalSchema,
    staffMemberSchema,
    userDebtSchema,
    userWalletSchema,
    walletTransactionSchema,
} from '../types';
import { ConcurrencyError, InsufficientFundsError, ValidationError } from '../utils/errors';
import { addMinutes, dateKey, parseInstant } from '../utils/timeUtils';
import { ACTIVE_QUEUE_STATUSES, AppointmentFilter, SchedulingOp, SchedulingRepository } from './schedulingRepository';

// SQLSTATE codes raised by apply_scheduling_ops (see migrations/)
const EXCLUSION_VIOLATION = '23P01';
const STALE_STATE = 'SC409';
const INSUFFICIENT_FUNDS = 'SC402';

const fundsDetailSchema = z.object({ balance: z.coerce.number(), requested: z.coerce.number() });

type RowResult = { data: unknown; error: PostgrestError | null };

type DbError = Pick<PostgrestError, 'code' | 'message' | 'details'>;

const fail = (table: string, error: DbError): Error =>
    new Error(`[supabase] ${table}: ${error.message}${error.details ? ` (${error.details})` : ''}`);

const one = <T>(table: string, schema: ZodType<T, ZodTypeDef, unknown>, { data, error }: RowResult): T | null => {
    if (error) throw fail(table, error);
    return data === null || data === undefined ? null : schema.parse(data);
};

const many = <T>(table: string, schema: ZodType<T, ZodTypeDef, unknown>, { data, error }: RowResult): T[] => {
    if (error) throw fail(table, error);
    return z.array(schema).parse(data ?? []);
};

export const mapCommitError = (error: DbError): Error => {
    switch (error.code) {
        case EXCLUSION_VIOLATION:
            return new ValidationError('TIME_CONFLICT', 'time conflict with another appointment');
        case STALE_STATE:
            return new ConcurrencyError(error.message);
        case INSUFFICIENT_FUNDS: {
            let detail: unknown = null;
            try {
                detail = JSON.parse(error.details ?? 'null');
            } catch {
                detail = null;
            }
            const parsed = fundsDetailSchema.safeParse(detail);
            return parsed.success
                ? new InsufficientFundsError(parsed.data.balance, parsed.data.requested)
                : new InsufficientFundsError(0, 0);
        }
        default:
            return fail('apply_scheduling_ops', error);
    }
};

export class SupabaseSchedulingRepository implements SchedulingRepository {
    constructor(private readonly supabase: SupabaseClient) {}

    async getEstablishment(id: string) {
        return one('establishments', establishmentSchema, await this.supabase.from('establishments').select('*').eq('id', id).maybeSingle());
    }

    async getStaffMember(id: string) {
        return one('staff_members', staffMemberSchema, await this.supabase.from('staff_members').select('*').eq('id', id).maybeSingle());
    }

    async findStaffByUser(establishmentId: string, userId: string) {
        return one(
            'staff_members',
            staffMemberSchema,
            await this.supabase
                .from('staff_members')
                .select('*')
                .eq('establishment_id', establishmentId)
                .eq('user_id', userId)
                .limit(1)
                .maybeSingle(),
        );
    }

    async getService(id: string) {
        return one('services', serviceSchema, await this.supabase.from('services').select('*').eq('id', id).maybeSingle());
    }

    async getProfile(userId: string) {
        return one(
            'profiles',
            profileSchema,
            await this.supabase.from('profiles').select('id, full_name, referred_by_id').eq('id', userId).maybeSingle(),
        );
    }

    async listProducts(establishmentId: string, ids: string[]) {
        if (ids.length === 0) return [];
        return many(
            'products',
            productSchema,
            await this.supabase
                .from('products')
                .select('id, establishment_id, name, price, active')
                .eq('establishment_id', establishmentId)
                .in('id', ids),
        );
    }

    async listStaffBlocks(staffId: string, from: Date, to: Date) {
        return many(
            'staff_blocks',
            staffBlockSchema,
            await this.supabase
                .from('staff_blocks')
                .select('*')
                .eq('staff_id', staffId)
                .lt('start_at', to.toISOString())
                .gt('end_at', from.toISOString()),
        );
    }

    async listStaffAppointments(staffId: string, from: Date, to: Date) {
        return many(
            'appointments',
            appointmentSchema,
            await this.supabase
                .from('appointments')
                .select('*')
                .eq('staff_id', staffId)
                .neq('status', 'cancelled')
                .gte('scheduled_at', from.toISOString())
                .lt('scheduled_at', to.toISOString()),
        );
    }

    async getAppointment(id: string) {
        return one('appointments', appointmentSchema, await this.supabase.from('appointments').select('*').eq('id', id).maybeSingle());
    }

    async listAppointmentProducts(appointmentId: string) {
        return many(
            'appointment_products',
            appointmentProductSchema,
            await this.supabase.from('appointment_products').select('*').eq('appointment_id', appointmentId),
        );
    }

    async listAppointments(filter: AppointmentFilter) {
        let query = this.supabase.from('appointments').select('*');
        if (filter.user_id) query = query.eq('user_id', filter.user_id);
        if (filter.establishment_id) query = query.eq('establishment_id', filter.establishment_id);
        if (filter.staff_id) query = query.eq('staff_id', filter.staff_id);
        if (filter.status) query = query.eq('status', filter.status);
        if (filter.date) {
            const dayStart = parseInstant(`${filter.date}T00:00:00Z`);
            query = query.gte('scheduled_at', dayStart.toISOString()).lt('scheduled_at', addMinutes(dayStart, 24 * 60).toISOString());
        }
        return many('appointments', appointmentSchema, await query.order('scheduled_at', { ascending: true }));
    }

    async countCompletedAppointments(userId: string, excludeAppointmentId: string) {
        const { count, error } = await this.supabase
            .from('appointments')
            .select('id', { count: 'exact', head: true })
            .eq('user_id', userId)
            .eq('status', 'completed')
            .neq('id', excludeAppointmentId);
        if (error) throw fail('appointments', error);
        return count ?? 0;
    }

    async listCompletedStaffAppointments(staffId: string, startDate: string, endDate: string) {
        const from = parseInstant(`${dateKey(parseInstant(startDate))}T00:00:00Z`);
        const to = addMinutes(parseInstant(`${dateKey(parseInstant(endDate))}T00:00:00Z`), 24 * 60);
        return many(
            'appointments',
            appointmentSchema,
            await this.supabase
                .from('appointments')
                .select('*')
                .eq('staff_id', staffId)
                .eq('status', 'completed')
                .gte('scheduled_at', from.toISOString())
                .lt('scheduled_at', to.toISOString()),
        );
    }

    async listPendingDebts(userId: string, establishmentId: string) {
        return many(
            'user_debts',
            userDebtSchema,
            await this.supabase
                .from('user_debts')
                .select('*')
                .eq('user_id', userId)
                .eq('establishment_id', establishmentId)
                .eq('status', 'pending')
                .order('created_at', { ascending: true }),
        );
    }

    async listActiveGoals(staffId: string, at: Date) {
        const day = dateKey(at);
        return many(
            'staff_goals',
            staffGoalSchema,
            await this.supabase.from('staff_goals').select('*').eq('staff_id', staffId).lte('start_date', day).gte('end_date', day),
        );
    }

    async getWallet(userId: string) {
        return one('user_wallets', userWalletSchema, await this.supabase.from('user_wallets').select('*').eq('user_id', userId).maybeSingle());
    }

    async listWalletTransactions(userId: string) {
        const wallet = await this.getWallet(userId);
        if (!wallet) return [];
        return many(
            'wallet_transactions',
            walletTransactionSchema,
            await this.supabase.from('wallet_transactions').select('*').eq('wallet_id', wallet.id).order('created_at', { ascending: false }),
        );
    }

    async getPayment(id: string) {
        return one('payments', paymentSchema, await this.supabase.from('payments').select('*').eq('id', id).maybeSingle());
    }

    async findPaymentByProviderId(providerPaymentId: string) {
        return one(
            'payments',
            paymentSchema,
            await this.supabase.from('payments').select('*').eq('provider_payment_id', providerPaymentId).maybeSingle(),
        );
    }

    async getQueueEntry(id: string) {
        return one('queue_entries', queueEntrySchema, await this.supabase.from('queue_entries').select('*').eq('id', id).maybeSingle());
    }

    async findActiveQueueEntry(establishmentId: string, userId: string) {
        return one(
            'queue_entries',
            queueEntrySchema,
            await this.supabase
                .from('queue_entries')
                .select('*')
                .eq('establishment_id', establishmentId)
                .eq('user_id', userId)
                .in('status', [...ACTIVE_QUEUE_STATUSES])
                .maybeSingle(),
        );
    }

    async listActiveQueueEntries(establishmentId: string) {
        return many(
            'queue_entries',
            queueEntrySchema,
            await this.supabase
                .from('queue_entries')
                .select('*')
                .eq('establishment_id', establishmentId)
                .in('status', [...ACTIVE_QUEUE_STATUSES])
                .order('position', { ascending: true }),
        );
    }

    /**
     * Ships the batch to apply_scheduling_ops, which runs it in one transaction.
     */
    async commit(ops: SchedulingOp[]): Promise<void> {
        if (ops.length === 0) return;
        const { error } = await this.supabase.rpc('apply_scheduling_ops', { ops });
        if (error) throw mapCommitError(error);
    }
}
