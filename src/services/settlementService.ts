import { SchedulingOp, SchedulingRepository } from '../repositories/schedulingRepository';
import { Appointment, Establishment, StaffGoal, StaffMember } from '../types';
import { percentOf } from '../utils/money';
import { isDateWithin, parseInstant } from '../utils/timeUtils';
import { SettingsKeys, SettingsPort } from './settingsService';
import { WalletService } from './walletService';

// Platform fee on cash appointments, by subscription tier (percent of total_price)
export const PLATFORM_FEE_TIERS: Readonly<Record<string, number>> = {
    free: 6,
    trial: 5,
    bronze: 5,
    silver: 4,
    gold: 3,
    platinum: 2,
};
export const DEFAULT_PLATFORM_FEE_PERCENT = 5;

export const platformFeePercent = (tier: string): number => PLATFORM_FEE_TIERS[tier.toLowerCase()] ?? DEFAULT_PLATFORM_FEE_PERCENT;

export interface SettlementSnapshot {
    appointment: Appointment;
    establishment: Establishment;
    staff: StaffMember | null;
    /** Goals whose window contains the completion time. */
    goals: StaffGoal[];
    /** Per customer_count goal: users with other completed appointments in the goal window. */
    goalCustomers: Record<string, string[]>;
    isFirstCompletion: boolean;
    referrerId: string | null;
    cashbackEnabled: boolean;
    cashbackPercent: number;
    referralBonus: number;
}

/**
 * Monetary consequences of completing an appointment. Every step reads the
 * same total_price; the returned ops are committed together with the
 * status change.
 */
export const settle = (snapshot: SettlementSnapshot, wallet: Pick<WalletService, 'creditOp'>): SchedulingOp[] => {
    const { appointment, establishment, staff } = snapshot;
    const total = appointment.total_price;
    const ops: SchedulingOp[] = [];

    if (appointment.payment_method === 'cash') {
        const fee = percentOf(total, platformFeePercent(establishment.subscription_tier));
        if (fee > 0) {
            ops.push({ kind: 'adjust_platform_fees', establishment_id: establishment.id, delta: fee });
        }
    }

    if (snapshot.cashbackEnabled) {
        const cashback = percentOf(total, snapshot.cashbackPercent);
        if (cashback > 0) {
            ops.push(wallet.creditOp(appointment.user_id, cashback, 'cashback', `Cashback for appointment ${appointment.id}`, appointment.id));
        }
    }

    if (staff?.user_id && staff.commission_rate && staff.commission_rate > 0) {
        const commission = percentOf(total, staff.commission_rate);
        if (commission > 0) {
            ops.push(wallet.creditOp(staff.user_id, commission, 'commission', `Service commission: ${appointment.id}`, appointment.id));
        }
    }

    const scheduledAt = parseInstant(appointment.scheduled_at);
    for (const goal of snapshot.goals) {
        switch (goal.goal_type) {
            case 'revenue':
                ops.push({ kind: 'increment_goal', goal_id: goal.id, delta: total });
                break;
            case 'services_count':
                ops.push({ kind: 'increment_goal', goal_id: goal.id, delta: 1 });
                break;
            case 'customer_count': {
                // recomputed from distinct customers, never incremented
                const customers = new Set(snapshot.goalCustomers[goal.id] ?? []);
                if (isDateWithin(scheduledAt, goal.start_date, goal.end_date)) customers.add(appointment.user_id);
                ops.push({ kind: 'set_goal_value', goal_id: goal.id, value: customers.size });
                break;
            }
        }
    }

    if (snapshot.isFirstCompletion && snapshot.referrerId && snapshot.referralBonus > 0) {
        ops.push(
            wallet.creditOp(snapshot.referrerId, snapshot.referralBonus, 'referral', `Referral bonus: first visit of ${appointment.user_id}`, appointment.id),
        );
    }

    return ops;
};

export interface SettlementDefaults {
    cashbackPercent: number;
    referralBonus: number;
}

export class SettlementService {
    constructor(
        private readonly repository: SchedulingRepository,
        private readonly settings: SettingsPort,
        private readonly wallet: WalletService,
        private readonly defaults: SettlementDefaults,
    ) {}

    async snapshot(appointment: Appointment, establishment: Establishment, now: Date): Promise<SettlementSnapshot> {
        const [staff, goals, completedBefore, profile, cashbackEnabled, cashbackPercent, referralBonus] = await Promise.all([
            this.repository.getStaffMember(appointment.staff_id),
            this.repository.listActiveGoals(appointment.staff_id, now),
            this.repository.countCompletedAppointments(appointment.user_id, appointment.id),
            this.repository.getProfile(appointment.user_id),
            this.settings.getBool(SettingsKeys.CASHBACK_ENABLED, false),
            this.settings.getFloat(SettingsKeys.CASHBACK_PERCENT, this.defaults.cashbackPercent),
            this.settings.getFloat(SettingsKeys.REFERRAL_BONUS_AMOUNT, this.defaults.referralBonus),
        ]);

        const goalCustomers: Record<string, string[]> = {};
        for (const goal of goals.filter((g) => g.goal_type === 'customer_count')) {
            const completed = await this.repository.listCompletedStaffAppointments(goal.staff_id, goal.start_date, goal.end_date);
            goalCustomers[goal.id] = completed.filter((a) => a.id !== appointment.id).map((a) => a.user_id);
        }

        return {
            appointment,
            establishment,
            staff,
            goals,
            goalCustomers,
            isFirstCompletion: completedBefore === 0,
            referrerId: profile?.referred_by_id ?? null,
            cashbackEnabled,
            cashbackPercent,
            referralBonus,
        };
    }

    async prepare(appointment: Appointment, establishment: Establishment, now: Date): Promise<SchedulingOp[]> {
        return settle(await this.snapshot(appointment, establishment, now), this.wallet);
    }
}
