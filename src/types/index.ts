import { z } from 'zod';

// Rows mirror the database columns (snake_case). Timestamps are ISO strings.

const money = z.coerce.number();
const timestamp = z.string();

export const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export const dayHoursSchema = z.union([
    z.object({ open: z.string(), close: z.string() }),
    z.object({ closed: z.literal(true) }),
]);
export type DayHours = z.infer<typeof dayHoursSchema>;

// Keyed by 3-letter weekday code; a missing key means closed.
export const weeklyHoursSchema = z.record(z.string(), dayHoursSchema.nullable());
export type WeeklyHours = z.infer<typeof weeklyHoursSchema>;

export const establishmentSchema = z.object({
    id: z.string(),
    owner_id: z.string(),
    name: z.string(),
    business_hours: weeklyHoursSchema,
    subscription_tier: z.string(),
    cancellation_fee_fixed: money,
    no_show_fee_percent: money,
    deposit_percent: money,
    pending_platform_fees: money,
});
export type Establishment = z.infer<typeof establishmentSchema>;

export const staffMemberSchema = z.object({
    id: z.string(),
    establishment_id: z.string(),
    user_id: z.string().nullable(),
    name: z.string(),
    work_schedule: weeklyHoursSchema.nullable(),
    commission_rate: money.nullable(),
    is_active: z.boolean(),
});
export type StaffMember = z.infer<typeof staffMemberSchema>;

export const staffBlockSchema = z.object({
    id: z.string(),
    staff_id: z.string(),
    start_at: timestamp,
    end_at: timestamp,
    reason: z.string().nullable(),
});
export type StaffBlock = z.infer<typeof staffBlockSchema>;

export const serviceSchema = z.object({
    id: z.string(),
    establishment_id: z.string(),
    name: z.string(),
    price: money,
    duration_minutes: z.coerce.number().int(),
    deposit_required: z.boolean(),
});
export type Service = z.infer<typeof serviceSchema>;

// Retail items sold alongside a service (gel, shampoo).
export const productSchema = z.object({
    id: z.string(),
    establishment_id: z.string(),
    name: z.string(),
    price: money,
    active: z.boolean(),
});
export type Product = z.infer<typeof productSchema>;

export const APPOINTMENT_STATUSES = ['pending', 'awaiting_deposit', 'confirmed', 'completed', 'cancelled', 'no_show'] as const;
export const appointmentStatusSchema = z.enum(APPOINTMENT_STATUSES);
export type AppointmentStatus = z.infer<typeof appointmentStatusSchema>;

export const paymentMethodSchema = z.enum(['card', 'cash', 'wallet']);
export type PaymentMethod = z.infer<typeof paymentMethodSchema>;

export const paymentTypeSchema = z.enum(['single', 'subscription']);
export type PaymentType = z.infer<typeof paymentTypeSchema>;

export const appointmentSchema = z.object({
    id: z.string(),
    user_id: z.string(),
    establishment_id: z.string(),
    staff_id: z.string(),
    service_id: z.string(),
    /** Set when the booked service was sold as part of a bundle. */
    bundle_id: z.string().nullable(),
    scheduled_at: timestamp,
    duration_minutes: z.coerce.number().int(),
    status: appointmentStatusSchema,
    payment_type: paymentTypeSchema,
    payment_method: paymentMethodSchema,
    total_price: money,
    cancel_reason: z.string().nullable(),
    created_at: timestamp,
});
export type Appointment = z.infer<typeof appointmentSchema>;

// Line item; unit_price is the product price at booking time.
export const appointmentProductSchema = z.object({
    id: z.string(),
    appointment_id: z.string(),
    product_id: z.string(),
    quantity: z.coerce.number().int(),
    unit_price: money,
});
export type AppointmentProduct = z.infer<typeof appointmentProductSchema>;

export const debtStatusSchema = z.enum(['pending', 'paid', 'cancelled']);
export type DebtStatus = z.infer<typeof debtStatusSchema>;

export const userDebtSchema = z.object({
    id: z.string(),
    user_id: z.string(),
    establishment_id: z.string(),
    appointment_id: z.string().nullable(),
    amount: money,
    status: debtStatusSchema,
    created_at: timestamp,
});
export type UserDebt = z.infer<typeof userDebtSchema>;

export const userWalletSchema = z.object({
    id: z.string(),
    user_id: z.string(),
    balance: money,
});
export type UserWallet = z.infer<typeof userWalletSchema>;

export const transactionTypeSchema = z.enum(['deposit', 'payment', 'refund', 'cashback', 'fee', 'commission', 'referral']);
export type TransactionType = z.infer<typeof transactionTypeSchema>;

export const walletTransactionSchema = z.object({
    id: z.string(),
    wallet_id: z.string(),
    type: transactionTypeSchema,
    amount: money,
    description: z.string(),
    reference_id: z.string().nullable(),
    created_at: timestamp,
});
export type WalletTransaction = z.infer<typeof walletTransactionSchema>;

export const queueStatusSchema = z.enum(['waiting', 'called', 'serving', 'completed', 'left']);
export type QueueStatus = z.infer<typeof queueStatusSchema>;

export const queueEntrySchema = z.object({
    id: z.string(),
    establishment_id: z.string(),
    user_id: z.string(),
    service_id: z.string().nullable(),
    preferred_staff_id: z.string().nullable(),
    assigned_staff_id: z.string().nullable(),
    position: z.coerce.number().int(),
    status: queueStatusSchema,
    entered_at: timestamp,
    called_at: timestamp.nullable(),
    started_at: timestamp.nullable(),
    completed_at: timestamp.nullable(),
});
export type QueueEntry = z.infer<typeof queueEntrySchema>;

export const goalTypeSchema = z.enum(['revenue', 'services_count', 'customer_count']);
export type GoalType = z.infer<typeof goalTypeSchema>;

export const staffGoalSchema = z.object({
    id: z.string(),
    staff_id: z.string(),
    establishment_id: z.string(),
    goal_type: goalTypeSchema,
    start_date: timestamp,
    end_date: timestamp,
    target_value: money,
    current_value: money,
});
export type StaffGoal = z.infer<typeof staffGoalSchema>;

export const profileSchema = z.object({
    id: z.string(),
    full_name: z.string().nullable(),
    referred_by_id: z.string().nullable(),
});
export type Profile = z.infer<typeof profileSchema>;

export const paymentStatusSchema = z.enum(['pending', 'succeeded', 'failed']);
export type PaymentStatus = z.infer<typeof paymentStatusSchema>;

export const paymentMetadataSchema = z.record(z.string(), z.string());
export type PaymentMetadata = z.infer<typeof paymentMetadataSchema>;

export const paymentSchema = z.object({
    id: z.string(),
    user_id: z.string(),
    establishment_id: z.string(),
    appointment_id: z.string().nullable(),
    amount: money,
    platform_fee: money,
    gateway_fee: money,
    net_amount: money,
    status: paymentStatusSchema,
    provider: z.string(),
    provider_payment_id: z.string().nullable(),
    metadata: paymentMetadataSchema,
    created_at: timestamp,
});
export type Payment = z.infer<typeof paymentSchema>;
