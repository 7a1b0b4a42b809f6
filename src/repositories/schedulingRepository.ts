import {
    Appointment,
    AppointmentProduct,
    AppointmentStatus,
    Establishment,
    Payment,
    PaymentStatus,
    Product,
    Profile,
    QueueEntry,
    QueueStatus,
    Service,
    StaffBlock,
    StaffGoal,
    StaffMember,
    TransactionType,
    UserDebt,
    UserWallet,
    WalletTransaction,
} from '../types';

export type QueueEntryPatch = Partial<
    Pick<QueueEntry, 'status' | 'position' | 'assigned_staff_id' | 'called_at' | 'started_at' | 'completed_at'>
>;

/**
 * One write in a batch. Batches are applied by `commit` in a single
 * transaction: increments are relative, and every `from` field is a
 * compare-and-set guard that aborts the whole batch when it no longer holds.
 */
export type SchedulingOp =
    | { kind: 'insert_appointment'; appointment: Appointment }
    | { kind: 'insert_appointment_products'; items: AppointmentProduct[] }
    | { kind: 'transition_appointment'; appointment_id: string; from: AppointmentStatus; to: AppointmentStatus; cancel_reason?: string | null }
    | { kind: 'insert_debt'; debt: UserDebt }
    | { kind: 'settle_debts'; debt_ids: string[] }
    | { kind: 'adjust_platform_fees'; establishment_id: string; delta: number }
    | { kind: 'wallet_credit'; user_id: string; amount: number; tx_type: TransactionType; description: string; reference_id: string | null }
    | { kind: 'wallet_debit'; user_id: string; amount: number; description: string; reference_id: string | null }
    | { kind: 'increment_goal'; goal_id: string; delta: number }
    | { kind: 'set_goal_value'; goal_id: string; value: number }
    | { kind: 'insert_payment'; payment: Payment }
    | { kind: 'transition_payment'; payment_id: string; from: PaymentStatus; to: PaymentStatus }
    | { kind: 'insert_queue_entry'; entry: QueueEntry }
    | { kind: 'update_queue_entry'; entry_id: string; from: QueueStatus; patch: QueueEntryPatch }
    /** Moves every waiting entry behind `after_position` up one place. */
    | { kind: 'shift_queue_positions'; establishment_id: string; after_position: number };

export interface AppointmentFilter {
    user_id?: string;
    establishment_id?: string;
    staff_id?: string;
    status?: AppointmentStatus;
    /** YYYY-MM-DD, matched against scheduled_at in UTC */
    date?: string;
}

export interface SchedulingRepository {
    getEstablishment(id: string): Promise<Establishment | null>;
    getStaffMember(id: string): Promise<StaffMember | null>;
    /** The staff record linking a user account to the establishment, if any. */
    findStaffByUser(establishmentId: string, userId: string): Promise<StaffMember | null>;
    getService(id: string): Promise<Service | null>;
    getProfile(userId: string): Promise<Profile | null>;
    /** Products of the establishment among `ids`; unknown ids are left out. */
    listProducts(establishmentId: string, ids: string[]): Promise<Product[]>;

    /** Blocks of the staff member that intersect [from, to). */
    listStaffBlocks(staffId: string, from: Date, to: Date): Promise<StaffBlock[]>;
    /** Non-cancelled appointments of the staff member with scheduled_at in [from, to). */
    listStaffAppointments(staffId: string, from: Date, to: Date): Promise<Appointment[]>;

    getAppointment(id: string): Promise<Appointment | null>;
    listAppointmentProducts(appointmentId: string): Promise<AppointmentProduct[]>;
    listAppointments(filter: AppointmentFilter): Promise<Appointment[]>;
    countCompletedAppointments(userId: string, excludeAppointmentId: string): Promise<number>;
    /** Completed appointments of the staff member scheduled inside the inclusive date window. */
    listCompletedStaffAppointments(staffId: string, startDate: string, endDate: string): Promise<Appointment[]>;

    listPendingDebts(userId: string, establishmentId: string): Promise<UserDebt[]>;
    /** Goals of the staff member whose [start_date, end_date] contains the given day. */
    listActiveGoals(staffId: string, at: Date): Promise<StaffGoal[]>;

    getWallet(userId: string): Promise<UserWallet | null>;
    listWalletTransactions(userId: string): Promise<WalletTransaction[]>;

    getPayment(id: string): Promise<Payment | null>;
    findPaymentByProviderId(providerPaymentId: string): Promise<Payment | null>;

    getQueueEntry(id: string): Promise<QueueEntry | null>;
    findActiveQueueEntry(establishmentId: string, userId: string): Promise<QueueEntry | null>;
    /** waiting, called and serving entries ordered by position */
    listActiveQueueEntries(establishmentId: string): Promise<QueueEntry[]>;

    commit(ops: SchedulingOp[]): Promise<void>;
}

export const ACTIVE_QUEUE_STATUSES: readonly QueueStatus[] = ['waiting', 'called', 'serving'];
