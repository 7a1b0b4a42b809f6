import { loadConfig } from '../config/env';
import { buildServices, ServiceOverrides } from '../container';
import { localTokenVerifier } from '../middleware/authMiddleware';
import { MemorySchedulingRepository, MemorySeed } from '../repositories/memorySchedulingRepository';
import { NotificationService, NotificationType } from '../services/notificationService';
import { SettingsService, StaticSettingsSource } from '../services/settingsService';
import { Appointment, Establishment, Service, StaffMember, UserWallet, WeeklyHours } from '../types';

// 2030-01-07 is a Monday.
export const MONDAY = '2030-01-07';
export const at = (time: string, day = MONDAY) => `${day}T${time}:00.000Z`;

export const WEEKDAY_HOURS: WeeklyHours = {
    mon: { open: '09:00', close: '18:00' },
    tue: { open: '09:00', close: '18:00' },
    wed: { open: '09:00', close: '18:00' },
    thu: { open: '09:00', close: '18:00' },
    fri: { open: '09:00', close: '18:00' },
    sat: { open: '10:00', close: '14:00' },
};

export const makeEstablishment = (overrides: Partial<Establishment> = {}): Establishment => ({
    id: 'est-1',
    owner_id: 'owner-1',
    name: 'Fade Studio',
    business_hours: WEEKDAY_HOURS,
    subscription_tier: 'trial',
    cancellation_fee_fixed: 0,
    no_show_fee_percent: 0,
    deposit_percent: 0,
    pending_platform_fees: 0,
    ...overrides,
});

export const makeStaff = (overrides: Partial<StaffMember> = {}): StaffMember => ({
    id: 'staff-1',
    establishment_id: 'est-1',
    user_id: 'stylist-user',
    name: 'Sam',
    work_schedule: null,
    commission_rate: null,
    is_active: true,
    ...overrides,
});

export const makeService = (overrides: Partial<Service> = {}): Service => ({
    id: 'svc-cut',
    establishment_id: 'est-1',
    name: 'Haircut',
    price: 100,
    duration_minutes: 30,
    deposit_required: false,
    ...overrides,
});

export const makeAppointment = (overrides: Partial<Appointment> = {}): Appointment => ({
    id: 'appt-1',
    user_id: 'user-1',
    establishment_id: 'est-1',
    staff_id: 'staff-1',
    service_id: 'svc-cut',
    bundle_id: null,
    scheduled_at: at('14:00'),
    duration_minutes: 30,
    status: 'pending',
    payment_type: 'single',
    payment_method: 'card',
    total_price: 100,
    cancel_reason: null,
    created_at: at('08:00'),
    ...overrides,
});

export const makeWallet = (userId: string, balance: number): UserWallet => ({ id: `wallet-${userId}`, user_id: userId, balance });

export interface SentNotification {
    userId: string;
    title: string;
    type: NotificationType;
}

export class RecordingNotifications implements NotificationService {
    readonly sent: SentNotification[] = [];

    async notify(userId: string, title: string, _message: string, type: NotificationType): Promise<void> {
        this.sent.push({ userId, title, type });
    }
}

export class FailingNotifications implements NotificationService {
    async notify(): Promise<void> {
        throw new Error('push gateway down');
    }
}

export const testConfig = loadConfig({ NODE_ENV: 'test' });

export interface Harness {
    repository: MemorySchedulingRepository;
    notifications: RecordingNotifications;
    services: ReturnType<typeof buildServices>;
}

export const createHarness = (
    seed: Partial<MemorySeed> = {},
    options: { settings?: Record<string, string | number | boolean>; now?: string; overrides?: ServiceOverrides } = {},
): Harness => {
    const repository = new MemorySchedulingRepository({
        establishments: [makeEstablishment()],
        staff: [makeStaff()],
        services: [makeService()],
        ...seed,
    });
    const notifications = new RecordingNotifications();
    const now = new Date(options.now ?? at('08:00'));
    const services = buildServices(testConfig, {
        repository,
        notifications,
        settings: new SettingsService(new StaticSettingsSource(options.settings ?? {})),
        verifyToken: localTokenVerifier,
        clock: () => now,
        ...options.overrides,
    });
    return { repository, notifications, services };
};
