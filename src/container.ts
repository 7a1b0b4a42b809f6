import { AppConfig } from './config/env';
import { createSupabaseClients } from './config/supabaseClient';
import { createModuleLogger } from './lib/logger';
import { localTokenVerifier, supabaseTokenVerifier, TokenVerifier } from './middleware/authMiddleware';
import { MemorySchedulingRepository } from './repositories/memorySchedulingRepository';
import { SchedulingRepository } from './repositories/schedulingRepository';
import { SupabaseSchedulingRepository } from './repositories/supabaseSchedulingRepository';
import { LogNotificationService, NotificationService } from './services/notificationService';
import { MockPaymentProvider } from './services/paymentProviders/mockPaymentProvider';
import { PaymentProvider } from './services/paymentProviders/paymentProvider';
import { StripePaymentProvider } from './services/paymentProviders/stripePaymentProvider';
import { PaymentService } from './services/paymentService';
import { QueueService } from './services/queueService';
import { SchedulingService } from './services/schedulingService';
import { SettingsPort, SettingsService, StaticSettingsSource, SupabaseSettingsSource } from './services/settingsService';
import { SettlementService } from './services/settlementService';
import { StaffGoalService } from './services/staffGoalService';
import { WalletService } from './services/walletService';

const log = createModuleLogger('container');

export const GATEWAY_FEE_PERCENT = 3;
export const FALLBACK_DEPOSIT_PERCENT = 20;

export interface AppServices {
    repository: SchedulingRepository;
    scheduling: SchedulingService;
    payments: PaymentService;
    wallet: WalletService;
    settlement: SettlementService;
    queue: QueueService;
    goals: StaffGoalService;
    verifyToken: TokenVerifier;
    clock: () => Date;
    /** Where persistence lives; reported by /health. */
    storage: 'supabase' | 'memory';
}

export interface ServiceOverrides {
    repository?: SchedulingRepository;
    settings?: SettingsPort;
    notifications?: NotificationService;
    providers?: PaymentProvider[];
    verifyToken?: TokenVerifier;
    clock?: () => Date;
}

/**
 * Wires the services for one process. Supabase backs storage, settings and
 * token checks when configured; otherwise everything runs in memory.
 */
export const buildServices = (config: AppConfig, overrides: ServiceOverrides = {}): AppServices => {
    const supabase = overrides.repository ? null : createSupabaseClients(config);

    const repository = overrides.repository ?? (supabase ? new SupabaseSchedulingRepository(supabase.service) : new MemorySchedulingRepository());
    const settings =
        overrides.settings ?? new SettingsService(supabase ? new SupabaseSettingsSource(supabase.service) : new StaticSettingsSource());
    const notifications = overrides.notifications ?? new LogNotificationService();
    const verifyToken = overrides.verifyToken ?? (supabase ? supabaseTokenVerifier(supabase.auth) : localTokenVerifier);

    const providers: PaymentProvider[] = overrides.providers ?? [];
    if (!overrides.providers && config.STRIPE_SECRET_KEY) {
        providers.push(
            new StripePaymentProvider({
                secretKey: config.STRIPE_SECRET_KEY,
                webhookSecret: config.STRIPE_WEBHOOK_SECRET,
                currency: config.PAYMENT_CURRENCY,
                timeoutMs: config.PAYMENT_PROVIDER_TIMEOUT_MS,
            }),
        );
    }
    // The mock accepts unsigned webhooks, so it never runs next to a live provider in production.
    if (!overrides.providers && (config.NODE_ENV !== 'production' || providers.length === 0)) {
        providers.unshift(new MockPaymentProvider());
    }
    const defaultProvider = providers.some((p) => p.name === 'stripe') ? 'stripe' : providers[0]?.name ?? 'mock';

    const clock = overrides.clock ?? (() => new Date());
    const wallet = new WalletService(repository);
    const settlement = new SettlementService(repository, settings, wallet, {
        cashbackPercent: config.DEFAULT_CASHBACK_PERCENT,
        referralBonus: config.DEFAULT_REFERRAL_BONUS,
    });
    const payments = new PaymentService(repository, wallet, notifications, providers, {
        platformFeePercent: config.PLATFORM_FEE_PERCENT,
        gatewayFeePercent: GATEWAY_FEE_PERCENT,
        fallbackDepositPercent: FALLBACK_DEPOSIT_PERCENT,
        providerTimeoutMs: config.PAYMENT_PROVIDER_TIMEOUT_MS,
        defaultProvider,
    });
    const scheduling = new SchedulingService({
        repository,
        payments,
        settlement,
        notifications,
        options: { lateCancellationWindowMinutes: config.LATE_CANCELLATION_WINDOW_MINUTES },
        clock,
    });
    const queue = new QueueService(repository, notifications, clock);
    const goals = new StaffGoalService(repository);

    const storage = supabase ? 'supabase' : 'memory';
    log.info({ storage, providers: providers.map((p) => p.name), defaultProvider }, 'Services initialised');

    return { repository, scheduling, payments, wallet, settlement, queue, goals, verifyToken, clock, storage };
};
