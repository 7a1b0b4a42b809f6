import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z
    .string()
    .optional()
    .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(4000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    SUPABASE_URL: optionalString,
    SUPABASE_ANON_KEY: optionalString,
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    STRIPE_SECRET_KEY: optionalString,
    STRIPE_WEBHOOK_SECRET: optionalString,
    PLATFORM_FEE_PERCENT: z.coerce.number().min(0).max(100).default(5),
    PAYMENT_PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    DEFAULT_REFERRAL_BONUS: z.coerce.number().min(0).default(10),
    DEFAULT_CASHBACK_PERCENT: z.coerce.number().min(0).max(100).default(5),
    LATE_CANCELLATION_WINDOW_MINUTES: z.coerce.number().int().min(0).default(30),
    PAYMENT_CURRENCY: z.string().length(3).default('usd'),
});

export type AppConfig = z.infer<typeof envSchema>;

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }
    return parsed.data;
};

export const config = loadConfig();
