import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

export const SettingsKeys = {
    CASHBACK_ENABLED: 'cashback_enabled',
    CASHBACK_PERCENT: 'cashback_percent',
    REFERRAL_BONUS_AMOUNT: 'referral_bonus_amount',
} as const;

/** Feature flags and numeric tuning read by the settlement pipeline. */
export interface SettingsPort {
    getBool(key: string, defaultValue: boolean): Promise<boolean>;
    getFloat(key: string, defaultValue: number): Promise<number>;
}

export interface SettingsSource {
    get(key: string): Promise<string | null>;
}

const TRUTHY = ['true', '1', 'yes', 'on'];

export class SettingsService implements SettingsPort {
    constructor(private readonly source: SettingsSource) {}

    async getBool(key: string, defaultValue: boolean): Promise<boolean> {
        const value = await this.source.get(key);
        if (value === null) return defaultValue;
        return TRUTHY.includes(value.trim().toLowerCase());
    }

    async getFloat(key: string, defaultValue: number): Promise<number> {
        const value = await this.source.get(key);
        if (value === null) return defaultValue;
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : defaultValue;
    }
}

const settingRowSchema = z.object({ value: z.string().nullable() });

export class SupabaseSettingsSource implements SettingsSource {
    constructor(private readonly supabase: SupabaseClient) {}

    async get(key: string): Promise<string | null> {
        const { data, error } = await this.supabase.from('system_settings').select('value').eq('key', key).maybeSingle();
        if (error) throw new Error(`[supabase] system_settings: ${error.message}`);
        if (!data) return null;
        return settingRowSchema.parse(data).value;
    }
}

export class StaticSettingsSource implements SettingsSource {
    private readonly values: Map<string, string>;

    constructor(values: Record<string, string | number | boolean> = {}) {
        this.values = new Map(Object.entries(values).map(([k, v]) => [k, String(v)]));
    }

    async get(key: string): Promise<string | null> {
        return this.values.get(key) ?? null;
    }
}
