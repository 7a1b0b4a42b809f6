import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { createModuleLogger } from '../lib/logger';
import { AppConfig } from './env';

const log = createModuleLogger('supabase');

export interface SupabaseClients {
    /** Service-role client used by the repositories; bypasses RLS. */
    service: SupabaseClient;
    /** Anon client used to verify user tokens. */
    auth: SupabaseClient;
}

const clientOptions = { auth: { persistSession: false, autoRefreshToken: false } };

/**
 * Returns null when credentials are missing; the caller falls back to the
 * in-memory repository.
 */
export const createSupabaseClients = (config: Pick<AppConfig, 'SUPABASE_URL' | 'SUPABASE_ANON_KEY' | 'SUPABASE_SERVICE_ROLE_KEY'>): SupabaseClients | null => {
    const { SUPABASE_URL: url, SUPABASE_ANON_KEY: anonKey, SUPABASE_SERVICE_ROLE_KEY: serviceKey } = config;

    if (!url || !anonKey) {
        log.warn('Supabase credential(s) missing from .env file. Using the in-memory repository.');
        return null;
    }
    if (!serviceKey) {
        log.warn('SUPABASE_SERVICE_ROLE_KEY missing; repository writes will run under the anon key and RLS.');
    }

    return {
        service: createClient(url, serviceKey ?? anonKey, clientOptions),
        auth: createClient(url, anonKey, clientOptions),
    };
};
