import { NextFunction, Request, Response } from 'express';
import { SupabaseClient } from '@supabase/supabase-js';
import { createModuleLogger } from '../lib/logger';

const log = createModuleLogger('auth');

export interface AuthUser {
    id: string;
    email?: string;
}

// Extend Express Request interface to include user
declare global {
    namespace Express {
        interface Request {
            user?: AuthUser;
        }
    }
}

/** Resolves a bearer token to a user, or null when the token is not accepted. */
export type TokenVerifier = (token: string) => Promise<AuthUser | null>;

export const supabaseTokenVerifier =
    (supabase: SupabaseClient): TokenVerifier =>
    async (token) => {
        const {
            data: { user },
            error,
        } = await supabase.auth.getUser(token);
        if (error || !user) return null;
        return { id: user.id, ...(user.email ? { email: user.email } : {}) };
    };

/**
 * Local development without Supabase: the bearer token is taken as the user id.
 */
export const localTokenVerifier: TokenVerifier = async (token) => (token.length > 0 ? { id: token } : null);

export const createRequireAuth =
    (verify: TokenVerifier) =>
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const authHeader = req.headers.authorization;
        if (!authHeader) {
            res.status(401).json({ status: 'error', code: 'UNAUTHORIZED', message: 'Authorization header missing' });
            return;
        }

        const [scheme, token] = authHeader.split(' ');
        if (scheme !== 'Bearer' || !token) {
            res.status(401).json({ status: 'error', code: 'UNAUTHORIZED', message: 'Bearer token missing' });
            return;
        }

        try {
            const user = await verify(token);
            if (!user) {
                res.status(401).json({ status: 'error', code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
                return;
            }
            req.user = user;
            log.debug({ userId: user.id }, 'Authenticated request');
            next();
        } catch (err) {
            next(err);
        }
    };

/** The authenticated user; only valid behind requireAuth. */
export const currentUser = (req: Request): AuthUser => {
    if (!req.user) throw new Error('requireAuth must run before this handler');
    return req.user;
};
