import { Request, Response, NextFunction } from 'express';

export interface RateLimitOptions {
    windowMs: number;
    maxRequests: number;
    now?: () => number;
}

/**
 * Fixed-window limiter keyed by client IP. State is per process.
 */
export const createRateLimiter = ({ windowMs, maxRequests, now = Date.now }: RateLimitOptions) => {
    const rateLimitMap = new Map<string, { count: number; lastReset: number }>();

    return (req: Request, res: Response, next: NextFunction): void => {
        const ip = req.ip || 'unknown';
        const current = now();
        const rateData = rateLimitMap.get(ip) || { count: 0, lastReset: current };

        if (current - rateData.lastReset > windowMs) {
            rateData.count = 0;
            rateData.lastReset = current;
        }

        rateData.count++;
        rateLimitMap.set(ip, rateData);

        if (rateData.count > maxRequests) {
            res.status(429).json({
                status: 'error',
                code: 'RATE_LIMITED',
                message: 'Too many requests. Please try again later.',
            });
            return;
        }

        next();
    };
};
