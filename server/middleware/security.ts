/**
 * Security Middleware
 *
 * Shared-password gate, failed-attempt rate limiting and security headers.
 */

import crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthenticationError } from '../utils/errorHandler';
import { RATE_LIMIT_CONSTANTS } from '../config/constants';

export const PASSWORD_HEADER = 'x-app-password';

/**
 * Constant-time password check. Both sides are hashed first so inputs of
 * different length still compare in constant time.
 */
export function verifyPassword(candidate: string, expected: string): boolean {
    const a = crypto.createHash('sha256').update(candidate, 'utf8').digest();
    const b = crypto.createHash('sha256').update(expected, 'utf8').digest();
    return crypto.timingSafeEqual(a, b);
}

type AttemptWindow = { count: number; resetTime: number };

/**
 * Counts failed password attempts per client; successful requests never
 * consume the budget.
 */
export class FailedAttemptLimiter {
    private attempts = new Map<string, AttemptWindow>();

    constructor(
        private readonly windowMs: number = RATE_LIMIT_CONSTANTS.AUTH_WINDOW_MS,
        private readonly maxAttempts: number = RATE_LIMIT_CONSTANTS.AUTH_MAX_ATTEMPTS,
        private readonly now: () => number = Date.now,
    ) {}

    /** Seconds until the client may retry, or 0 when not blocked */
    retryAfter(clientId: string): number {
        const data = this.attempts.get(clientId);
        if (!data || this.now() > data.resetTime) return 0;
        if (data.count < this.maxAttempts) return 0;
        return Math.ceil((data.resetTime - this.now()) / 1000);
    }

    recordFailure(clientId: string): void {
        const now = this.now();
        const data = this.attempts.get(clientId);
        if (!data || now > data.resetTime) {
            this.attempts.set(clientId, { count: 1, resetTime: now + this.windowMs });
            return;
        }
        data.count++;
    }

    reset(clientId: string): void {
        this.attempts.delete(clientId);
    }
}

export function requireAppPassword(
    expectedPassword: string,
    limiter: FailedAttemptLimiter = new FailedAttemptLimiter(),
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const clientId = req.ip || 'unknown';
        const retryAfter = limiter.retryAfter(clientId);
        if (retryAfter > 0) {
            res.set('Retry-After', retryAfter.toString());
            res.status(429).json({ error: 'Too many authentication attempts', retryAfter });
            return;
        }

        const provided = req.get(PASSWORD_HEADER);
        if (typeof provided === 'string' && verifyPassword(provided, expectedPassword)) {
            limiter.reset(clientId);
            next();
            return;
        }

        limiter.recordFailure(clientId);
        console.warn(`[Security] Rejected password from ${clientId}`);
        next(new AuthenticationError('Password incorrect'));
    };
}

/**
 * Security headers middleware.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    res.setHeader('Content-Security-Policy', "default-src 'self'");
    next();
}
