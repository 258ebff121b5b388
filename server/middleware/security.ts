/**
 * Security Middleware
 *
 * Security headers, admin token check and a per-client rate limit for the
 * question endpoint.
 */

import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { RATE_LIMIT_CONSTANTS } from '../config/constants';
import { AuthenticationError } from '../utils/errorHandler';

/**
 * Security headers middleware.
 * The service only serves JSON, so the CSP forbids everything.
 */
export function addSecurityHeaders(_req: Request, res: Response, next: NextFunction) {
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    next();
}

function tokensMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Requires `x-admin-token` to equal `token`. With no token configured the
 * route is open (local development).
 */
export function requireAdminToken(token: string | undefined): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
        if (!token) {
            return next();
        }
        const provided = req.get('x-admin-token');
        if (!provided || !tokensMatch(provided, token)) {
            console.warn(`[Security] Rejected admin request from ${req.ip ?? 'unknown'}`);
            return next(new AuthenticationError('Invalid admin token'));
        }
        next();
    };
}

/**
 * Fixed-window rate limit per client address.
 */
export function createRateLimit(
    windowMs: number = RATE_LIMIT_CONSTANTS.QUERY_WINDOW_MS,
    maxRequests: number = RATE_LIMIT_CONSTANTS.QUERY_MAX_REQUESTS,
): RequestHandler {
    const clients = new Map<string, { count: number; resetTime: number }>();

    return (req: Request, res: Response, next: NextFunction) => {
        const clientId = req.ip || 'unknown';
        const now = Date.now();
        const clientData = clients.get(clientId);

        if (!clientData || now > clientData.resetTime) {
            clients.set(clientId, { count: 1, resetTime: now + windowMs });
            return next();
        }

        if (clientData.count >= maxRequests) {
            const retryAfter = Math.ceil((clientData.resetTime - now) / 1000);
            res.set('Retry-After', retryAfter.toString());
            res.status(429).json({
                error: 'Too many requests',
                retryAfter
            });
            return;
        }

        clientData.count++;
        next();
    };
}
