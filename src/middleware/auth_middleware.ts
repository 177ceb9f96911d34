import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { env } from '../config/env';

import { supabase } from '../services/supabase';

export interface AuthUser {
    id: string;
    email?: string;
    role: string;
}

export interface AuthenticatedRequest extends Request {
    user?: AuthUser;
}

function userFromToken(token: string, secret: string): AuthUser | null {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === 'string') return null;

    const id = typeof decoded.id === 'string' ? decoded.id : decoded.sub;
    if (!id) return null;
    return {
        id,
        email: typeof decoded.email === 'string' ? decoded.email : undefined,
        role: typeof decoded.role === 'string' ? decoded.role : 'user'
    };
}

/**
 * Blocks requests that lack a valid Bearer token. Tokens are checked by
 * Supabase Auth when configured, otherwise against AUTH_JWT_SECRET.
 */
export const requireAuth = async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
        console.warn(`[AuthMiddleware] Unauthorized access attempt to ${req.originalUrl}`);
        return res.status(401).json({ error: 'Unauthorized. Missing or invalid Authorization header.' });
    }

    const token = authHeader.split(' ')[1];

    try {
        if (supabase) {
            const { data: { user }, error } = await supabase.auth.getUser(token);

            if (error || !user) {
                console.warn(`[Auth] Supabase Auth Rejected: ${error?.message || 'Unknown Error'}`);
                return res.status(401).json({ error: 'Unauthorized. Invalid Supabase session token.' });
            }

            req.user = { id: user.id, email: user.email, role: user.role ?? 'user' };
            return next();
        }

        if (!env.AUTH_JWT_SECRET) {
            console.error('[AuthMiddleware] Neither Supabase nor AUTH_JWT_SECRET is configured.');
            return res.status(503).json({ error: 'Authentication is not configured.' });
        }

        const user = userFromToken(token, env.AUTH_JWT_SECRET);
        if (!user) {
            return res.status(401).json({ error: 'Unauthorized. Token carries no subject.' });
        }
        req.user = user;
        return next();
    } catch (error) {
        console.error(`[AuthMiddleware] Verification Failed:`, error);
        return res.status(403).json({ error: 'Forbidden. Invalid or expired token.' });
    }
};
