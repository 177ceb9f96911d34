import { createClient } from '@supabase/supabase-js';
import { env } from '../config/env';

if (!env.SUPABASE_URL || !env.SUPABASE_KEY) {
    console.warn("[Supabase] Credentials missing. Reports are stored locally and auth falls back to AUTH_JWT_SECRET.");
}

export const supabase = (env.SUPABASE_URL && env.SUPABASE_KEY)
    ? createClient(env.SUPABASE_URL, env.SUPABASE_KEY)
    : null;
