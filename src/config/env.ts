import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
    PORT: z.string().default('3001'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CORS_ORIGIN: z.string().default('*'),

    // Normalization / reconciliation tunables
    HOME_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default('91'),
    MIN_PHONE_DIGITS: z.coerce.number().int().min(6).max(14).default(10),
    FUZZY_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
    MIN_WORKING_AGE: z.coerce.number().int().min(0).default(18),
    ADDRESS_CONFIDENCE_PENALTY: z.coerce.number().min(0).max(1).default(0.1),

    // Pipeline
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(4),
    EXTRACTION_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
    RULE_CATALOGUE: z.enum(['canonical', 'extended']).default('canonical'),
    EXTRACTOR_CHAIN: z.string().default('mistral,pdf,llm'),

    // Providers
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    MISTRAL_API_KEY: z.string().optional(),
    MISTRAL_API_URL: z.string().default('https://api.mistral.ai'),

    // Persistence / auth
    SUPABASE_URL: z.string().optional(),
    SUPABASE_KEY: z.string().optional(),
    AUTH_JWT_SECRET: z.string().optional(),
    REPORT_DIR: z.string().default('reports'),
});

export const env = envSchema.parse(process.env);

export type Env = z.infer<typeof envSchema>;

export interface VerificationConfig {
    homeCountryCode: string;
    minPhoneDigits: number;
    fuzzyMatchThreshold: number;
    minWorkingAge: number;
    addressConfidencePenalty: number;
}

export const verificationConfig: Readonly<VerificationConfig> = Object.freeze({
    homeCountryCode: env.HOME_COUNTRY_CODE,
    minPhoneDigits: env.MIN_PHONE_DIGITS,
    fuzzyMatchThreshold: env.FUZZY_MATCH_THRESHOLD,
    minWorkingAge: env.MIN_WORKING_AGE,
    addressConfidencePenalty: env.ADDRESS_CONFIDENCE_PENALTY,
});
