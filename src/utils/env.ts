import { z } from 'zod';

const booleanFlag = z
    .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
    .transform((value) => value === true || value === 'true' || value === '1');

export const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8787),
    CORS_ORIGIN: z.string().default('*'),

    GEMINI_API_KEY: z.string().min(1, 'GEMINI_API_KEY is required'),
    GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash-lite'),
    MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

    SANDBOX_URL: z.string().url('SANDBOX_URL must be a URL'),
    SANDBOX_API_KEY: z.string().default(''),
    SANDBOX_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    // transport retries are only ever safe once
    SANDBOX_TRANSPORT_RETRIES: z.coerce.number().int().min(0).max(1).default(0),

    TOOL_DETECTOR: z.enum(['function-call', 'fenced']).default('function-call'),
    TURN_CONCURRENCY: z.enum(['queue', 'reject']).default('queue'),
    MESSAGE_LAYOUT: z.enum(['combined', 'split']).default('combined'),
    FOLLOW_UP_AFTER_EXECUTION: booleanFlag.default(false),

    SESSION_IDLE_TTL_MS: z.coerce.number().int().min(0).default(0),
    SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),

    UPLOADS_DIR: z.string().min(1).default('uploads'),
    PUBLIC_BASE_URL: z.string().url().default('http://localhost:8787'),
    UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export type AppEnv = z.infer<typeof envSchema>;

export type ToolDetectorKind = AppEnv['TOOL_DETECTOR'];
export type TurnConcurrency = AppEnv['TURN_CONCURRENCY'];
export type MessageLayout = AppEnv['MESSAGE_LAYOUT'];

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Throws with every failing
 * key listed so a bad deployment stops at boot.
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
    const parsed = envSchema.safeParse(config);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}
