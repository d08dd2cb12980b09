import { z } from 'zod';

/**
 * Environment variables read at startup
 */
const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    /** Pretty-print logs through pino-pretty ("false" for raw JSON lines) */
    LOG_PRETTY: z.enum(['true', 'false']).default('true').transform(value => value === 'true'),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    /** Any duration @fastify/rate-limit understands, e.g. "1 minute" */
    RATE_LIMIT_WINDOW: z.string().min(1).default('1 minute'),
    IDEMPOTENCY_TTL_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
});

export interface AppConfig {
    port: number;
    host: string;
    logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    logPretty: boolean;
    rateLimit: { max: number; timeWindow: string };
    idempotencyTtlMs: number;
}

/**
 * Build the service configuration from environment variables
 *
 * @param env - Variables to read (defaults to `process.env`)
 * @throws {Error} Listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }
    const vars = parsed.data;
    return {
        port: vars.PORT,
        host: vars.HOST,
        logLevel: vars.LOG_LEVEL,
        logPretty: vars.LOG_PRETTY,
        rateLimit: { max: vars.RATE_LIMIT_MAX, timeWindow: vars.RATE_LIMIT_WINDOW },
        idempotencyTtlMs: vars.IDEMPOTENCY_TTL_MS,
    };
}
