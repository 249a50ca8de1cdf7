import { z } from 'zod';
import { ConfigGuard, ConfigurationError, Environment, GuardRule } from '../config-guard.js';

/**
 * DB Configuration Guards
 * Only enforced when the outbox is enabled (DB_HOST present).
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    // Guard-level TLS enforcement (fail-closed)
    {
        type: 'assert',
        check: (env) =>
            !['production', 'staging'].includes(env.NODE_ENV ?? '') ||
            !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    }
];

const DatabaseConfigSchema = z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535),
    user: z.string().min(1),
    password: z.string().min(1),
    database: z.string().min(1),
    poolMax: z.coerce.number().int().positive().default(10),
    caCert: z.string().min(1).optional()
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

/**
 * Returns null when no database is configured.
 */
export function loadDatabaseConfig(env: Environment = process.env): DatabaseConfig | null {
    if (!env.DB_HOST) {
        return null;
    }

    ConfigGuard.enforce(DB_CONFIG_GUARDS, env);

    const result = DatabaseConfigSchema.safeParse({
        host: env.DB_HOST,
        port: env.DB_PORT,
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        database: env.DB_NAME,
        poolMax: env.DB_POOL_MAX,
        caCert: env.DB_CA_CERT
    });

    if (!result.success) {
        throw new ConfigurationError(result.error.issues.map(i => `FATAL CONFIG: DB ${i.path.join('.')}: ${i.message}`));
    }
    return result.data;
}
