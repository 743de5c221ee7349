import { z } from 'zod';
import {
    loggingConfigSchema,
    logLevelSchema,
    postgresConfigSchema,
    sqliteConfigSchema,
    storeOptionsSchema,
    type LoggingConfig,
    type PostgresConfig,
    type SqliteConfig,
    type StoreOptions
} from './schemas';

export type EnvSource = Record<string, string | undefined>;

export interface ResolvedStoreConfig {
    sqlite: SqliteConfig;
    postgres?: PostgresConfig;
    store: StoreOptions;
    logging: LoggingConfig;
}

const envFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
    WAYPOINT_SQLITE_PATH: z.string().min(1).optional(),
    WAYPOINT_SQLITE_WAL: envFlag.optional(),
    DATABASE_URL: z.string().min(1).optional(),
    WAYPOINT_PG_PIPELINE: envFlag.optional(),
    WAYPOINT_CHECKPOINT_ID_POLICY: z.enum(['preserve', 'regenerate']).optional(),
    LOG_LEVEL: logLevelSchema.optional(),
    NODE_ENV: z.string().optional(),
});

/**
 * Builds store configuration from environment variables.
 * Unset variables fall back to the schema defaults; malformed ones throw a `ZodError`.
 */
export function resolveStoreConfig(env: EnvSource = process.env): ResolvedStoreConfig {
    const parsed = envSchema.parse(env);

    const resolved: ResolvedStoreConfig = {
        sqlite: sqliteConfigSchema.parse({
            path: parsed.WAYPOINT_SQLITE_PATH,
            walMode: parsed.WAYPOINT_SQLITE_WAL
        }),
        store: storeOptionsSchema.parse({
            checkpointIdPolicy: parsed.WAYPOINT_CHECKPOINT_ID_POLICY
        }),
        logging: loggingConfigSchema.parse({
            level: parsed.LOG_LEVEL,
            prettyPrint: parsed.NODE_ENV === undefined ? undefined : parsed.NODE_ENV !== 'production'
        })
    };

    if (parsed.DATABASE_URL) {
        resolved.postgres = postgresConfigSchema.parse({
            connectionString: parsed.DATABASE_URL,
            pipeline: parsed.WAYPOINT_PG_PIPELINE
        });
    }

    return resolved;
}
