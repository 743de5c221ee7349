import { z } from 'zod';
import { CHECKPOINT_DEFAULTS, LOGGING_DEFAULTS, POSTGRES_DEFAULTS, SQLITE_DEFAULTS } from './defaults';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const checkpointConfigSchema = z.object({
    configurable: z
        .object({
            threadId: z.string().min(1),
            checkpointNs: z.string().optional(),
            checkpointId: z.string().optional(),
            runId: z.string().optional(),
        })
        .passthrough(),
    metadata: z.record(z.unknown()).optional(),
});

export const storeOptionsSchema = z.object({
    checkpointIdPolicy: z.enum(['preserve', 'regenerate']).default(CHECKPOINT_DEFAULTS.ID_POLICY),
});

export const sqliteConfigSchema = z.object({
    path: z.string().min(1).default(SQLITE_DEFAULTS.PATH),
    walMode: z.boolean().default(SQLITE_DEFAULTS.WAL),
});

export const postgresConfigSchema = z.object({
    connectionString: z.string().min(1),
    pipeline: z.boolean().default(POSTGRES_DEFAULTS.PIPELINE),
});

export const loggingConfigSchema = z.object({
    level: logLevelSchema.default(LOGGING_DEFAULTS.LEVEL),
    prettyPrint: z.boolean().default(LOGGING_DEFAULTS.PRETTY_PRINT),
});

export type LogLevel = z.infer<typeof logLevelSchema>;
export type StoreOptions = z.infer<typeof storeOptionsSchema>;
export type SqliteConfig = z.infer<typeof sqliteConfigSchema>;
export type PostgresConfig = z.infer<typeof postgresConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
