import Database from 'better-sqlite3';
import type { Database as DatabaseInstance } from 'better-sqlite3';
import { z } from 'zod';
import {
    getCheckpointId,
    getCheckpointNs,
    getThreadId,
    hasCheckpointNs,
    requireCheckpointId,
    sqliteConfigSchema,
    type Checkpoint,
    type CheckpointConfig,
    type CheckpointListOptions,
    type CheckpointMetadata,
    type CheckpointPendingWrite,
    type CheckpointTuple,
    type PendingWrite
} from '@waypoint/core';
import {
    BaseCheckpointStore,
    buildCheckpointTuple,
    checkpointConfigFor,
    jsonContains,
    mergeCheckpointMetadata,
    parseCheckpoint,
    parseCheckpointMetadata,
    type BaseCheckpointStoreOptions,
    type StoreMode
} from '@waypoint/engine';

export interface SqliteCheckpointStoreOptions extends BaseCheckpointStoreOptions {
    /** Switch the connection to write-ahead logging on setup. Defaults to true. */
    walMode?: boolean;
}

export const SQLITE_SETUP_SQL = `
CREATE TABLE IF NOT EXISTS checkpoints (
    thread_id TEXT NOT NULL,
    checkpoint_ns TEXT NOT NULL DEFAULT '',
    checkpoint_id TEXT NOT NULL,
    parent_checkpoint_id TEXT,
    type TEXT,
    checkpoint BLOB,
    metadata BLOB,
    PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id)
);
CREATE TABLE IF NOT EXISTS writes (
    thread_id TEXT NOT NULL,
    checkpoint_ns TEXT NOT NULL DEFAULT '',
    checkpoint_id TEXT NOT NULL,
    task_id TEXT NOT NULL,
    idx INTEGER NOT NULL,
    channel TEXT NOT NULL,
    type TEXT,
    value BLOB,
    PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id, task_id, idx)
);
`;

const CHECKPOINT_COLUMNS = 'thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, type, checkpoint, metadata';

const checkpointRowSchema = z.object({
    thread_id: z.string(),
    checkpoint_ns: z.string(),
    checkpoint_id: z.string(),
    parent_checkpoint_id: z.string().nullable(),
    type: z.string().nullable(),
    checkpoint: z.instanceof(Uint8Array),
    metadata: z.instanceof(Uint8Array).nullable()
});

const writeRowSchema = z.object({
    task_id: z.string(),
    channel: z.string(),
    type: z.string().nullable(),
    value: z.instanceof(Uint8Array).nullable()
});

type CheckpointRow = z.infer<typeof checkpointRowSchema>;

function toBuffer(data: Uint8Array): Buffer {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Checkpoint store on a single embedded SQLite connection.
 *
 * Only the blocking (`*Sync`) methods are implemented. Each checkpoint is kept
 * whole in one row, with its serialized metadata beside it. Every write runs in
 * a transaction on the shared connection.
 */
export class SqliteCheckpointStore extends BaseCheckpointStore {
    private readonly db: DatabaseInstance;
    private readonly walMode: boolean;
    private isSetup = false;

    constructor(db: DatabaseInstance, options: SqliteCheckpointStoreOptions = {}) {
        super(options);
        this.db = db;
        this.walMode = options.walMode ?? true;
    }

    /** Opens `path` (a file, or `:memory:`) with a fresh connection. */
    public static fromConnString(path: string, options: SqliteCheckpointStoreOptions = {}): SqliteCheckpointStore {
        const config = sqliteConfigSchema.parse({ path, walMode: options.walMode });
        return new SqliteCheckpointStore(new Database(config.path), { ...options, walMode: config.walMode });
    }

    public close(): void {
        this.db.close();
    }

    protected unsupportedHint(mode: StoreMode): string {
        return mode === 'async'
            ? 'SqliteCheckpointStore only supports the sync methods (setupSync, getTupleSync, getSync, listSync, putSync, putWritesSync). For async use, consider PostgresCheckpointStore.'
            : 'Use the sync methods of SqliteCheckpointStore.';
    }

    public setupSync(): void {
        if (this.isSetup) {
            return;
        }
        if (this.walMode) {
            this.db.pragma('journal_mode = WAL');
        }
        this.db.exec(SQLITE_SETUP_SQL);
        this.isSetup = true;
        this.logger?.debug({ walMode: this.walMode }, 'SQLite checkpoint tables ready');
    }

    public getTupleSync(config: CheckpointConfig): CheckpointTuple | undefined {
        this.setupSync();
        const threadId = getThreadId(config, 'get checkpoint tuple');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = getCheckpointId(config);

        const row =
            checkpointId !== undefined
                ? this.db
                      .prepare(
                          `SELECT ${CHECKPOINT_COLUMNS} FROM checkpoints WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?`
                      )
                      .get(threadId, checkpointNs, checkpointId)
                : this.db
                      .prepare(
                          `SELECT ${CHECKPOINT_COLUMNS} FROM checkpoints WHERE thread_id = ? AND checkpoint_ns = ? ORDER BY checkpoint_id DESC LIMIT 1`
                      )
                      .get(threadId, checkpointNs);

        if (row === undefined) {
            return undefined;
        }
        const parsed = checkpointRowSchema.parse(row);
        this.logger?.trace({ threadId, checkpointNs, checkpointId: parsed.checkpoint_id }, 'Loaded checkpoint');
        return this.toTuple(parsed, this.loadWrites(parsed));
    }

    public *listSync(config?: CheckpointConfig, options: CheckpointListOptions = {}): IterableIterator<CheckpointTuple> {
        this.setupSync();
        const { filter, before, limit } = options;
        const clauses: string[] = [];
        const params: Array<string | number> = [];

        if (config) {
            clauses.push('thread_id = ?');
            params.push(getThreadId(config, 'list checkpoints'));
            if (hasCheckpointNs(config)) {
                clauses.push('checkpoint_ns = ?');
                params.push(getCheckpointNs(config));
            }
        }
        const beforeId = getCheckpointId(before);
        if (beforeId !== undefined) {
            clauses.push('checkpoint_id < ?');
            params.push(beforeId);
        }

        // The metadata filter runs in process, so the limit has to follow it.
        const limitInSql = filter === undefined && limit !== undefined;
        if (limitInSql) {
            params.push(limit);
        }

        const sql =
            `SELECT ${CHECKPOINT_COLUMNS} FROM checkpoints` +
            (clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '') +
            ' ORDER BY checkpoint_id DESC' +
            (limitInSql ? ' LIMIT ?' : '');

        const rows = this.db.prepare(sql).all(...params);
        let remaining = limit ?? Number.POSITIVE_INFINITY;
        for (const row of rows) {
            if (remaining <= 0) {
                return;
            }
            const tuple = this.toTuple(checkpointRowSchema.parse(row));
            if (filter && !jsonContains(tuple.metadata, filter)) {
                continue;
            }
            remaining -= 1;
            yield tuple;
        }
    }

    public putSync(config: CheckpointConfig, checkpoint: Checkpoint, metadata: CheckpointMetadata): CheckpointConfig {
        this.setupSync();
        const threadId = getThreadId(config, 'put checkpoint');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = this.resolveCheckpointId(checkpoint);
        const previousId = getCheckpointId(config);
        const parentCheckpointId = previousId !== checkpointId ? previousId : undefined;

        const [type, body] = this.serde.dumpsTyped({ ...checkpoint, id: checkpointId });
        const serializedMetadata = this.serde.dumps(mergeCheckpointMetadata(config, metadata));

        const upsert = this.db.prepare(
            `INSERT INTO checkpoints (${CHECKPOINT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT (thread_id, checkpoint_ns, checkpoint_id)
             DO UPDATE SET type = excluded.type, checkpoint = excluded.checkpoint, metadata = excluded.metadata`
        );
        this.db.transaction(() => {
            upsert.run(
                threadId,
                checkpointNs,
                checkpointId,
                parentCheckpointId ?? null,
                type,
                toBuffer(body),
                toBuffer(serializedMetadata)
            );
        })();

        this.logger?.debug({ threadId, checkpointNs, checkpointId, parentCheckpointId }, 'Stored checkpoint');
        return checkpointConfigFor(threadId, checkpointNs, checkpointId);
    }

    public putWritesSync(config: CheckpointConfig, writes: readonly PendingWrite[], taskId: string): void {
        this.setupSync();
        const threadId = getThreadId(config, 'put writes');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = requireCheckpointId(config, 'put writes');

        const insert = this.db.prepare(
            `INSERT OR IGNORE INTO writes (thread_id, checkpoint_ns, checkpoint_id, task_id, idx, channel, type, value)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        );
        this.db.transaction(() => {
            writes.forEach(([channel, value], idx) => {
                const [type, data] = this.serde.dumpsTyped(value);
                insert.run(threadId, checkpointNs, checkpointId, taskId, idx, channel, type, toBuffer(data));
            });
        })();

        this.logger?.debug({ threadId, checkpointNs, checkpointId, taskId, count: writes.length }, 'Stored pending writes');
    }

    /** Rows written without a type tag predate typed storage; the serializer sniffs their format. */
    private decode(type: string | null, data: Uint8Array): unknown {
        return type === null ? this.serde.loads(data) : this.serde.loadsTyped(type, data);
    }

    private loadWrites(row: CheckpointRow): CheckpointPendingWrite[] {
        const rows = this.db
            .prepare(
                `SELECT task_id, channel, type, value FROM writes
                 WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?
                 ORDER BY task_id, idx`
            )
            .all(row.thread_id, row.checkpoint_ns, row.checkpoint_id);

        return rows.map((raw): CheckpointPendingWrite => {
            const write = writeRowSchema.parse(raw);
            const value = write.value === null ? null : this.decode(write.type, write.value);
            return [write.task_id, write.channel, value];
        });
    }

    private toTuple(row: CheckpointRow, pendingWrites?: CheckpointPendingWrite[]): CheckpointTuple {
        return buildCheckpointTuple({
            threadId: row.thread_id,
            checkpointNs: row.checkpoint_ns,
            checkpointId: row.checkpoint_id,
            parentCheckpointId: row.parent_checkpoint_id,
            checkpoint: parseCheckpoint(this.decode(row.type, row.checkpoint)),
            metadata: parseCheckpointMetadata(row.metadata === null ? {} : this.serde.loads(row.metadata)),
            pendingWrites
        });
    }
}
