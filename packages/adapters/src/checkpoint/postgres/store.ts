import { Client } from 'pg';
import {
    getCheckpointId,
    getCheckpointNs,
    getThreadId,
    hasCheckpointNs,
    postgresConfigSchema,
    requireCheckpointId,
    type Checkpoint,
    type CheckpointConfig,
    type CheckpointListOptions,
    type CheckpointMetadata,
    type CheckpointPendingWrite,
    type CheckpointTuple,
    type PendingWrite,
    type PostgresQueryable
} from '@waypoint/core';
import {
    AsyncLock,
    BaseCheckpointStore,
    buildCheckpointTuple,
    checkpointConfigFor,
    copyCheckpoint,
    mergeCheckpointMetadata,
    offload,
    parseCheckpoint,
    parseCheckpointMetadata,
    type BaseCheckpointStoreOptions,
    type StoreMode
} from '@waypoint/engine';
import {
    checkpointRowSchema,
    dumpBlobs,
    dumpCheckpointBody,
    dumpWrites,
    loadBlobs,
    loadCheckpointBody,
    loadWrites,
    type CheckpointRow
} from './codec';
import { PostgresPipeline } from './pipeline';
import {
    INSERT_BLOBS_PREFIX,
    INSERT_BLOBS_SUFFIX,
    INSERT_WRITES_PREFIX,
    INSERT_WRITES_SUFFIX,
    SETUP_STATEMENTS,
    UPSERT_CHECKPOINT_SQL,
    buildSelect,
    multiRowInsert,
    type SqlStatement
} from './sql';

export interface PostgresCheckpointStoreOptions extends BaseCheckpointStoreOptions {
    /** Issue the statements of one `put`/`putWrites` back to back and await them together. */
    pipeline?: boolean;
    /** A pending read of the latest tuple, consumed by the first matching `getTuple`. */
    latest?: AsyncIterator<CheckpointTuple>;
}

interface CachedWrite {
    taskId: string;
    idx: number;
    channel: string;
    value: unknown;
}

interface CachedTuple {
    tuple: CheckpointTuple;
    writes: CachedWrite[];
}

function cacheEntry(tuple: CheckpointTuple): CachedTuple {
    // Stored writes are numbered from 0 within each task, in order.
    const perTask = new Map<string, number>();
    const writes = (tuple.pendingWrites ?? []).map(([taskId, channel, value]): CachedWrite => {
        const idx = perTask.get(taskId) ?? 0;
        perTask.set(taskId, idx + 1);
        return { taskId, idx, channel, value };
    });
    return { tuple, writes };
}

function matches(tuple: CheckpointTuple, threadId: string, checkpointNs: string, checkpointId?: string): boolean {
    const { configurable } = tuple.config;
    return (
        configurable.threadId === threadId &&
        getCheckpointNs(tuple.config) === checkpointNs &&
        (checkpointId === undefined || configurable.checkpointId === checkpointId)
    );
}

/**
 * Checkpoint store on PostgreSQL.
 *
 * Only the async methods are implemented. Channel values are stored once per
 * `(channel, version)` in `checkpoint_blobs` and rejoined on read, so a step
 * that leaves a channel untouched writes nothing for it.
 *
 * The most recent tuple this instance wrote or prefetched is cached; `getTuple`
 * answers from it when thread, namespace and id match and queries otherwise.
 *
 * The statements of one `put` run in a transaction, so `conn` must be a single
 * connection (a `pg.Client` or a checked-out pool client), not a `pg.Pool`.
 */
export class PostgresCheckpointStore extends BaseCheckpointStore {
    private readonly conn: PostgresQueryable;
    private readonly pipeline: boolean;
    private readonly lock = new AsyncLock();
    private readonly setupLock = new AsyncLock();
    private readonly ownedClient: Client | undefined;
    private isSetup = false;
    private latestTuple: CachedTuple | undefined;
    private latestIter: AsyncIterator<CheckpointTuple> | undefined;

    constructor(conn: PostgresQueryable, options: PostgresCheckpointStoreOptions = {}, ownedClient?: Client) {
        super(options);
        this.conn = conn;
        this.pipeline = options.pipeline ?? false;
        this.latestIter = options.latest;
        this.ownedClient = ownedClient;
    }

    /** Connects a dedicated client; `close()` ends it. */
    public static async fromConnString(
        connectionString: string,
        options: PostgresCheckpointStoreOptions = {}
    ): Promise<PostgresCheckpointStore> {
        const config = postgresConfigSchema.parse({ connectionString, pipeline: options.pipeline });
        const client = new Client({ connectionString: config.connectionString });
        await client.connect();
        return new PostgresCheckpointStore(client, { ...options, pipeline: config.pipeline }, client);
    }

    public async close(): Promise<void> {
        await this.ownedClient?.end();
    }

    protected unsupportedHint(mode: StoreMode): string {
        return mode === 'sync'
            ? 'PostgresCheckpointStore only supports the async methods (setup, getTuple, get, list, put, putWrites). For blocking use, consider SqliteCheckpointStore.'
            : 'Use the async methods of PostgresCheckpointStore.';
    }

    public async setup(): Promise<void> {
        if (this.isSetup) {
            return;
        }
        // A separate lock: the cache claim may advance an iterator that itself calls setup().
        await this.setupLock.run(async () => {
            if (this.isSetup) {
                return;
            }
            for (const statement of SETUP_STATEMENTS) {
                await this.conn.query(statement);
            }
            this.isSetup = true;
            this.logger?.debug('PostgreSQL checkpoint tables ready');
        });
    }

    public async getTuple(config: CheckpointConfig): Promise<CheckpointTuple | undefined> {
        await this.setup();
        const threadId = getThreadId(config, 'get checkpoint tuple');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = getCheckpointId(config);

        const cached = await this.lock.run(async () => {
            if (this.latestTuple && matches(this.latestTuple.tuple, threadId, checkpointNs, checkpointId)) {
                return this.latestTuple.tuple;
            }
            const iter = this.latestIter;
            if (!iter) {
                return undefined;
            }
            this.latestIter = undefined;
            const next = await iter.next();
            if (next.done) {
                return undefined;
            }
            this.latestTuple = cacheEntry(next.value);
            return matches(next.value, threadId, checkpointNs, checkpointId) ? next.value : undefined;
        });

        if (cached) {
            this.logger?.trace({ threadId, checkpointNs, checkpointId: cached.config.configurable.checkpointId }, 'Latest tuple cache hit');
            return cached;
        }
        return this.fetchTuple(threadId, checkpointNs, checkpointId);
    }

    /**
     * Starts reading the latest tuple of `config`'s thread now; the next
     * `getTuple` for it picks up the result instead of querying again.
     */
    public prefetchLatest(config: CheckpointConfig): void {
        const threadId = getThreadId(config, 'prefetch checkpoint');
        const checkpointNs = getCheckpointNs(config);
        const pending = this.setup()
            .then(() => this.fetchTuple(threadId, checkpointNs, undefined))
            .catch((error: unknown) => {
                this.logger?.warn({ err: error, threadId, checkpointNs }, 'Prefetching the latest checkpoint failed');
                return undefined;
            });
        this.latestIter = (async function* () {
            const tuple = await pending;
            if (tuple) {
                yield tuple;
            }
        })();
    }

    public async *list(config?: CheckpointConfig, options: CheckpointListOptions = {}): AsyncIterableIterator<CheckpointTuple> {
        await this.setup();
        const statement = buildSelect({
            threadId: config ? getThreadId(config, 'list checkpoints') : undefined,
            checkpointNs: config && hasCheckpointNs(config) ? getCheckpointNs(config) : undefined,
            metadata: options.filter,
            beforeId: getCheckpointId(options.before),
            limit: options.limit
        });
        const { rows } = await this.conn.query(statement.text, statement.values);
        for (const raw of rows) {
            const row = checkpointRowSchema.parse(raw);
            yield await offload(() => this.toTuple(row, false));
        }
    }

    public async put(config: CheckpointConfig, checkpoint: Checkpoint, metadata: CheckpointMetadata): Promise<CheckpointConfig> {
        await this.setup();
        const threadId = getThreadId(config, 'put checkpoint');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = this.resolveCheckpointId(checkpoint);
        const previousId = getCheckpointId(config);
        const parentCheckpointId = previousId !== checkpointId ? previousId : undefined;
        const stored = { ...copyCheckpoint(checkpoint), id: checkpointId };
        const mergedMetadata = mergeCheckpointMetadata(config, metadata);

        const previous =
            previousId !== undefined &&
            this.latestTuple &&
            matches(this.latestTuple.tuple, threadId, checkpointNs, previousId)
                ? this.latestTuple.tuple.checkpoint.channelVersions
                : undefined;

        const { blobs, body } = await offload(() => ({
            blobs: dumpBlobs(this.serde, threadId, checkpointNs, stored.channelValues, stored.channelVersions, previous),
            body: dumpCheckpointBody(this.serde, stored)
        }));

        const statements: SqlStatement[] = [];
        if (blobs.length > 0) {
            statements.push(...multiRowInsert(INSERT_BLOBS_PREFIX, INSERT_BLOBS_SUFFIX, blobs));
        }
        statements.push({
            text: UPSERT_CHECKPOINT_SQL,
            values: [
                threadId,
                checkpointNs,
                checkpointId,
                parentCheckpointId ?? null,
                JSON.stringify(body),
                JSON.stringify(mergedMetadata)
            ]
        });
        await this.execute(statements);

        this.logger?.debug(
            { threadId, checkpointNs, checkpointId, parentCheckpointId, blobs: blobs.length },
            'Stored checkpoint'
        );

        this.refreshLatest(threadId, checkpointNs, checkpointId, parentCheckpointId, stored, mergedMetadata);
        return checkpointConfigFor(threadId, checkpointNs, checkpointId);
    }

    /**
     * Caches a tuple just written unless the cache already holds a newer
     * checkpoint of the same thread and namespace.
     */
    private refreshLatest(
        threadId: string,
        checkpointNs: string,
        checkpointId: string,
        parentCheckpointId: string | undefined,
        checkpoint: Checkpoint,
        metadata: CheckpointMetadata
    ): void {
        const current = this.latestTuple;
        let writes: CachedWrite[] = [];
        let parentId = parentCheckpointId;
        if (current && matches(current.tuple, threadId, checkpointNs)) {
            const currentId = current.tuple.config.configurable.checkpointId ?? '';
            if (checkpointId < currentId) {
                return;
            }
            if (checkpointId === currentId) {
                // The upsert keeps the stored parent pointer and pending writes.
                writes = current.writes;
                parentId = getCheckpointId(current.tuple.parentConfig);
            }
        }
        this.latestTuple = {
            tuple: buildCheckpointTuple({
                threadId,
                checkpointNs,
                checkpointId,
                parentCheckpointId: parentId,
                checkpoint,
                metadata,
                pendingWrites: writes.map((write): CheckpointPendingWrite => [write.taskId, write.channel, write.value])
            }),
            writes
        };
    }

    public async putWrites(config: CheckpointConfig, writes: readonly PendingWrite[], taskId: string): Promise<void> {
        await this.setup();
        const threadId = getThreadId(config, 'put writes');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = requireCheckpointId(config, 'put writes');
        if (writes.length === 0) {
            return;
        }

        const rows = await offload(() => dumpWrites(this.serde, threadId, checkpointNs, checkpointId, taskId, writes));
        await this.execute(multiRowInsert(INSERT_WRITES_PREFIX, INSERT_WRITES_SUFFIX, rows));
        this.logger?.debug({ threadId, checkpointNs, checkpointId, taskId, count: writes.length }, 'Stored pending writes');

        const cached = this.latestTuple;
        if (cached && matches(cached.tuple, threadId, checkpointNs, checkpointId)) {
            const merged = [...cached.writes];
            writes.forEach(([channel, value], idx) => {
                if (!merged.some((write) => write.taskId === taskId && write.idx === idx)) {
                    merged.push({ taskId, idx, channel, value });
                }
            });
            merged.sort((a, b) => (a.taskId === b.taskId ? a.idx - b.idx : a.taskId < b.taskId ? -1 : 1));
            this.latestTuple = {
                tuple: {
                    ...cached.tuple,
                    pendingWrites: merged.map((write): CheckpointPendingWrite => [write.taskId, write.channel, write.value])
                },
                writes: merged
            };
        }
    }

    /** Runs `statements` in order; more than one share a transaction. */
    private async execute(statements: readonly SqlStatement[]): Promise<void> {
        const [first] = statements;
        if (statements.length === 1 && first) {
            await this.conn.query(first.text, first.values);
            return;
        }
        try {
            if (this.pipeline) {
                const pipeline = new PostgresPipeline(this.conn);
                pipeline.enqueue('BEGIN');
                for (const statement of statements) {
                    pipeline.enqueue(statement.text, statement.values);
                }
                pipeline.enqueue('COMMIT');
                await pipeline.sync();
            } else {
                await this.conn.query('BEGIN');
                for (const statement of statements) {
                    await this.conn.query(statement.text, statement.values);
                }
                await this.conn.query('COMMIT');
            }
        } catch (error: unknown) {
            await this.rollback();
            throw error;
        }
    }

    private async rollback(): Promise<void> {
        try {
            await this.conn.query('ROLLBACK');
        } catch (error: unknown) {
            this.logger?.warn({ err: error }, 'Rolling back a failed checkpoint write failed');
        }
    }

    private async fetchTuple(
        threadId: string,
        checkpointNs: string,
        checkpointId: string | undefined
    ): Promise<CheckpointTuple | undefined> {
        const statement = buildSelect({
            threadId,
            checkpointNs,
            checkpointId,
            limit: checkpointId === undefined ? 1 : undefined
        });
        const { rows } = await this.conn.query(statement.text, statement.values);
        if (rows.length === 0) {
            return undefined;
        }
        const row = checkpointRowSchema.parse(rows[0]);
        this.logger?.trace({ threadId, checkpointNs, checkpointId: row.checkpoint_id }, 'Loaded checkpoint');
        return offload(() => this.toTuple(row, true));
    }

    private toTuple(row: CheckpointRow, withWrites: boolean): CheckpointTuple {
        const channelValues = loadBlobs(this.serde, row.channel_values);
        return buildCheckpointTuple({
            threadId: row.thread_id,
            checkpointNs: row.checkpoint_ns,
            checkpointId: row.checkpoint_id,
            parentCheckpointId: row.parent_checkpoint_id,
            checkpoint: parseCheckpoint(loadCheckpointBody(this.serde, row.checkpoint, channelValues)),
            metadata: parseCheckpointMetadata(row.metadata),
            pendingWrites: withWrites ? loadWrites(this.serde, row.pending_writes) : undefined
        });
    }
}
