import {
    getCheckpointId,
    getCheckpointNs,
    getThreadId,
    hasCheckpointNs,
    requireCheckpointId,
    type Checkpoint,
    type CheckpointConfig,
    type CheckpointListOptions,
    type CheckpointMetadata,
    type CheckpointPendingWrite,
    type CheckpointTuple,
    type PendingWrite,
    type SerializedValue
} from '@waypoint/core';
import {
    BaseCheckpointStore,
    buildCheckpointTuple,
    checkpointConfigFor,
    jsonContains,
    mergeCheckpointMetadata,
    parseCheckpoint,
    parseCheckpointMetadata
} from '@waypoint/engine';

interface StoredCheckpoint {
    checkpoint: SerializedValue;
    metadata: SerializedValue;
    parentCheckpointId?: string;
}

interface StoredWrite {
    taskId: string;
    idx: number;
    channel: string;
    value: SerializedValue;
}

function writesKey(threadId: string, checkpointNs: string, checkpointId: string): string {
    return JSON.stringify([threadId, checkpointNs, checkpointId]);
}

/**
 * An in-memory checkpoint store.
 * Useful for short-lived graph executions and test environments that should not
 * persist checkpoints to a durable database.
 *
 * Supports both method families. Values go through the serializer on the way
 * in and out, so callers never share objects with the stored history.
 */
export class MemoryCheckpointStore extends BaseCheckpointStore {
    /** threadId → checkpointNs → checkpointId → row */
    protected readonly checkpoints = new Map<string, Map<string, Map<string, StoredCheckpoint>>>();
    protected readonly writes = new Map<string, Map<string, StoredWrite>>();

    protected unsupportedHint(): string {
        return 'MemoryCheckpointStore supports both families.';
    }

    public setupSync(): void {}

    public async setup(): Promise<void> {}

    public getTupleSync(config: CheckpointConfig): CheckpointTuple | undefined {
        const threadId = getThreadId(config, 'get checkpoint tuple');
        const checkpointNs = getCheckpointNs(config);
        const rows = this.checkpoints.get(threadId)?.get(checkpointNs);
        if (!rows) {
            return undefined;
        }
        const checkpointId = getCheckpointId(config) ?? [...rows.keys()].sort().at(-1);
        const row = checkpointId === undefined ? undefined : rows.get(checkpointId);
        if (checkpointId === undefined || !row) {
            return undefined;
        }
        this.logger?.trace({ threadId, checkpointNs, checkpointId }, 'Loaded checkpoint');
        return this.toTuple(threadId, checkpointNs, checkpointId, row, true);
    }

    public async getTuple(config: CheckpointConfig): Promise<CheckpointTuple | undefined> {
        return this.getTupleSync(config);
    }

    public *listSync(config?: CheckpointConfig, options: CheckpointListOptions = {}): IterableIterator<CheckpointTuple> {
        const { filter, before, limit } = options;
        const beforeId = getCheckpointId(before);
        const threadIds = config ? [getThreadId(config, 'list checkpoints')] : [...this.checkpoints.keys()];
        const onlyNs = config && hasCheckpointNs(config) ? getCheckpointNs(config) : undefined;

        const found: Array<{ threadId: string; checkpointNs: string; checkpointId: string; row: StoredCheckpoint }> = [];
        for (const threadId of threadIds) {
            for (const [checkpointNs, rows] of this.checkpoints.get(threadId) ?? []) {
                if (onlyNs !== undefined && checkpointNs !== onlyNs) {
                    continue;
                }
                for (const [checkpointId, row] of rows) {
                    if (beforeId !== undefined && checkpointId >= beforeId) {
                        continue;
                    }
                    found.push({ threadId, checkpointNs, checkpointId, row });
                }
            }
        }
        found.sort((a, b) => (a.checkpointId < b.checkpointId ? 1 : a.checkpointId > b.checkpointId ? -1 : 0));

        let remaining = limit ?? Number.POSITIVE_INFINITY;
        for (const { threadId, checkpointNs, checkpointId, row } of found) {
            if (remaining <= 0) {
                return;
            }
            const tuple = this.toTuple(threadId, checkpointNs, checkpointId, row, false);
            if (filter && !jsonContains(tuple.metadata, filter)) {
                continue;
            }
            remaining -= 1;
            yield tuple;
        }
    }

    public async *list(config?: CheckpointConfig, options?: CheckpointListOptions): AsyncIterableIterator<CheckpointTuple> {
        yield* this.listSync(config, options);
    }

    public putSync(config: CheckpointConfig, checkpoint: Checkpoint, metadata: CheckpointMetadata): CheckpointConfig {
        const threadId = getThreadId(config, 'put checkpoint');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = this.resolveCheckpointId(checkpoint);
        const previousId = getCheckpointId(config);

        let namespaces = this.checkpoints.get(threadId);
        if (!namespaces) {
            namespaces = new Map();
            this.checkpoints.set(threadId, namespaces);
        }
        let rows = namespaces.get(checkpointNs);
        if (!rows) {
            rows = new Map();
            namespaces.set(checkpointNs, rows);
        }

        const existing = rows.get(checkpointId);
        const parentCheckpointId = existing
            ? existing.parentCheckpointId
            : previousId !== checkpointId
              ? previousId
              : undefined;

        rows.set(checkpointId, {
            checkpoint: this.serde.dumpsTyped({ ...checkpoint, id: checkpointId }),
            metadata: this.serde.dumpsTyped(mergeCheckpointMetadata(config, metadata)),
            parentCheckpointId
        });
        this.logger?.debug({ threadId, checkpointNs, checkpointId, parentCheckpointId }, 'Stored checkpoint');
        return checkpointConfigFor(threadId, checkpointNs, checkpointId);
    }

    public async put(config: CheckpointConfig, checkpoint: Checkpoint, metadata: CheckpointMetadata): Promise<CheckpointConfig> {
        return this.putSync(config, checkpoint, metadata);
    }

    public putWritesSync(config: CheckpointConfig, writes: readonly PendingWrite[], taskId: string): void {
        const threadId = getThreadId(config, 'put writes');
        const checkpointNs = getCheckpointNs(config);
        const checkpointId = requireCheckpointId(config, 'put writes');
        const key = writesKey(threadId, checkpointNs, checkpointId);

        const stored = this.writes.get(key) ?? new Map<string, StoredWrite>();
        this.writes.set(key, stored);
        writes.forEach(([channel, value], idx) => {
            const writeKey = JSON.stringify([taskId, idx]);
            if (!stored.has(writeKey)) {
                stored.set(writeKey, { taskId, idx, channel, value: this.serde.dumpsTyped(value) });
            }
        });
        this.logger?.debug({ threadId, checkpointNs, checkpointId, taskId, count: writes.length }, 'Stored pending writes');
    }

    public async putWrites(config: CheckpointConfig, writes: readonly PendingWrite[], taskId: string): Promise<void> {
        this.putWritesSync(config, writes, taskId);
    }

    private toTuple(
        threadId: string,
        checkpointNs: string,
        checkpointId: string,
        row: StoredCheckpoint,
        withWrites: boolean
    ): CheckpointTuple {
        return buildCheckpointTuple({
            threadId,
            checkpointNs,
            checkpointId,
            parentCheckpointId: row.parentCheckpointId,
            checkpoint: parseCheckpoint(this.serde.loadsTyped(...row.checkpoint)),
            metadata: parseCheckpointMetadata(this.serde.loadsTyped(...row.metadata)),
            pendingWrites: withWrites ? this.pendingWrites(threadId, checkpointNs, checkpointId) : undefined
        });
    }

    private pendingWrites(threadId: string, checkpointNs: string, checkpointId: string): CheckpointPendingWrite[] {
        const stored = [...(this.writes.get(writesKey(threadId, checkpointNs, checkpointId))?.values() ?? [])];
        stored.sort((a, b) => (a.taskId === b.taskId ? a.idx - b.idx : a.taskId < b.taskId ? -1 : 1));
        return stored.map((write): CheckpointPendingWrite => [write.taskId, write.channel, this.serde.loadsTyped(...write.value)]);
    }
}
