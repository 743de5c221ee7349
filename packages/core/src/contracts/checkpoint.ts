import type { Channel } from './channel';

/** Channel name → version string. */
export type ChannelVersions = Record<string, string>;

/** A message addressed to a node that has not been routed to a channel yet. */
export interface SendPacket {
    node: string;
    args: unknown;
}

export interface Checkpoint {
    /** Format version of the snapshot body. */
    v: number;
    /** Lexicographically sortable, time-derived id; unique per thread and namespace. */
    id: string;
    ts: string;
    /** Channels without a value are absent, which is not the same as holding `null`. */
    channelValues: Record<string, unknown>;
    channelVersions: ChannelVersions;
    /** Node name → versions of the channels that node has consumed. */
    versionsSeen: Record<string, ChannelVersions>;
    pendingSends: SendPacket[];
}

/**
 * Free-form metadata persisted beside a checkpoint. Stores only use it for
 * filtering; `source`, `step`, `writes` and `parents` are conventions of the executor.
 */
export interface CheckpointMetadata {
    source?: string;
    step?: number;
    writes?: Record<string, unknown> | null;
    parents?: Record<string, string>;
    [key: string]: unknown;
}

export interface CheckpointConfigurable {
    threadId: string;
    checkpointNs?: string;
    checkpointId?: string;
    runId?: string;
    [key: string]: unknown;
}

export interface CheckpointConfig {
    configurable: CheckpointConfigurable;
    metadata?: Record<string, unknown>;
}

/** A config used only as a position in history, e.g. the `before` bound of a listing. */
export interface CheckpointCursor {
    configurable: {
        checkpointId?: string;
        [key: string]: unknown;
    };
}

/** One output of a task: `[channel, value]`. */
export type PendingWrite = [channel: string, value: unknown];

/** A pending write as read back from a store: `[taskId, channel, value]`. */
export type CheckpointPendingWrite = [taskId: string, channel: string, value: unknown];

export interface CheckpointTuple {
    config: CheckpointConfig;
    checkpoint: Checkpoint;
    metadata: CheckpointMetadata;
    parentConfig?: CheckpointConfig;
    pendingWrites?: CheckpointPendingWrite[];
}

export interface CheckpointListOptions {
    /** Subset-containment match against stored metadata. */
    filter?: Record<string, unknown>;
    /** Only checkpoints with an id strictly lower than this cursor's. */
    before?: CheckpointCursor;
    limit?: number;
}

/** How `put` picks the id of the checkpoint it writes. */
export type CheckpointIdPolicy = 'preserve' | 'regenerate';

export type ChannelVersionInput = string | number | undefined;

/** Asynchronous checkpoint store contract, consumed by the graph executor. */
export interface CheckpointStore {
    setup(): Promise<void>;
    getTuple(config: CheckpointConfig): Promise<CheckpointTuple | undefined>;
    get(config: CheckpointConfig): Promise<Checkpoint | undefined>;
    list(config?: CheckpointConfig, options?: CheckpointListOptions): AsyncIterableIterator<CheckpointTuple>;
    put(config: CheckpointConfig, checkpoint: Checkpoint, metadata: CheckpointMetadata): Promise<CheckpointConfig>;
    putWrites(config: CheckpointConfig, writes: readonly PendingWrite[], taskId: string): Promise<void>;
    getNextVersion(current: ChannelVersionInput, channel: Channel): string;
}

/** Blocking counterpart of {@link CheckpointStore}. */
export interface SyncCheckpointStore {
    setupSync(): void;
    getTupleSync(config: CheckpointConfig): CheckpointTuple | undefined;
    getSync(config: CheckpointConfig): Checkpoint | undefined;
    listSync(config?: CheckpointConfig, options?: CheckpointListOptions): IterableIterator<CheckpointTuple>;
    putSync(config: CheckpointConfig, checkpoint: Checkpoint, metadata: CheckpointMetadata): CheckpointConfig;
    putWritesSync(config: CheckpointConfig, writes: readonly PendingWrite[], taskId: string): void;
    getNextVersion(current: ChannelVersionInput, channel: Channel): string;
}
