import {
    UnsupportedOperationError,
    storeOptionsSchema,
    type Channel,
    type ChannelVersionInput,
    type Checkpoint,
    type CheckpointConfig,
    type CheckpointIdPolicy,
    type CheckpointListOptions,
    type CheckpointMetadata,
    type CheckpointStore,
    type CheckpointTuple,
    type Logger,
    type PendingWrite,
    type SerializerProtocol,
    type SyncCheckpointStore
} from '@waypoint/core';
import { JsonPlusSerializer } from '../serde/jsonPlus';
import { nextVersion } from '../versioning/version';
import { createCheckpointId } from './ids';

export interface BaseCheckpointStoreOptions {
    serde?: SerializerProtocol;
    logger?: Logger;
    checkpointIdPolicy?: CheckpointIdPolicy;
}

export type StoreMode = 'sync' | 'async';

/**
 * Shared plumbing of every checkpoint store.
 *
 * A backend implements the async family, the sync family, or both; the
 * methods it leaves alone fail at call time with an `UnsupportedOperationError`
 * whose message points at the alternative.
 */
export abstract class BaseCheckpointStore implements CheckpointStore, SyncCheckpointStore {
    public readonly serde: SerializerProtocol;
    public readonly checkpointIdPolicy: CheckpointIdPolicy;
    protected readonly logger: Logger | undefined;

    public constructor(options: BaseCheckpointStoreOptions = {}) {
        this.serde = options.serde ?? new JsonPlusSerializer();
        this.checkpointIdPolicy = storeOptionsSchema.parse({
            checkpointIdPolicy: options.checkpointIdPolicy
        }).checkpointIdPolicy;
        this.logger = options.logger?.child({ store: new.target.name });
    }

    /** Names the way out when a caller uses the family this backend lacks. */
    protected abstract unsupportedHint(mode: StoreMode): string;

    protected unsupported(operation: string, mode: StoreMode): UnsupportedOperationError {
        return new UnsupportedOperationError(`${this.constructor.name}.${operation}()`, this.unsupportedHint(mode));
    }

    protected resolveCheckpointId(checkpoint: Checkpoint): string {
        if (this.checkpointIdPolicy === 'preserve' && checkpoint.id) {
            return checkpoint.id;
        }
        return createCheckpointId();
    }

    public getNextVersion(current: ChannelVersionInput, channel: Channel): string {
        return nextVersion(current, channel, this.serde);
    }

    // Async family

    public async setup(): Promise<void> {
        throw this.unsupported('setup', 'async');
    }

    public async getTuple(_config: CheckpointConfig): Promise<CheckpointTuple | undefined> {
        throw this.unsupported('getTuple', 'async');
    }

    public async get(config: CheckpointConfig): Promise<Checkpoint | undefined> {
        return (await this.getTuple(config))?.checkpoint;
    }

    public list(_config?: CheckpointConfig, _options?: CheckpointListOptions): AsyncIterableIterator<CheckpointTuple> {
        throw this.unsupported('list', 'async');
    }

    public async put(
        _config: CheckpointConfig,
        _checkpoint: Checkpoint,
        _metadata: CheckpointMetadata
    ): Promise<CheckpointConfig> {
        throw this.unsupported('put', 'async');
    }

    public async putWrites(_config: CheckpointConfig, _writes: readonly PendingWrite[], _taskId: string): Promise<void> {
        throw this.unsupported('putWrites', 'async');
    }

    // Sync family

    public setupSync(): void {
        throw this.unsupported('setupSync', 'sync');
    }

    public getTupleSync(_config: CheckpointConfig): CheckpointTuple | undefined {
        throw this.unsupported('getTupleSync', 'sync');
    }

    public getSync(config: CheckpointConfig): Checkpoint | undefined {
        return this.getTupleSync(config)?.checkpoint;
    }

    public listSync(_config?: CheckpointConfig, _options?: CheckpointListOptions): IterableIterator<CheckpointTuple> {
        throw this.unsupported('listSync', 'sync');
    }

    public putSync(_config: CheckpointConfig, _checkpoint: Checkpoint, _metadata: CheckpointMetadata): CheckpointConfig {
        throw this.unsupported('putSync', 'sync');
    }

    public putWritesSync(_config: CheckpointConfig, _writes: readonly PendingWrite[], _taskId: string): void {
        throw this.unsupported('putWritesSync', 'sync');
    }
}
