import { EmptyChannelError, InvalidUpdateError, type Channel } from '@waypoint/core';
import { EMPTY, type Empty } from './empty';

/**
 * Holds the last value written in the current step and is never persisted.
 *
 * `checkpoint()` always raises `EmptyChannelError`, so the channel is left out
 * of every snapshot and comes back empty after a restore.
 */
export class UntrackedValue<T = unknown> implements Channel<T, T, T> {
    public readonly kind = 'untracked';
    private value: T | Empty = EMPTY;

    /**
     * @param guard when true, a step that writes more than one value is rejected
     */
    public constructor(public readonly guard = true) {}

    public update(values: readonly T[]): boolean {
        if (values.length === 0) {
            return false;
        }
        if (values.length !== 1 && this.guard) {
            throw new InvalidUpdateError('UntrackedValue can only receive one value per step.');
        }
        this.value = values[values.length - 1];
        return true;
    }

    public get(): T {
        if (this.value === EMPTY) {
            throw new EmptyChannelError();
        }
        return this.value;
    }

    public isAvailable(): boolean {
        return this.value !== EMPTY;
    }

    public checkpoint(): T {
        throw new EmptyChannelError('UntrackedValue is never checkpointed');
    }

    public fromCheckpoint(_checkpoint: T | undefined): UntrackedValue<T> {
        return new UntrackedValue<T>(this.guard);
    }

    public release(): void {
        this.value = EMPTY;
    }

    public equals(other: Channel<unknown, unknown, unknown>): boolean {
        return other instanceof UntrackedValue && other.guard === this.guard;
    }
}
