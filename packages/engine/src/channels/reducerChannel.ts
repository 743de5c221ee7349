import { EmptyChannelError, type Channel, type ChannelReducer } from '@waypoint/core';
import { EMPTY, type Empty } from './empty';

/** Folds every write of a step into the held value with a {@link ChannelReducer}. */
export class ReducerChannel<T = unknown> implements Channel<T, T, T> {
    public readonly kind = 'reducer';
    private value: T | Empty = EMPTY;

    public constructor(public readonly reducer: ChannelReducer<T>) {}

    public update(values: readonly T[]): boolean {
        if (values.length === 0) {
            return false;
        }
        let next = this.reducer(this.value === EMPTY ? undefined : this.value, values[0]);
        for (const value of values.slice(1)) {
            next = this.reducer(next, value);
        }
        this.value = next;
        return true;
    }

    public get(): T {
        if (this.value === EMPTY) {
            throw new EmptyChannelError();
        }
        return this.value;
    }

    public checkpoint(): T {
        return this.get();
    }

    public fromCheckpoint(checkpoint: T | undefined): ReducerChannel<T> {
        const channel = new ReducerChannel<T>(this.reducer);
        if (checkpoint !== undefined) {
            channel.value = checkpoint;
        }
        return channel;
    }

    public release(): void {
        this.value = EMPTY;
    }

    public equals(other: Channel<unknown, unknown, unknown>): boolean {
        return other instanceof ReducerChannel && other.reducer === this.reducer;
    }
}
