import { EmptyChannelError, InvalidUpdateError, type Channel } from '@waypoint/core';
import { EMPTY, type Empty } from './empty';

/** Stores the single value written in a step and persists it. */
export class LastValue<T = unknown> implements Channel<T, T, T> {
    public readonly kind = 'last-value';
    private value: T | Empty = EMPTY;

    public update(values: readonly T[]): boolean {
        if (values.length === 0) {
            return false;
        }
        if (values.length !== 1) {
            throw new InvalidUpdateError('LastValue can only receive one value per step.');
        }
        this.value = values[0];
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

    public fromCheckpoint(checkpoint: T | undefined): LastValue<T> {
        const channel = new LastValue<T>();
        if (checkpoint !== undefined) {
            channel.value = checkpoint;
        }
        return channel;
    }

    public release(): void {
        this.value = EMPTY;
    }

    public equals(other: Channel<unknown, unknown, unknown>): boolean {
        return other instanceof LastValue;
    }
}
