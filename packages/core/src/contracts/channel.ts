/**
 * A named slot of execution state with its own merge policy.
 *
 * `TValue` is what nodes read, `TUpdate` what they write, and `TCheckpoint`
 * the durable form handed to a checkpoint store.
 */
export interface Channel<TValue = unknown, TUpdate = TValue, TCheckpoint = TValue> {
    /** Registry tag of the channel variant. */
    readonly kind: string;

    /**
     * Applies the updates a single step produced, in emission order.
     * Returns whether the visible value changed.
     * Throws `InvalidUpdateError` when the merge policy rejects the arity.
     */
    update(values: readonly TUpdate[]): boolean;

    /** Throws `EmptyChannelError` when no value has been set. */
    get(): TValue;

    /** Throws `EmptyChannelError` when there is nothing to persist. */
    checkpoint(): TCheckpoint;

    /** A fresh instance with the same configuration, hydrated from `checkpoint` (or empty). */
    fromCheckpoint(checkpoint: TCheckpoint | undefined): Channel<TValue, TUpdate, TCheckpoint>;

    /** Drops the step-local value. */
    release(): void;

    /** Structural equality over configuration, never over the held value. */
    equals(other: Channel<unknown, unknown, unknown>): boolean;
}

/**
 * A reducer defines how a channel merges a new write into its current state.
 */
export type ChannelReducer<T> = (current: T | undefined, update: T) => T;
