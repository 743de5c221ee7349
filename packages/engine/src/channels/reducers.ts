import type { ChannelReducer } from '@waypoint/core';

/**
 * Appends new items to an array. If no previous array exists, it starts a new one.
 */
export function appendReducer<T>(): ChannelReducer<T[]> {
    return (prev: T[] | undefined, update: T[]) => [...(prev ?? []), ...update];
}

/**
 * A reducer that overwrites the previous value.
 */
export function lastWriteWinsReducer<T>(): ChannelReducer<T> {
    return (_prev: T | undefined, update: T) => update;
}

/**
 * Appends items but keeps only the most recent `maxWindow` of them.
 */
export function boundedReducer<T>(maxWindow: number): ChannelReducer<T[]> {
    return (prev: T[] | undefined, update: T[]) => {
        const combined = [...(prev ?? []), ...update];
        if (combined.length > maxWindow) {
            return combined.slice(-maxWindow);
        }
        return combined;
    };
}
