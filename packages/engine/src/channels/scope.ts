import type { Channel, Checkpoint } from '@waypoint/core';

/**
 * Hydrates `channel` from `checkpoint`, runs `run` against the copy, and
 * releases the copy afterwards even when `run` throws.
 */
export function withChannelScope<TValue, TUpdate, TCheckpoint, R>(
    channel: Channel<TValue, TUpdate, TCheckpoint>,
    checkpoint: TCheckpoint | undefined,
    run: (scoped: Channel<TValue, TUpdate, TCheckpoint>) => R
): R {
    const scoped = channel.fromCheckpoint(checkpoint);
    try {
        return run(scoped);
    } finally {
        scoped.release();
    }
}

export async function withChannelScopeAsync<TValue, TUpdate, TCheckpoint, R>(
    channel: Channel<TValue, TUpdate, TCheckpoint>,
    checkpoint: TCheckpoint | undefined,
    run: (scoped: Channel<TValue, TUpdate, TCheckpoint>) => Promise<R>
): Promise<R> {
    const scoped = channel.fromCheckpoint(checkpoint);
    try {
        return await run(scoped);
    } finally {
        scoped.release();
    }
}

/**
 * Hydrates every channel from the checkpoint's values for the duration of `run`.
 * Channels missing from `channelValues` start empty.
 */
export async function withChannelsFromCheckpoint<R>(
    channels: Record<string, Channel>,
    checkpoint: Checkpoint | undefined,
    run: (scoped: Record<string, Channel>) => Promise<R>
): Promise<R> {
    const values = checkpoint?.channelValues ?? {};
    const scoped: Record<string, Channel> = {};
    for (const [name, channel] of Object.entries(channels)) {
        scoped[name] = channel.fromCheckpoint(Object.hasOwn(values, name) ? values[name] : undefined);
    }
    try {
        return await run(scoped);
    } finally {
        for (const channel of Object.values(scoped)) {
            channel.release();
        }
    }
}
