import {
    CHECKPOINT_DEFAULTS,
    EmptyChannelError,
    type Channel,
    type Checkpoint
} from '@waypoint/core';
import { createCheckpointId } from './ids';

export function emptyCheckpoint(): Checkpoint {
    return {
        v: CHECKPOINT_DEFAULTS.FORMAT_VERSION,
        id: createCheckpointId(),
        ts: new Date().toISOString(),
        channelValues: {},
        channelVersions: {},
        versionsSeen: {},
        pendingSends: []
    };
}

/** Copies the containers of a checkpoint; stored values are shared. */
export function copyCheckpoint(checkpoint: Checkpoint): Checkpoint {
    return {
        ...checkpoint,
        channelValues: { ...checkpoint.channelValues },
        channelVersions: { ...checkpoint.channelVersions },
        versionsSeen: Object.fromEntries(
            Object.entries(checkpoint.versionsSeen).map(([node, versions]) => [node, { ...versions }])
        ),
        pendingSends: [...checkpoint.pendingSends]
    };
}

export interface CreateCheckpointOptions {
    id?: string;
    ts?: Date;
}

/**
 * Derives the next snapshot from `previous`. When `channels` is given the
 * values are taken from them; a channel that raises `EmptyChannelError` on
 * `checkpoint()` is left out.
 */
export function createCheckpoint(
    previous: Checkpoint,
    channels?: Record<string, Channel>,
    options: CreateCheckpointOptions = {}
): Checkpoint {
    const next = copyCheckpoint(previous);
    next.id = options.id ?? createCheckpointId();
    next.ts = (options.ts ?? new Date()).toISOString();

    if (channels) {
        const values: Record<string, unknown> = {};
        for (const [name, channel] of Object.entries(channels)) {
            try {
                values[name] = channel.checkpoint();
            } catch (error) {
                if (error instanceof EmptyChannelError) {
                    continue;
                }
                throw error;
            }
        }
        next.channelValues = values;
    }
    return next;
}
