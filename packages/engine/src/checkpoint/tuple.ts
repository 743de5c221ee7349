import {
    checkpointMetadataSchema,
    checkpointSchema,
    type Checkpoint,
    type CheckpointConfig,
    type CheckpointMetadata,
    type CheckpointPendingWrite,
    type CheckpointTuple
} from '@waypoint/core';

export interface TupleParts {
    threadId: string;
    checkpointNs: string;
    checkpointId: string;
    parentCheckpointId?: string | null;
    checkpoint: Checkpoint;
    metadata: CheckpointMetadata;
    pendingWrites?: CheckpointPendingWrite[];
}

export function checkpointConfigFor(threadId: string, checkpointNs: string, checkpointId: string): CheckpointConfig {
    return { configurable: { threadId, checkpointNs, checkpointId } };
}

export function buildCheckpointTuple(parts: TupleParts): CheckpointTuple {
    const tuple: CheckpointTuple = {
        config: checkpointConfigFor(parts.threadId, parts.checkpointNs, parts.checkpointId),
        checkpoint: parts.checkpoint,
        metadata: parts.metadata
    };
    if (parts.parentCheckpointId) {
        tuple.parentConfig = checkpointConfigFor(parts.threadId, parts.checkpointNs, parts.parentCheckpointId);
    }
    if (parts.pendingWrites) {
        tuple.pendingWrites = parts.pendingWrites;
    }
    return tuple;
}

/** Validates a decoded checkpoint body. */
export function parseCheckpoint(value: unknown): Checkpoint {
    return checkpointSchema.parse(value);
}

export function parseCheckpointMetadata(value: unknown): CheckpointMetadata {
    return checkpointMetadataSchema.parse(value ?? {});
}
