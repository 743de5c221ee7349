import { z } from 'zod';
import {
    EMPTY_TYPE_TAG,
    type Checkpoint,
    type CheckpointPendingWrite,
    type SerializerProtocol
} from '@waypoint/core';
import { isNewerVersion } from '@waypoint/engine';

export const checkpointRowSchema = z.object({
    thread_id: z.string(),
    checkpoint_ns: z.string(),
    checkpoint_id: z.string(),
    parent_checkpoint_id: z.string().nullable(),
    checkpoint: z.record(z.unknown()),
    metadata: z.record(z.unknown()).nullable(),
    channel_values: z.array(z.tuple([z.string(), z.string(), z.string().nullable()])).nullable(),
    pending_writes: z.array(z.tuple([z.string(), z.string(), z.string().nullable(), z.string()])).nullable()
});

export type CheckpointRow = z.infer<typeof checkpointRowSchema>;

export type BlobRow = [
    threadId: string,
    checkpointNs: string,
    channel: string,
    version: string,
    type: string,
    blob: Buffer | null
];

export type WriteRow = [
    threadId: string,
    checkpointNs: string,
    checkpointId: string,
    taskId: string,
    idx: number,
    channel: string,
    type: string,
    blob: Buffer
];

function toBuffer(data: Uint8Array): Buffer {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function fromBase64(data: string): Uint8Array {
    return new Uint8Array(Buffer.from(data, 'base64'));
}

/**
 * One row per channel whose version is newer than in `previousVersions`.
 * A version with no value (the channel is empty) is written as an `'empty'` blob.
 */
export function dumpBlobs(
    serde: SerializerProtocol,
    threadId: string,
    checkpointNs: string,
    values: Record<string, unknown>,
    versions: Record<string, string>,
    previousVersions?: Record<string, string>
): BlobRow[] {
    const rows: BlobRow[] = [];
    for (const [channel, version] of Object.entries(versions)) {
        if (previousVersions && !isNewerVersion(version, previousVersions[channel])) {
            continue;
        }
        if (Object.hasOwn(values, channel)) {
            const [type, data] = serde.dumpsTyped(values[channel]);
            rows.push([threadId, checkpointNs, channel, version, type, toBuffer(data)]);
        } else {
            rows.push([threadId, checkpointNs, channel, version, EMPTY_TYPE_TAG, null]);
        }
    }
    return rows;
}

export function loadBlobs(
    serde: SerializerProtocol,
    blobs: CheckpointRow['channel_values']
): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const [channel, type, data] of blobs ?? []) {
        if (type === EMPTY_TYPE_TAG || data === null) {
            continue;
        }
        values[channel] = serde.loadsTyped(type, fromBase64(data));
    }
    return values;
}

export function dumpWrites(
    serde: SerializerProtocol,
    threadId: string,
    checkpointNs: string,
    checkpointId: string,
    taskId: string,
    writes: ReadonlyArray<readonly [channel: string, value: unknown]>
): WriteRow[] {
    return writes.map(([channel, value], idx): WriteRow => {
        const [type, data] = serde.dumpsTyped(value);
        return [threadId, checkpointNs, checkpointId, taskId, idx, channel, type, toBuffer(data)];
    });
}

export function loadWrites(serde: SerializerProtocol, writes: CheckpointRow['pending_writes']): CheckpointPendingWrite[] {
    return (writes ?? []).map(([taskId, channel, type, data]): CheckpointPendingWrite => {
        const bytes = fromBase64(data);
        return [taskId, channel, type === null ? serde.loads(bytes) : serde.loadsTyped(type, bytes)];
    });
}

/** The JSONB body: the checkpoint without its channel values, the sends list stored as one `[type, base64]` pair. */
export function dumpCheckpointBody(serde: SerializerProtocol, checkpoint: Checkpoint): Record<string, unknown> {
    const { channelValues: _values, pendingSends, ...rest } = checkpoint;
    const [type, data] = serde.dumpsTyped(pendingSends);
    return {
        ...rest,
        pendingSends: [type, toBuffer(data).toString('base64')]
    };
}

function isEncodedSends(value: unknown): value is [string, string] {
    return Array.isArray(value) && value.length === 2 && value.every((part) => typeof part === 'string');
}

/**
 * Inverse of {@link dumpCheckpointBody}, joined with the channel values.
 * A `pendingSends` that is not a `[type, base64]` pair is taken as already structured.
 */
export function loadCheckpointBody(
    serde: SerializerProtocol,
    body: Record<string, unknown>,
    channelValues: Record<string, unknown>
): Record<string, unknown> {
    const sends = body.pendingSends;
    return {
        ...body,
        channelValues,
        pendingSends: isEncodedSends(sends) ? serde.loadsTyped(sends[0], fromBase64(sends[1])) : sends ?? []
    };
}
