import { createHash } from 'node:crypto';
import {
    CHECKPOINT_DEFAULTS,
    EmptyChannelError,
    type Channel,
    type ChannelVersionInput,
    type SerializerProtocol
} from '@waypoint/core';

export interface ParsedVersion {
    counter: number;
    hash: string;
}

/**
 * Splits `"<counter>.<hash>"` into its parts. Plain integers (and their string
 * form) are accepted as a bare counter; `undefined` is counter 0.
 */
export function parseVersion(version: ChannelVersionInput): ParsedVersion {
    if (version === undefined) {
        return { counter: 0, hash: '' };
    }
    if (typeof version === 'number') {
        return { counter: version, hash: '' };
    }
    const dot = version.indexOf('.');
    const head = dot === -1 ? version : version.slice(0, dot);
    const counter = Number.parseInt(head, 10);
    if (Number.isNaN(counter)) {
        throw new Error(`Malformed channel version "${version}"`);
    }
    return { counter, hash: dot === -1 ? '' : version.slice(dot + 1) };
}

/**
 * Next version of a channel: the counter is incremented and zero-padded so
 * versions sort correctly as strings; the suffix is an md5 of the channel's
 * serialized checkpoint, or empty when the channel has nothing to persist.
 */
export function nextVersion(current: ChannelVersionInput, channel: Channel, serde: SerializerProtocol): string {
    const counter = parseVersion(current).counter + 1;
    let hash = '';
    try {
        const [, data] = serde.dumpsTyped(channel.checkpoint());
        hash = createHash('md5').update(data).digest('hex');
    } catch (error) {
        if (!(error instanceof EmptyChannelError)) {
            throw error;
        }
    }
    return `${String(counter).padStart(CHECKPOINT_DEFAULTS.VERSION_COUNTER_WIDTH, '0')}.${hash}`;
}

/** Whether `candidate` is newer than `previous` under string ordering. */
export function isNewerVersion(candidate: string, previous: string | undefined): boolean {
    return previous === undefined || candidate > previous;
}
