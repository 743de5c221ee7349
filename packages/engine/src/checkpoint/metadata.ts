import type { CheckpointConfig, CheckpointMetadata } from '@waypoint/core';

const ADDRESSING_KEYS = new Set(['threadId', 'checkpointNs', 'checkpointId']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Metadata persisted with a checkpoint. Later sources win:
 * configurable fields (minus addressing keys) < `config.metadata` < `metadata`.
 */
export function mergeCheckpointMetadata(config: CheckpointConfig, metadata: CheckpointMetadata): CheckpointMetadata {
    const configurable = Object.fromEntries(
        Object.entries(config.configurable).filter(([key, value]) => !ADDRESSING_KEYS.has(key) && value !== undefined)
    );
    return { ...configurable, ...(config.metadata ?? {}), ...metadata };
}

/**
 * JSON containment with the semantics of PostgreSQL's `@>`: objects match when
 * every filter key is present and contained, arrays when every filter element
 * is contained in some target element, scalars on equality.
 */
export function jsonContains(target: unknown, filter: unknown): boolean {
    if (Array.isArray(filter)) {
        if (!Array.isArray(target)) {
            return false;
        }
        return filter.every((wanted) => target.some((item) => jsonContains(item, wanted)));
    }
    if (isRecord(filter)) {
        if (!isRecord(target)) {
            return false;
        }
        return Object.entries(filter).every(
            ([key, wanted]) => Object.hasOwn(target, key) && jsonContains(target[key], wanted)
        );
    }
    return target === filter;
}
