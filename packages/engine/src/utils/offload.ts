import { setImmediate } from 'node:timers/promises';

/**
 * Runs blocking work on a later turn of the event loop so it does not block
 * the caller's current task. Errors propagate to the returned promise.
 */
export async function offload<T>(work: () => T): Promise<T> {
    await setImmediate();
    return work();
}
