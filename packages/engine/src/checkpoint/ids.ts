import { monotonicFactory } from 'ulid';

const nextUlid = monotonicFactory();

/** Time-ordered id; ids minted in the same millisecond still sort in call order. */
export function createCheckpointId(seedTime?: number): string {
    return nextUlid(seedTime);
}
