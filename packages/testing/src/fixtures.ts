import type { Checkpoint, CheckpointConfig } from "@waypoint/core";

export const TEST_THREAD_ID = "thread-1";

export function createTestConfig(
  overrides: Partial<CheckpointConfig["configurable"]> = {},
  metadata?: Record<string, unknown>,
): CheckpointConfig {
  const config: CheckpointConfig = {
    configurable: { threadId: TEST_THREAD_ID, checkpointNs: "", ...overrides },
  };
  if (metadata) {
    config.metadata = metadata;
  }
  return config;
}

export function createTestCheckpoint(overrides: Partial<Checkpoint> = {}): Checkpoint {
  return {
    v: 1,
    id: "01J00000000000000000000001",
    ts: "2026-01-01T00:00:00.000Z",
    channelValues: {},
    channelVersions: {},
    versionsSeen: {},
    pendingSends: [],
    ...overrides,
  };
}

/** Drains an async iterable into an array. */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
