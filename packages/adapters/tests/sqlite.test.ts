import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import type { Database as DatabaseInstance } from 'better-sqlite3';
import { encode } from '@msgpack/msgpack';
import { CheckpointConfigError, UnsupportedOperationError } from '@waypoint/core';
import { LastValue, UntrackedValue, createCheckpoint } from '@waypoint/engine';
import { createTestCheckpoint, createTestConfig, FakeLogger } from '@waypoint/testing';
import { SqliteCheckpointStore } from '../src/index';

describe('SqliteCheckpointStore', () => {
  let db: DatabaseInstance;
  let store: SqliteCheckpointStore;

  beforeEach(() => {
    db = new Database(':memory:');
    store = new SqliteCheckpointStore(db);
  });

  afterEach(() => {
    store.close();
  });

  const ids = (tuples: Iterable<{ config: { configurable: { checkpointId?: string } } }>): Array<string | undefined> =>
    [...tuples].map((tuple) => tuple.config.configurable.checkpointId);

  it('round-trips a checkpoint and its metadata', () => {
    const checkpoint = createTestCheckpoint({
      id: 'c1',
      channelValues: { answer: 42, when: new Date('2026-02-03T00:00:00.000Z'), tags: new Set(['a']) },
      channelVersions: { answer: '1.a', when: '1.b', tags: '1.c' },
      versionsSeen: { node: { answer: '1.a' } }
    });

    const next = store.putSync(createTestConfig(), checkpoint, { source: 'input', step: -1 });
    expect(next).toEqual({ configurable: { threadId: 'thread-1', checkpointNs: '', checkpointId: 'c1' } });

    const tuple = store.getTupleSync(next);
    expect(tuple?.checkpoint).toEqual(checkpoint);
    expect(tuple?.metadata).toEqual({ source: 'input', step: -1 });
    expect(tuple?.parentConfig).toBeUndefined();
    expect(tuple?.pendingWrites).toEqual([]);
    expect(store.getSync(createTestConfig())?.id).toBe('c1');
  });

  it('returns undefined for an unknown thread', () => {
    expect(store.getTupleSync(createTestConfig({ threadId: 'nobody' }))).toBeUndefined();
  });

  it('lists newest first with before, limit and metadata filters', () => {
    store.putSync(createTestConfig(), createTestCheckpoint({ id: 'c1' }), { step: 1 });
    store.putSync(createTestConfig({ checkpointId: 'c1' }), createTestCheckpoint({ id: 'c2' }), { step: 2 });
    store.putSync(createTestConfig({ checkpointId: 'c2' }), createTestCheckpoint({ id: 'c3' }), { step: 3 });
    store.putSync(createTestConfig({ threadId: 'other' }), createTestCheckpoint({ id: 'c9' }), { step: 2 });

    const config = createTestConfig();
    expect(ids(store.listSync(config))).toEqual(['c3', 'c2', 'c1']);
    expect(ids(store.listSync(config, { before: { configurable: { checkpointId: 'c3' } } }))).toEqual(['c2', 'c1']);
    expect(ids(store.listSync(config, { limit: 1 }))).toEqual(['c3']);
    expect(ids(store.listSync(config, { filter: { step: 2 } }))).toEqual(['c2']);
    expect(ids(store.listSync(undefined, { filter: { step: 2 }, limit: 1 }))).toEqual(['c9']);
    expect(ids(store.listSync())).toEqual(['c9', 'c3', 'c2', 'c1']);
  });

  it('links each checkpoint to the one named in the config', () => {
    store.putSync(createTestConfig(), createTestCheckpoint({ id: 'c2' }), {});
    const next = store.putSync(createTestConfig({ checkpointId: 'c2' }), createTestCheckpoint({ id: 'c3' }), {});

    expect(next.configurable.checkpointId).toBe('c3');
    expect(store.getTupleSync(next)?.parentConfig).toEqual({
      configurable: { threadId: 'thread-1', checkpointNs: '', checkpointId: 'c2' }
    });
  });

  it('upserts by id and keeps the original parent', () => {
    store.putSync(createTestConfig({ checkpointId: 'c1' }), createTestCheckpoint({ id: 'c2' }), { step: 1 });
    store.putSync(createTestConfig({ checkpointId: 'c0' }), createTestCheckpoint({ id: 'c2' }), { step: 5 });

    const tuple = store.getTupleSync(createTestConfig({ checkpointId: 'c2' }));
    expect(tuple?.metadata).toEqual({ step: 5 });
    expect(tuple?.parentConfig?.configurable.checkpointId).toBe('c1');
    expect(ids(store.listSync(createTestConfig()))).toEqual(['c2']);
  });

  it('mints a fresh id under the regenerate policy', () => {
    const regenerating = new SqliteCheckpointStore(db, { checkpointIdPolicy: 'regenerate' });
    const next = regenerating.putSync(createTestConfig(), createTestCheckpoint({ id: 'c1' }), {});

    expect(next.configurable.checkpointId).not.toBe('c1');
    expect(next.configurable.checkpointId).toHaveLength(26);
    expect(regenerating.getSync(next)?.id).toBe(next.configurable.checkpointId);
  });

  it('keeps namespaces apart', () => {
    store.putSync(createTestConfig(), createTestCheckpoint({ id: 'c1' }), {});
    store.putSync(createTestConfig({ checkpointNs: 'child' }), createTestCheckpoint({ id: 'c2' }), {});

    expect(store.getSync(createTestConfig())?.id).toBe('c1');
    expect(ids(store.listSync(createTestConfig({ checkpointNs: 'child' })))).toEqual(['c2']);
    expect(ids(store.listSync({ configurable: { threadId: 'thread-1' } }))).toEqual(['c2', 'c1']);
  });

  it('stores each pending write once per task and index', () => {
    const config = store.putSync(createTestConfig(), createTestCheckpoint({ id: 'c1' }), {});

    store.putWritesSync(config, [['a', 1], ['b', { nested: true }]], 'task-1');
    store.putWritesSync(config, [['a', 1], ['b', { nested: true }]], 'task-1');

    expect(db.prepare('SELECT COUNT(*) AS n FROM writes').get()).toEqual({ n: 2 });
    expect(store.getTupleSync(config)?.pendingWrites).toEqual([
      ['task-1', 'a', 1],
      ['task-1', 'b', { nested: true }]
    ]);
  });

  it('requires a checkpoint id for pending writes', () => {
    expect(() => store.putWritesSync(createTestConfig(), [['a', 1]], 'task-1')).toThrow(CheckpointConfigError);
  });

  it('requires a thread id', () => {
    expect(() => store.getTupleSync({ configurable: { threadId: '' } })).toThrow(
      'Failed to get checkpoint tuple. The passed config is missing a required "threadId" field in its "configurable" property.'
    );
  });

  it('leaves untracked channels out of what it persists', () => {
    const answer = new LastValue<number>();
    answer.update([1]);
    const scratch = new UntrackedValue<string>();
    scratch.update(['temporary']);
    const channels = { answer, scratch };

    const checkpoint = createCheckpoint(createTestCheckpoint(), channels, { id: 'c1' });
    checkpoint.channelVersions = {
      answer: store.getNextVersion(undefined, answer),
      scratch: store.getNextVersion(undefined, scratch)
    };
    const next = store.putSync(createTestConfig(), checkpoint, {});

    const restored = store.getSync(next);
    expect(restored?.channelValues).toEqual({ answer: 1 });
    expect(scratch.fromCheckpoint(undefined).isAvailable()).toBe(false);
  });

  it('reads legacy rows written without a type tag', () => {
    store.setupSync();
    const legacy = createTestCheckpoint({ id: 'old', channelValues: { answer: 'x' }, channelVersions: { answer: '1.' } });
    db.prepare(
      `INSERT INTO checkpoints (thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, type, checkpoint, metadata)
       VALUES (?, ?, ?, NULL, NULL, ?, ?)`
    ).run('thread-1', '', 'old', Buffer.from(encode(legacy)), Buffer.from(encode({ source: 'loop' })));

    const tuple = store.getTupleSync(createTestConfig());
    expect(tuple?.checkpoint).toEqual(legacy);
    expect(tuple?.metadata).toEqual({ source: 'loop' });
  });

  it('reads a legacy untyped write holding a small integer', () => {
    store.setupSync();
    db.prepare(
      `INSERT INTO checkpoints (thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, type, checkpoint, metadata)
       VALUES (?, ?, ?, NULL, NULL, ?, ?)`
    ).run('thread-1', '', 'old', Buffer.from(encode(createTestCheckpoint({ id: 'old' }))), Buffer.from(encode({})));
    db.prepare(
      `INSERT INTO writes (thread_id, checkpoint_ns, checkpoint_id, task_id, idx, channel, type, value)
       VALUES (?, ?, ?, ?, ?, ?, NULL, ?)`
    ).run('thread-1', '', 'old', 'task-1', 0, 'count', Buffer.from(encode(5)));

    expect(store.getTupleSync(createTestConfig())?.pendingWrites).toEqual([['task-1', 'count', 5]]);
  });

  it('rejects the async methods', async () => {
    await expect(store.getTuple(createTestConfig())).rejects.toThrow(UnsupportedOperationError);
    await expect(store.put(createTestConfig(), createTestCheckpoint(), {})).rejects.toThrow(
      'SqliteCheckpointStore.put() is not supported. SqliteCheckpointStore only supports the sync methods'
    );
    expect(() => store.list(createTestConfig())).toThrow(UnsupportedOperationError);
  });

  it('sets up once and logs it', () => {
    const logger = new FakeLogger();
    const logged = new SqliteCheckpointStore(db, { logger, walMode: false });

    logged.setupSync();
    logged.setupSync();

    expect(logger.entries('debug', 'SQLite checkpoint tables ready')).toEqual([
      { level: 'debug', obj: { store: 'SqliteCheckpointStore', walMode: false }, msg: 'SQLite checkpoint tables ready' }
    ]);
  });

  it('opens a database from a path', () => {
    const opened = SqliteCheckpointStore.fromConnString(':memory:');
    opened.putSync(createTestConfig(), createTestCheckpoint({ id: 'c1' }), {});
    expect(opened.getSync(createTestConfig())?.id).toBe('c1');
    opened.close();
  });
});
