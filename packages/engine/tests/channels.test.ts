import { describe, expect, it } from 'vitest';
import { EmptyChannelError, InvalidUpdateError, type Channel, type Checkpoint } from '@waypoint/core';
import {
  LastValue,
  ReducerChannel,
  UntrackedValue,
  appendReducer,
  boundedReducer,
  createDefaultChannelRegistry,
  defaultChannelRegistry,
  emptyCheckpoint,
  lastWriteWinsReducer,
  withChannelScope,
  withChannelScopeAsync,
  withChannelsFromCheckpoint
} from '../src/index';

describe('UntrackedValue', () => {
  it('holds the value written in the current step', () => {
    const channel = new UntrackedValue<number>();

    expect(channel.update([1])).toBe(true);
    expect(channel.get()).toBe(1);
  });

  it('reports no change for an empty update', () => {
    const channel = new UntrackedValue<number>();
    expect(channel.update([])).toBe(false);
    expect(channel.isAvailable()).toBe(false);
  });

  it('rejects several writes in one step when guarded', () => {
    const channel = new UntrackedValue<number>();
    expect(() => channel.update([1, 2])).toThrow(
      new InvalidUpdateError('UntrackedValue can only receive one value per step.')
    );
  });

  it('keeps the last write when unguarded', () => {
    const channel = new UntrackedValue<number>(false);
    channel.update([1, 2, 3]);
    expect(channel.get()).toBe(3);
  });

  it('is never checkpointed and restores empty', () => {
    const channel = new UntrackedValue<string>();
    channel.update(['secret']);

    expect(() => channel.checkpoint()).toThrow(EmptyChannelError);

    const restored = channel.fromCheckpoint('secret');
    expect(restored.guard).toBe(true);
    expect(() => restored.get()).toThrow(EmptyChannelError);
  });

  it('compares by guard only', () => {
    const a = new UntrackedValue();
    const b = new UntrackedValue();
    b.update(['x']);

    expect(a.equals(b)).toBe(true);
    expect(a.equals(new UntrackedValue(false))).toBe(false);
    expect(a.equals(new LastValue())).toBe(false);
  });

  it('forgets its value on release', () => {
    const channel = new UntrackedValue<number>();
    channel.update([7]);
    channel.release();
    expect(() => channel.get()).toThrow(EmptyChannelError);
  });
});

describe('LastValue and ReducerChannel', () => {
  it('round-trips a LastValue through its checkpoint', () => {
    const channel = new LastValue<string>();
    channel.update(['a']);
    expect(channel.fromCheckpoint(channel.checkpoint()).get()).toBe('a');
    expect(() => channel.update(['a', 'b'])).toThrow(InvalidUpdateError);
  });

  it('folds every write of a step through the reducer', () => {
    const channel = new ReducerChannel(appendReducer<number>());
    channel.update([[1], [2, 3]]);
    expect(channel.get()).toEqual([1, 2, 3]);

    const restored = channel.fromCheckpoint(channel.checkpoint());
    restored.update([[4]]);
    expect(restored.get()).toEqual([1, 2, 3, 4]);
  });

  it('keeps only the newest items with a bounded reducer', () => {
    const channel = new ReducerChannel(boundedReducer<number>(2));
    channel.update([[1, 2, 3]]);
    expect(channel.get()).toEqual([2, 3]);
  });

  it('keeps the last write of a step with a last-write-wins reducer', () => {
    const channel = new ReducerChannel(lastWriteWinsReducer<string>());
    channel.update(['a', 'b']);
    expect(channel.get()).toBe('b');
    channel.update(['c']);
    expect(channel.get()).toBe('c');
  });
});

describe('ChannelRegistry', () => {
  it('builds channels from declarative specs', () => {
    const channels = defaultChannelRegistry.createAll({
      scratch: { kind: 'untracked', guard: false },
      answer: { kind: 'last-value' },
      log: { kind: 'reducer', reducer: appendReducer<string>() }
    });

    expect(channels.scratch).toBeInstanceOf(UntrackedValue);
    expect(channels.scratch.equals(new UntrackedValue(false))).toBe(true);
    expect(channels.answer).toBeInstanceOf(LastValue);
    expect(channels.log).toBeInstanceOf(ReducerChannel);
  });

  it('defaults the untracked guard to true', () => {
    const channel = defaultChannelRegistry.create({ kind: 'untracked' });
    expect(channel.equals(new UntrackedValue(true))).toBe(true);
  });

  it('rejects unknown kinds and invalid options', () => {
    const registry = createDefaultChannelRegistry();
    expect(() => registry.create({ kind: 'topic' })).toThrow('Unknown channel kind "topic"');
    expect(() => registry.create({ kind: 'reducer', reducer: 'nope' })).toThrow();
  });
});

describe('channel scopes', () => {
  it('releases the scoped copy when the callback throws', () => {
    const channel = new LastValue<number>();
    const copies: Channel<number, number, number>[] = [];

    expect(() =>
      withChannelScope(channel, 5, (copy) => {
        copies.push(copy);
        expect(copy.get()).toBe(5);
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(copies).toHaveLength(1);
    expect(() => copies[0].get()).toThrow(EmptyChannelError);
  });

  it('releases the scoped copy when the async callback rejects', async () => {
    const channel = new UntrackedValue<string>();
    const copies: Channel<string, string, string>[] = [];

    await expect(
      withChannelScopeAsync(channel, undefined, async (copy) => {
        copies.push(copy);
        copy.update(['tmp']);
        expect(copy.get()).toBe('tmp');
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(copies).toHaveLength(1);
    expect(() => copies[0].get()).toThrow(EmptyChannelError);
  });

  it('hydrates every channel from a checkpoint and releases them after', async () => {
    const checkpoint: Checkpoint = { ...emptyCheckpoint(), channelValues: { answer: 42 } };
    const channels = {
      answer: new LastValue<number>(),
      scratch: new UntrackedValue<string>()
    };

    const seen = await withChannelsFromCheckpoint(channels, checkpoint, async (scoped) => {
      scoped.scratch.update(['tmp']);
      return { answer: scoped.answer.get(), scratch: scoped.scratch.get(), held: scoped };
    });

    expect(seen.answer).toBe(42);
    expect(seen.scratch).toBe('tmp');
    expect(() => seen.held.answer.get()).toThrow(EmptyChannelError);
    expect(() => seen.held.scratch.get()).toThrow(EmptyChannelError);
  });
});
