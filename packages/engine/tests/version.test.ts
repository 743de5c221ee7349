import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { JsonPlusSerializer, LastValue, UntrackedValue, isNewerVersion, nextVersion, parseVersion } from '../src/index';

describe('nextVersion', () => {
  const serde = new JsonPlusSerializer();

  it('starts at one and leaves the hash empty for an empty channel', () => {
    expect(nextVersion(undefined, new UntrackedValue(), serde)).toBe(`${'0'.repeat(31)}1.`);
  });

  it('hashes the serialized checkpoint of a channel with a value', () => {
    const channel = new LastValue<string>();
    channel.update(['x']);

    const version = nextVersion(`${'0'.repeat(31)}1.`, channel, serde);

    expect(version.startsWith(`${'0'.repeat(31)}2.`)).toBe(true);
    expect(version.split('.')[1]).toMatch(/^[0-9a-f]{32}$/);
  });

  it('gives equal values equal hashes', () => {
    const a = new LastValue<number[]>();
    const b = new LastValue<number[]>();
    a.update([[1, 2]]);
    b.update([[1, 2]]);
    expect(nextVersion(3, a, serde)).toBe(nextVersion(3, b, serde));
  });

  it('accepts bare integer versions', () => {
    expect(parseVersion(7)).toEqual({ counter: 7, hash: '' });
    expect(parseVersion('12.abc')).toEqual({ counter: 12, hash: 'abc' });
    expect(() => parseVersion('x.y')).toThrow('Malformed channel version "x.y"');
  });

  it('produces strictly increasing versions under string order', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 1_000_000 }), (counter) => {
        const current = nextVersion(counter, new UntrackedValue(), serde);
        const next = nextVersion(current, new UntrackedValue(), serde);
        return next > current && isNewerVersion(next, current) && !isNewerVersion(current, next);
      })
    );
  });

  it('treats any version as newer than none', () => {
    expect(isNewerVersion('1.', undefined)).toBe(true);
  });
});
