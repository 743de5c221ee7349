import { z } from 'zod';
import type { Channel, ChannelReducer } from '@waypoint/core';
import { LastValue } from './lastValue';
import { ReducerChannel } from './reducerChannel';
import { UntrackedValue } from './untrackedValue';

/** Declarative description of a channel: a registry tag plus its options. */
export type ChannelSpec = { kind: string } & Record<string, unknown>;

export type ChannelFactory = (spec: ChannelSpec) => Channel;

const untrackedSpecSchema = z.object({
    kind: z.literal('untracked'),
    guard: z.boolean().default(true)
});

const lastValueSpecSchema = z.object({
    kind: z.literal('last-value')
});

const reducerSpecSchema = z.object({
    kind: z.literal('reducer'),
    reducer: z.custom<ChannelReducer<unknown>>((value) => typeof value === 'function', {
        message: 'reducer must be a function'
    })
});

/**
 * Maps channel kinds to factories so graphs can declare their channels as data.
 */
export class ChannelRegistry {
    private readonly factories = new Map<string, ChannelFactory>();

    public register(kind: string, factory: ChannelFactory): this {
        this.factories.set(kind, factory);
        return this;
    }

    public kinds(): string[] {
        return [...this.factories.keys()];
    }

    public create(spec: ChannelSpec): Channel {
        const factory = this.factories.get(spec.kind);
        if (!factory) {
            throw new Error(`Unknown channel kind "${spec.kind}". Registered kinds: ${this.kinds().join(', ')}`);
        }
        return factory(spec);
    }

    public createAll(specs: Record<string, ChannelSpec>): Record<string, Channel> {
        const channels: Record<string, Channel> = {};
        for (const [name, spec] of Object.entries(specs)) {
            channels[name] = this.create(spec);
        }
        return channels;
    }
}

export function createDefaultChannelRegistry(): ChannelRegistry {
    return new ChannelRegistry()
        .register('untracked', (spec) => new UntrackedValue(untrackedSpecSchema.parse(spec).guard))
        .register('last-value', (spec) => {
            lastValueSpecSchema.parse(spec);
            return new LastValue();
        })
        .register('reducer', (spec) => new ReducerChannel(reducerSpecSchema.parse(spec).reducer));
}

export const defaultChannelRegistry = createDefaultChannelRegistry();
