import { z } from 'zod';

export const sendPacketSchema = z
    .object({
        node: z.string(),
        args: z.unknown(),
    })
    .transform((packet) => ({ node: packet.node, args: packet.args }));

export const channelVersionsSchema = z.record(z.string());

export const checkpointMetadataSchema = z
    .object({
        source: z.string().optional(),
        step: z.number().optional(),
        writes: z.record(z.unknown()).nullable().optional(),
        parents: z.record(z.string()).optional(),
    })
    .passthrough();

export const checkpointSchema = z.object({
    v: z.number(),
    id: z.string(),
    ts: z.string(),
    channelValues: z.record(z.unknown()),
    channelVersions: channelVersionsSchema,
    versionsSeen: z.record(channelVersionsSchema).default({}),
    pendingSends: z.array(sendPacketSchema).default([]),
});
