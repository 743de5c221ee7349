import {
    SerializationError,
    type SerializedValue,
    type SerializerProtocol
} from '@waypoint/core';
import { decodeLegacy, isLegacyBinary } from './legacy';

const TAG = '__waypoint__';

type JsonSafe = null | boolean | number | string | JsonSafe[] | { [key: string]: JsonSafe };

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tagged(type: string, value: JsonSafe): JsonSafe {
    return { [TAG]: type, value };
}

function toBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

function toJsonSafe(value: unknown): JsonSafe {
    if (value === null || typeof value === 'boolean' || typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : tagged('number', String(value));
    }
    if (typeof value === 'bigint') {
        return tagged('bigint', value.toString());
    }
    if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
        return tagged('undefined', null);
    }
    if (Array.isArray(value)) {
        return value.map(toJsonSafe);
    }
    if (value instanceof Date) {
        return tagged('date', Number.isNaN(value.getTime()) ? null : value.toISOString());
    }
    if (value instanceof Uint8Array) {
        return tagged('bytes', toBase64(value));
    }
    if (value instanceof Map) {
        return tagged('map', [...value.entries()].map(([k, v]) => [toJsonSafe(k), toJsonSafe(v)]));
    }
    if (value instanceof Set) {
        return tagged('set', [...value.values()].map(toJsonSafe));
    }
    if (value instanceof RegExp) {
        return tagged('regexp', { source: value.source, flags: value.flags });
    }
    if (value instanceof Error) {
        return tagged('error', { name: value.name, message: value.message });
    }

    const out: { [key: string]: JsonSafe } = {};
    for (const [key, entry] of Object.entries(value)) {
        // Same as JSON.stringify: functions and symbols are dropped from objects.
        if (typeof entry === 'function' || typeof entry === 'symbol') {
            continue;
        }
        out[key] = toJsonSafe(entry);
    }
    return out;
}

function fromTagged(type: unknown, value: unknown): unknown {
    switch (type) {
        case 'undefined':
            return undefined;
        case 'number':
            return Number(value);
        case 'bigint':
            return BigInt(String(value));
        case 'date':
            return typeof value === 'string' ? new Date(value) : new Date(Number.NaN);
        case 'bytes':
            return new Uint8Array(Buffer.from(String(value), 'base64'));
        case 'map':
            return new Map(
                (Array.isArray(value) ? value : []).map((pair): [unknown, unknown] =>
                    Array.isArray(pair) ? [fromJsonSafe(pair[0]), fromJsonSafe(pair[1])] : [undefined, undefined]
                )
            );
        case 'set':
            return new Set((Array.isArray(value) ? value : []).map(fromJsonSafe));
        case 'regexp':
            return isRecord(value) ? new RegExp(String(value.source), String(value.flags)) : new RegExp('');
        case 'error': {
            const error = new Error(isRecord(value) ? String(value.message) : '');
            if (isRecord(value) && typeof value.name === 'string') {
                error.name = value.name;
            }
            return error;
        }
        default:
            throw new SerializationError(`Unknown tagged value "${String(type)}"`, String(type));
    }
}

function fromJsonSafe(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(fromJsonSafe);
    }
    if (!isRecord(value)) {
        return value;
    }
    if (TAG in value && 'value' in value && Object.keys(value).length === 2) {
        return fromTagged(value[TAG], value.value);
    }
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
        const decoded = fromJsonSafe(entry);
        out[key] = decoded;
    }
    return out;
}

/**
 * Default serializer: UTF-8 JSON extended with tagged wrappers for values JSON
 * cannot carry (dates, maps, sets, bigints, bytes, `undefined`, regexps, errors).
 *
 * Raw bytes skip JSON entirely (`'bytes'` tag). Payloads from the older
 * MessagePack encoding are still readable: `loads` recognises them by their
 * leading byte and `loadsTyped` accepts the `'msgpack'` tag.
 */
export class JsonPlusSerializer implements SerializerProtocol {
    public dumps(value: unknown): Uint8Array {
        return encoder.encode(JSON.stringify(toJsonSafe(value)));
    }

    public loads(data: Uint8Array): unknown {
        if (isLegacyBinary(data)) {
            return decodeLegacy(data);
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(decoder.decode(data));
        } catch (jsonError: unknown) {
            // MessagePack positive fixints (0x00-0x7f) carry no signature byte.
            try {
                return decodeLegacy(data);
            } catch {
                throw jsonError;
            }
        }
        return fromJsonSafe(parsed);
    }

    public dumpsTyped(value: unknown): SerializedValue {
        if (value instanceof Uint8Array) {
            return ['bytes', value];
        }
        return ['json', this.dumps(value)];
    }

    public loadsTyped(type: string, data: Uint8Array): unknown {
        switch (type) {
            case 'json':
                return this.loads(data);
            case 'bytes':
                return data;
            case 'msgpack':
                return decodeLegacy(data);
            default:
                throw new SerializationError(`Unknown serialization type "${type}"`, type);
        }
    }
}
