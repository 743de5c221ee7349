import { decode } from '@msgpack/msgpack';

/**
 * Rows written before the JSON encoding became the default carry MessagePack
 * bytes. Every MessagePack container, string, float, nil, boolean or negative
 * integer starts with a byte >= 0x80, which no UTF-8 JSON text does (apart
 * from a byte-order mark). Positive fixints (0x00-0x7f) are the exception:
 * `JsonPlusSerializer.loads` falls back to MessagePack when JSON parsing fails.
 */
export function isLegacyBinary(data: Uint8Array): boolean {
    if (data.length === 0 || data[0] < 0x80) {
        return false;
    }
    const hasBom = data.length >= 3 && data[0] === 0xef && data[1] === 0xbb && data[2] === 0xbf;
    return !hasBom;
}

export function decodeLegacy(data: Uint8Array): unknown {
    return decode(data);
}
