/** `[typeTag, bytes]`: the tag selects the decoder. */
export type SerializedValue = [type: string, data: Uint8Array];

/** Tag stored in place of a value that is absent, distinct from a stored `null`. */
export const EMPTY_TYPE_TAG = 'empty';

export interface SerializerProtocol {
    dumps(value: unknown): Uint8Array;
    loads(data: Uint8Array): unknown;
    dumpsTyped(value: unknown): SerializedValue;
    loadsTyped(type: string, data: Uint8Array): unknown;
}
