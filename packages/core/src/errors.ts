/**
 * Raised by `Channel.checkpoint()` and `Channel.get()` when the channel holds no value.
 * Callers omit the channel from the snapshot; it is never fatal.
 */
export class EmptyChannelError extends Error {
    public constructor(message = 'Channel is empty') {
        super(message);
        this.name = 'EmptyChannelError';
    }
}

/** A channel received an update its merge policy rejects. */
export class InvalidUpdateError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = 'InvalidUpdateError';
    }
}

/** A store method was called on a backend that does not implement it. */
export class UnsupportedOperationError extends Error {
    public readonly operation: string;

    public constructor(operation: string, hint: string) {
        super(`${operation} is not supported. ${hint}`);
        this.name = 'UnsupportedOperationError';
        this.operation = operation;
    }
}

/** A config passed to a store lacks a field the operation needs. */
export class CheckpointConfigError extends Error {
    public readonly field: string;

    public constructor(operation: string, field: string) {
        super(`Failed to ${operation}. The passed config is missing a required "${field}" field in its "configurable" property.`);
        this.name = 'CheckpointConfigError';
        this.field = field;
    }
}

export class SerializationError extends Error {
    public readonly typeTag: string | undefined;

    public constructor(message: string, typeTag?: string) {
        super(message);
        this.name = 'SerializationError';
        this.typeTag = typeTag;
    }
}
