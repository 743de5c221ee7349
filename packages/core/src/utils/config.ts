import type { CheckpointConfig, CheckpointCursor } from '../contracts/checkpoint';
import { checkpointConfigSchema } from '../config/schemas';
import { CHECKPOINT_DEFAULTS } from '../config/defaults';
import { CheckpointConfigError } from '../errors';

/**
 * Validates an untyped execution context into a {@link CheckpointConfig}.
 * Throws a `ZodError` describing every invalid field.
 */
export function parseCheckpointConfig(input: unknown): CheckpointConfig {
    return checkpointConfigSchema.parse(input);
}

export function getThreadId(config: CheckpointConfig, operation = 'access checkpoint'): string {
    const threadId = config.configurable.threadId;
    if (typeof threadId !== 'string' || threadId.length === 0) {
        throw new CheckpointConfigError(operation, 'threadId');
    }
    return threadId;
}

export function getCheckpointNs(config: CheckpointConfig | CheckpointCursor): string {
    const ns = config.configurable.checkpointNs;
    return typeof ns === 'string' ? ns : CHECKPOINT_DEFAULTS.NAMESPACE;
}

export function getCheckpointId(config: CheckpointConfig | CheckpointCursor | undefined): string | undefined {
    const id = config?.configurable.checkpointId;
    return typeof id === 'string' && id.length > 0 ? id : undefined;
}

export function requireCheckpointId(config: CheckpointConfig, operation: string): string {
    const id = getCheckpointId(config);
    if (id === undefined) {
        throw new CheckpointConfigError(operation, 'checkpointId');
    }
    return id;
}

/** Whether the config names a namespace explicitly (an empty string counts). */
export function hasCheckpointNs(config: CheckpointConfig): boolean {
    return typeof config.configurable.checkpointNs === 'string';
}
