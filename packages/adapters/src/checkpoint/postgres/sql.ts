export const SETUP_STATEMENTS: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS checkpoints (
    thread_id TEXT NOT NULL,
    checkpoint_ns TEXT NOT NULL DEFAULT '',
    checkpoint_id TEXT NOT NULL,
    parent_checkpoint_id TEXT,
    checkpoint JSONB NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}',
    PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id)
)`,
    `CREATE TABLE IF NOT EXISTS checkpoint_blobs (
    thread_id TEXT NOT NULL,
    checkpoint_ns TEXT NOT NULL DEFAULT '',
    channel TEXT NOT NULL,
    version TEXT NOT NULL,
    type TEXT NOT NULL,
    blob BYTEA,
    PRIMARY KEY (thread_id, checkpoint_ns, channel, version)
)`,
    `CREATE TABLE IF NOT EXISTS checkpoint_writes (
    thread_id TEXT NOT NULL,
    checkpoint_ns TEXT NOT NULL DEFAULT '',
    checkpoint_id TEXT NOT NULL,
    task_id TEXT NOT NULL,
    idx INTEGER NOT NULL,
    channel TEXT NOT NULL,
    type TEXT,
    blob BYTEA NOT NULL,
    PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id, task_id, idx)
)`
];

/**
 * Channel values are rejoined from `checkpoint_blobs` through the versions
 * recorded in the checkpoint body; pending writes are aggregated in
 * `(task_id, idx)` order. Bytes travel base64-encoded inside the JSON.
 */
export const SELECT_SQL = `SELECT
    thread_id,
    checkpoint_ns,
    checkpoint_id,
    parent_checkpoint_id,
    checkpoint,
    metadata,
    (
        SELECT jsonb_agg(jsonb_build_array(bl.channel, bl.type, encode(bl.blob, 'base64')))
        FROM jsonb_each_text(checkpoint -> 'channelVersions')
        INNER JOIN checkpoint_blobs bl
            ON bl.thread_id = checkpoints.thread_id
            AND bl.checkpoint_ns = checkpoints.checkpoint_ns
            AND bl.channel = jsonb_each_text.key
            AND bl.version = jsonb_each_text.value
    ) AS channel_values,
    (
        SELECT jsonb_agg(jsonb_build_array(cw.task_id, cw.channel, cw.type, encode(cw.blob, 'base64')) ORDER BY cw.task_id, cw.idx)
        FROM checkpoint_writes cw
        WHERE cw.thread_id = checkpoints.thread_id
            AND cw.checkpoint_ns = checkpoints.checkpoint_ns
            AND cw.checkpoint_id = checkpoints.checkpoint_id
    ) AS pending_writes
FROM checkpoints`;

export const UPSERT_CHECKPOINT_SQL = `INSERT INTO checkpoints (thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, checkpoint, metadata)
VALUES ($1, $2, $3, $4, $5, $6)
ON CONFLICT (thread_id, checkpoint_ns, checkpoint_id)
DO UPDATE SET checkpoint = EXCLUDED.checkpoint, metadata = EXCLUDED.metadata`;

export const INSERT_BLOBS_PREFIX = 'INSERT INTO checkpoint_blobs (thread_id, checkpoint_ns, channel, version, type, blob) VALUES ';
export const INSERT_BLOBS_SUFFIX = ' ON CONFLICT (thread_id, checkpoint_ns, channel, version) DO NOTHING';

export const INSERT_WRITES_PREFIX =
    'INSERT INTO checkpoint_writes (thread_id, checkpoint_ns, checkpoint_id, task_id, idx, channel, type, blob) VALUES ';
export const INSERT_WRITES_SUFFIX = ' ON CONFLICT (thread_id, checkpoint_ns, checkpoint_id, task_id, idx) DO NOTHING';

export interface SqlStatement {
    text: string;
    values: unknown[];
}

/** `($1, $2), ($3, $4)` for rows of width 2. */
function placeholders(rowCount: number, width: number): string {
    const groups: string[] = [];
    for (let row = 0; row < rowCount; row++) {
        const params = Array.from({ length: width }, (_, column) => `$${row * width + column + 1}`);
        groups.push(`(${params.join(', ')})`);
    }
    return groups.join(', ');
}

/** The most bind parameters PostgreSQL accepts in one statement. */
export const MAX_BIND_PARAMETERS = 65_535;

/** One insert per chunk of rows, each within {@link MAX_BIND_PARAMETERS}. */
export function multiRowInsert(prefix: string, suffix: string, rows: readonly unknown[][]): SqlStatement[] {
    const width = rows[0]?.length ?? 0;
    const perStatement = width > 0 ? Math.floor(MAX_BIND_PARAMETERS / width) : rows.length;
    const statements: SqlStatement[] = [];
    for (let start = 0; start < rows.length; start += perStatement) {
        const chunk = rows.slice(start, start + perStatement);
        statements.push({
            text: `${prefix}${placeholders(chunk.length, width)}${suffix}`,
            values: chunk.flat()
        });
    }
    return statements;
}

export interface SelectFilter {
    threadId?: string;
    checkpointNs?: string;
    checkpointId?: string;
    metadata?: Record<string, unknown>;
    beforeId?: string;
    limit?: number;
}

export function buildSelect(filter: SelectFilter): SqlStatement {
    const clauses: string[] = [];
    const values: unknown[] = [];
    const param = (value: unknown): string => {
        values.push(value);
        return `$${values.length}`;
    };

    if (filter.threadId !== undefined) {
        clauses.push(`thread_id = ${param(filter.threadId)}`);
    }
    if (filter.checkpointNs !== undefined) {
        clauses.push(`checkpoint_ns = ${param(filter.checkpointNs)}`);
    }
    if (filter.checkpointId !== undefined) {
        clauses.push(`checkpoint_id = ${param(filter.checkpointId)}`);
    }
    if (filter.metadata !== undefined) {
        clauses.push(`metadata @> ${param(JSON.stringify(filter.metadata))}::jsonb`);
    }
    if (filter.beforeId !== undefined) {
        clauses.push(`checkpoint_id < ${param(filter.beforeId)}`);
    }

    let text = SELECT_SQL;
    if (clauses.length > 0) {
        text += ` WHERE ${clauses.join(' AND ')}`;
    }
    text += ' ORDER BY checkpoint_id DESC';
    if (filter.limit !== undefined) {
        text += ` LIMIT ${param(filter.limit)}`;
    }
    return { text, values };
}
