import type { PostgresQueryable } from '@waypoint/core';

type Settled = { ok: true } | { ok: false; error: unknown };

/**
 * Issues statements without waiting for each reply. `sync()` waits for all of
 * them and rethrows the first failure in issue order.
 */
export class PostgresPipeline {
    private pending: Promise<Settled>[] = [];

    public constructor(private readonly conn: PostgresQueryable) {}

    public enqueue(text: string, values: unknown[] = []): void {
        this.pending.push(
            this.conn.query(text, values).then(
                (): Settled => ({ ok: true }),
                (error: unknown): Settled => ({ ok: false, error })
            )
        );
    }

    public async sync(): Promise<void> {
        const pending = this.pending;
        this.pending = [];
        for (const result of await Promise.all(pending)) {
            if (!result.ok) {
                throw result.error;
            }
        }
    }
}
