/**
 * Serializes async critical sections in call order. A section that rejects
 * does not poison the lock for the ones queued after it.
 */
export class AsyncLock {
    private tail: Promise<void> = Promise.resolve();

    public run<T>(section: () => Promise<T> | T): Promise<T> {
        const result = this.tail.then(() => section());
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
