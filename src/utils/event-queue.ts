/**
 * Unbounded push queue read as an async iterable. The producer never waits
 * for the consumer; items are delivered in push order.
 */
export class EventQueue<T> implements AsyncIterable<T> {
    private readonly items: T[] = [];
    private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
    private failWaiting: ((error: unknown) => void) | null = null;
    private closed = false;
    private failure: { error: unknown } | null = null;

    push(item: T): void {
        if (this.closed) return;
        if (this.waiting) {
            const resolve = this.waiting;
            this.clearWaiter();
            resolve({ value: item, done: false });
            return;
        }
        this.items.push(item);
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.waiting) {
            const resolve = this.waiting;
            this.clearWaiter();
            resolve({ value: undefined, done: true });
        }
    }

    /** Close the queue; the reader sees `error` once buffered items are drained */
    fail(error: unknown): void {
        if (this.closed) return;
        this.failure = { error };
        this.closed = true;
        if (this.failWaiting) {
            const reject = this.failWaiting;
            this.clearWaiter();
            reject(error);
        }
    }

    get size(): number {
        return this.items.length;
    }

    private clearWaiter(): void {
        this.waiting = null;
        this.failWaiting = null;
    }

    private next(): Promise<IteratorResult<T, undefined>> {
        if (this.items.length > 0) {
            const value = this.items.shift();
            if (value !== undefined) return Promise.resolve({ value, done: false });
        }
        if (this.failure) return Promise.reject(this.failure.error);
        if (this.closed) return Promise.resolve({ value: undefined, done: true });

        return new Promise((resolve, reject) => {
            this.waiting = resolve;
            this.failWaiting = reject;
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.next(),
            return: async () => {
                this.close();
                return { value: undefined, done: true };
            },
        };
    }
}
