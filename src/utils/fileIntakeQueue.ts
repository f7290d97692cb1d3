/**
 * FIFO of file paths waiting to be processed.
 *
 * The queue never advances on its own: the consumer pulls the next path
 * once the previous file has gone through its pipeline.
 */
export class FileIntakeQueue {
    private items: string[] = [];

    /** Appends paths to the tail, preserving their order. */
    enqueue(...paths: string[]): void {
        this.items.push(...paths);
    }

    /**
     * Removes and returns the head of the queue.
     *
     * @return The next path, or undefined when the queue is empty.
     */
    dequeueNext(): string | undefined {
        return this.items.shift();
    }

    /** Returns the head without removing it. */
    peek(): string | undefined {
        return this.items[0];
    }

    get size(): number {
        return this.items.length;
    }

    get isEmpty(): boolean {
        return this.items.length === 0;
    }

    clear(): void {
        this.items = [];
    }

    /** Snapshot of the pending paths, head first. */
    toArray(): string[] {
        return [...this.items];
    }
}
