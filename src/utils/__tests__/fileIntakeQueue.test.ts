import { describe, it, expect } from 'vitest';
import { FileIntakeQueue } from '../fileIntakeQueue';

describe('FileIntakeQueue', () => {
    it('should dequeue paths in the order they were added', () => {
        const queue = new FileIntakeQueue();
        queue.enqueue('/subs/a.srt', '/subs/b.srt');
        queue.enqueue('/subs/c.srt');

        expect(queue.size).toBe(3);
        expect(queue.peek()).toBe('/subs/a.srt');
        expect(queue.dequeueNext()).toBe('/subs/a.srt');
        expect(queue.dequeueNext()).toBe('/subs/b.srt');
        expect(queue.toArray()).toEqual(['/subs/c.srt']);
    });

    it('should return undefined when empty', () => {
        const queue = new FileIntakeQueue();
        expect(queue.isEmpty).toBe(true);
        expect(queue.dequeueNext()).toBeUndefined();
        expect(queue.size).toBe(0);
    });

    it('should clear pending paths', () => {
        const queue = new FileIntakeQueue();
        queue.enqueue('/subs/a.srt');
        queue.clear();
        expect(queue.isEmpty).toBe(true);
    });
});
