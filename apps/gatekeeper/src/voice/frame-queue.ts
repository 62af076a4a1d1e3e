import type { AudioFrame } from '@voicegate/shared';

/**
 * Bounded hand-off between capture and the listener. `push` never blocks the
 * capture side: when the buffer is full the incoming frame is dropped and
 * `onDrop` fires. Consumers read frames in arrival order.
 */
export class FrameQueue implements AsyncIterable<AudioFrame> {
    private buffer: AudioFrame[] = [];
    private waiting: ((result: IteratorResult<AudioFrame>) => void) | null = null;
    private closed = false;
    private dropped = 0;

    constructor(
        readonly capacity: number,
        private readonly onDrop?: (frame: AudioFrame, dropped: number) => void
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError('FrameQueue capacity must be a positive integer');
        }
    }

    push(frame: AudioFrame): boolean {
        if (this.closed) return false;

        if (this.waiting) {
            const resolve = this.waiting;
            this.waiting = null;
            resolve({ value: frame, done: false });
            return true;
        }

        if (this.buffer.length >= this.capacity) {
            this.dropped++;
            this.onDrop?.(frame, this.dropped);
            return false;
        }

        this.buffer.push(frame);
        return true;
    }

    close(): void {
        this.closed = true;
        if (this.waiting) {
            const resolve = this.waiting;
            this.waiting = null;
            resolve({ value: undefined, done: true });
        }
    }

    get size(): number {
        return this.buffer.length;
    }

    get droppedCount(): number {
        return this.dropped;
    }

    next(): Promise<IteratorResult<AudioFrame>> {
        const frame = this.buffer.shift();
        if (frame) return Promise.resolve({ value: frame, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
            this.waiting = resolve;
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<AudioFrame> {
        return { next: () => this.next() };
    }
}
