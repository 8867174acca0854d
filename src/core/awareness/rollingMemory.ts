import { InteractionCounterMode } from './types';

export const DEFAULT_MEMORY_CAPACITY = 100;

export interface RollingMemoryOptions {
    capacity?: number;
    counterMode?: InteractionCounterMode;
}

/**
 * Process-lifetime transcript of rendered `speaker: text` lines shared by all channels,
 * plus the interaction counter that drives tone selection.
 *
 * Invariants:
 * - `size <= capacity` after every append; the oldest lines are evicted first.
 * - In `monotonic` mode the counter grows by one per append and never stalls.
 * - In `buffer-length` mode the counter is the buffer length, so it stops at `capacity`.
 */
export class RollingMemory {
    private readonly lines: string[] = [];
    private appended = 0;
    readonly capacity: number;
    readonly counterMode: InteractionCounterMode;

    constructor(opts: RollingMemoryOptions = {}) {
        const capacity = opts.capacity ?? DEFAULT_MEMORY_CAPACITY;
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError('capacity must be a positive integer');
        }
        this.capacity = capacity;
        this.counterMode = opts.counterMode ?? 'monotonic';
    }

    /** Append a line and return the counter value after the append. */
    append(line: string): number {
        this.lines.push(line);
        this.appended += 1;
        while (this.lines.length > this.capacity) {
            this.lines.shift();
        }
        return this.counter;
    }

    tail(limit: number): string[] {
        if (limit <= 0) return [];
        return this.lines.slice(-limit);
    }

    get size(): number {
        return this.lines.length;
    }

    get counter(): number {
        return this.counterMode === 'buffer-length' ? this.lines.length : this.appended;
    }
}

export function formatMemoryLine(speaker: string, content: string): string {
    return `${speaker}: ${content}`;
}
