import path from 'path';
import pLimit, { type LimitFunction } from 'p-limit';

interface PathQueue {
    limit: LimitFunction;
    users: number;
}

/**
 * Per-path mutual exclusion: one single-slot queue per resolved file path.
 * Tasks for the same path run one at a time in arrival order; tasks for
 * different paths run independently.
 */
export class PathLock {
    private readonly queues = new Map<string, PathQueue>();

    async run<T>(filePath: string, task: () => Promise<T>): Promise<T> {
        const key = path.resolve(filePath);
        let queue = this.queues.get(key);
        if (!queue) {
            queue = { limit: pLimit(1), users: 0 };
            this.queues.set(key, queue);
        }
        const current = queue;
        current.users++;
        try {
            return await current.limit(task);
        } finally {
            current.users--;
            if (current.users === 0) {
                this.queues.delete(key);
            }
        }
    }

    isLocked(filePath: string): boolean {
        return this.queues.has(path.resolve(filePath));
    }
}
