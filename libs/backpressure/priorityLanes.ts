import type { PriorityClass } from '../orchestrator/requestSchema.js';

/**
 * Two FIFO lanes. Interactive is always dequeued before batch.
 */
export class PriorityLanes<T> {
    private readonly lanes: Record<PriorityClass, T[]> = { interactive: [], batch: [] };

    get size(): number {
        return this.lanes.interactive.length + this.lanes.batch.length;
    }

    depth(lane: PriorityClass): number {
        return this.lanes[lane].length;
    }

    /**
     * Appends to the lane's tail and returns the item's 1-based position in
     * overall dequeue order.
     */
    enqueue(lane: PriorityClass, item: T): number {
        this.lanes[lane].push(item);
        return lane === 'interactive'
            ? this.lanes.interactive.length
            : this.lanes.interactive.length + this.lanes.batch.length;
    }

    dequeue(): T | undefined {
        return this.lanes.interactive.shift() ?? this.lanes.batch.shift();
    }

    remove(item: T): boolean {
        for (const lane of [this.lanes.interactive, this.lanes.batch]) {
            const index = lane.indexOf(item);
            if (index >= 0) {
                lane.splice(index, 1);
                return true;
            }
        }
        return false;
    }

    /** 1-based position in overall dequeue order, or undefined once gone */
    position(item: T): number | undefined {
        const interactiveIndex = this.lanes.interactive.indexOf(item);
        if (interactiveIndex >= 0) return interactiveIndex + 1;
        const batchIndex = this.lanes.batch.indexOf(item);
        if (batchIndex >= 0) return this.lanes.interactive.length + batchIndex + 1;
        return undefined;
    }

    drainAll(): T[] {
        const all = [...this.lanes.interactive, ...this.lanes.batch];
        this.lanes.interactive.length = 0;
        this.lanes.batch.length = 0;
        return all;
    }
}
