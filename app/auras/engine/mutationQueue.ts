/**
 * Serializes mutations per object.
 * A task posted while the same object is already mutating (re-entrant apply, timer fired mid-mutation)
 * runs after the current task instead of interleaving with it. Objects never wait on each other.
 */
export class ObjectMutationQueue<O> {
    private pending: Map<O, Array<() => void>> = new Map();
    private draining: Set<O> = new Set();

    /**
     * Runs the task now, or defers it behind the task currently running for this object.
     * @returns true if the task (and everything queued behind it) has run by the time this returns
     */
    run(object: O, task: () => void): boolean {
        let queue = this.pending.get(object);
        if (!queue) {
            queue = [];
            this.pending.set(object, queue);
        }
        queue.push(task);

        if (this.draining.has(object)) {
            return false;
        }

        this.draining.add(object);
        try {
            let next = queue.shift();
            while (next) {
                next();
                next = queue.shift();
            }
        } finally {
            this.draining.delete(object);
            // A throwing task leaves the rest queued; they drain on the object's next mutation
            if (queue.length === 0) {
                this.pending.delete(object);
            }
        }
        return true;
    }

    isMutating(object: O): boolean {
        return this.draining.has(object);
    }

    pendingCount(object: O): number {
        return this.pending.get(object)?.length ?? 0;
    }
}
