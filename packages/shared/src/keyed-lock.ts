/**
 * Serializes async work per key. Work under different keys runs in parallel;
 * work under one key runs in submission order, each task starting after the
 * previous one settles (a rejected task does not block the queue).
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>()

    run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve()
        const result = previous.then(task)
        const tail = result.then(() => undefined, () => undefined)
        this.tails.set(key, tail)
        void tail.then(() => {
            if (this.tails.get(key) === tail) this.tails.delete(key)
        })
        return result
    }

    isLocked(key: string): boolean {
        return this.tails.has(key)
    }

    get size(): number {
        return this.tails.size
    }
}
