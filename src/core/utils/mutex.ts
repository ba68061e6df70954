/**
 * Promise-chain mutex: callers of runExclusive run one at a time, in call order
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve()

    async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
        const previous = this.tail
        let release: () => void = () => undefined
        this.tail = new Promise<void>((resolve) => {
            release = resolve
        })

        await previous
        try {
            return await task()
        } finally {
            release()
        }
    }
}
