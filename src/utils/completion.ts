/**
 * Settled outcome of one task, tagged with its submission position
 */
export type Settled<T> =
    | { index: number; ok: true; value: T }
    | { index: number; ok: false; error: unknown };

/**
 * Yield promises in the order they settle, not the order they were given.
 * A single `for await` consumer can drain the results without any shared
 * mutable state between producers. Each promise gets exactly one reaction.
 */
export async function* inCompletionOrder<T>(promises: ReadonlyArray<Promise<T>>): AsyncGenerator<Settled<T>> {
    const settledQueue: Settled<T>[] = [];
    let wake: (() => void) | null = null;

    const push = (settled: Settled<T>): void => {
        settledQueue.push(settled);
        wake?.();
        wake = null;
    };

    promises.forEach((promise, index) => {
        void promise.then(
            value => push({ index, ok: true, value }),
            (error: unknown) => push({ index, ok: false, error })
        );
    });

    for (let delivered = 0; delivered < promises.length; delivered++) {
        let next = settledQueue.shift();
        while (!next) {
            await new Promise<void>(resolve => {
                wake = resolve;
            });
            next = settledQueue.shift();
        }
        yield next;
    }
}
