/**
 * Scoped suppression of process stderr.
 *
 * Recognition engines may print warnings that would interleave with
 * progress output. `withSuppressedStderr` mutes `process.stderr.write` for
 * exactly the duration of `fn`. Concurrent scopes share one acquisition:
 * the original writer is restored when the last scope exits, whether `fn`
 * resolves or throws.
 */

type StderrWrite = typeof process.stderr.write;

let activeScopes = 0;
let originalWrite: StderrWrite | undefined;

function discardWrite(_chunk: unknown, encodingOrCallback?: unknown, callback?: unknown): boolean {
    const done = typeof encodingOrCallback === 'function' ? encodingOrCallback : callback;
    if (typeof done === 'function') {
        done();
    }
    return true;
}

function acquire(): void {
    if (activeScopes === 0) {
        originalWrite = process.stderr.write;
        process.stderr.write = discardWrite;
    }
    activeScopes += 1;
}

function release(): void {
    activeScopes -= 1;
    if (activeScopes === 0 && originalWrite) {
        process.stderr.write = originalWrite;
        originalWrite = undefined;
    }
}

export async function withSuppressedStderr<T>(fn: () => Promise<T>): Promise<T> {
    acquire();
    try {
        return await fn();
    } finally {
        release();
    }
}

/**
 * Number of open suppression scopes
 */
export function suppressedScopeCount(): number {
    return activeScopes;
}
