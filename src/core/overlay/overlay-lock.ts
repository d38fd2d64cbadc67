import * as path from 'path';

/**
 * Serializes work on a directory owned by an overlay (a variant's `conf/` or `baselayout/`).
 * A provisioning run is sequential, so this never waits there; it keeps concurrent library
 * callers from interleaving a clear with another copy into the same directory.
 */
export class OverlayLock {
    private tails = new Map<string, Promise<void>>();

    async run<T>(directory: string, fn: () => Promise<T>): Promise<T> {
        const key = path.resolve(directory);
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => {};
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /** Directories with work queued or running */
    get size(): number {
        return this.tails.size;
    }
}

/** Lock shared by every overlay in the process */
export const overlayLock = new OverlayLock();
