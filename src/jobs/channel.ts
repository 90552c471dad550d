import type { LogEvent } from "../types";

export const DONE = 'DONE';
export const FAILED = 'FAILED';

export const isSentinel = (line: string): boolean => line === DONE || line === FAILED;

/**
 * Single-producer/single-consumer progress log
 *
 * The producer appends lines whether or not anyone is reading; undelivered
 * lines wait in a buffer. Reading consumes lines, so a new subscriber picks up
 * after the last line the previous one received. A DONE or FAILED line closes
 * the channel: it is delivered like any other line and everything pushed after
 * it is discarded.
 */
export class LogChannel {
    private buffer: string[] = [];
    private waiters: Array<() => void> = [];
    private _closed = false;

    get closed(): boolean {
        return this._closed;
    }

    /**
     * Append a line
     *
     * @returns false when the channel was already closed and the line dropped
     */
    push(line: string): boolean {
        if (this._closed) return false;

        this.buffer.push(line);
        if (isSentinel(line)) this._closed = true;

        const waiters = this.waiters;
        this.waiters = [];
        waiters.forEach(wake => wake());
        return true;
    }

    /**
     * Take the next line, waiting at most `timeoutMs` for one to arrive
     *
     * An aborted `signal` ends the wait without taking a line.
     *
     * @returns the line, or null on timeout, abort, or when the channel is closed and drained
     */
    async read(timeoutMs: number, signal?: AbortSignal): Promise<string | null> {
        if (signal?.aborted) return null;
        const next = this.buffer.shift();
        if (next !== undefined) return next;
        if (this._closed) return null;

        await new Promise<void>(resolve => {
            const stop = () => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', stop);
                this.waiters = this.waiters.filter(waiter => waiter !== stop);
                resolve();
            };
            const timer = setTimeout(stop, timeoutMs);
            signal?.addEventListener('abort', stop);
            this.waiters.push(stop);
        });

        if (signal?.aborted) return null;
        return this.buffer.shift() ?? null;
    }

    /**
     * Drain lines as events until the closing sentinel
     *
     * Yields an `idle` event whenever `idleMs` passes without a new line, so
     * the caller can check that its own client is still there. Ends right away
     * for a closed channel with nothing left to read, and as soon as `signal`
     * aborts; lines not yet read stay buffered for the next subscriber.
     */
    async *subscribe(idleMs: number, signal?: AbortSignal): AsyncGenerator<LogEvent, void, undefined> {
        while (!signal?.aborted) {
            const line = await this.read(idleMs, signal);
            if (line === null) {
                if (signal?.aborted) return;
                if (this._closed && this.buffer.length === 0) return;
                yield { kind: 'idle' };
                continue;
            }

            yield { kind: 'line', text: line };
            if (isSentinel(line)) return;
        }
    }
}
