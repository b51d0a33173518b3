import type { RawLine } from './orientation-types';
import type { LineSource } from './line-source';

// In-process line sources for exercising the ingestion side without a port.

/** Plays back a fixed script, then reports end of stream. */
export class ScriptedLineSource implements LineSource {
    private readonly items: (RawLine | Error)[];
    reads = 0;
    closed = false;

    constructor(script: (string | RawLine | Error)[]) {
        this.items = script.map((item) => (typeof item === 'string' ? { text: item, truncated: false } : item));
    }

    async readLine(): Promise<RawLine | null> {
        this.reads++;
        const next = this.items.shift();
        if (next === undefined) return null;
        if (next instanceof Error) throw next;
        return next;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

/** Each read blocks until the test delivers a line or ends the stream. */
export class ManualLineSource implements LineSource {
    private waiting: ((line: RawLine | null) => void) | null = null;
    closed = false;

    get pendingReads(): number {
        return this.waiting ? 1 : 0;
    }

    readLine(): Promise<RawLine | null> {
        return new Promise((resolve) => {
            this.waiting = resolve;
        });
    }

    deliver(text: string) {
        this.settle({ text, truncated: false });
    }

    end() {
        this.settle(null);
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    private settle(line: RawLine | null) {
        const waiting = this.waiting;
        if (!waiting) throw new Error('No read is waiting for a line');
        this.waiting = null;
        waiting(line);
    }
}
