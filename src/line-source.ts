import type { Readable } from 'node:stream';
import { TransportReadError } from './errors';
import { LineFramer, MAX_LINE_BYTES } from './line-framer';
import type { RawLine } from './orientation-types';

/** A source of framed telemetry lines with blocking-read semantics. */
export interface LineSource {
    /** Resolves with the next line, or null once the transport has ended. */
    readLine(): Promise<RawLine | null>;
    close(): Promise<void>;
}

// Keeps the transport from racing far ahead of a slow consumer
const HIGH_WATER_LINES = 64;

interface PendingRead {
    resolve: (line: RawLine | null) => void;
    reject: (error: Error) => void;
}

export interface StreamLineSourceOptions {
    maxLineBytes?: number;
    close?: () => Promise<void>;
}

/**
 * Adapts a byte stream into a pull-based line source. Each readLine() call
 * waits until a full line is framed, the stream ends, or it fails.
 */
export class StreamLineSource implements LineSource {
    private readonly framer: LineFramer;
    private readonly queue: RawLine[] = [];
    private pending: PendingRead | null = null;
    private ended = false;
    private failure: Error | null = null;
    private closed = false;
    private readonly closeTransport: () => Promise<void>;

    constructor(private readonly stream: Readable, options: StreamLineSourceOptions = {}) {
        this.framer = new LineFramer(options.maxLineBytes ?? MAX_LINE_BYTES);
        this.closeTransport = options.close ?? (async () => { stream.destroy(); });

        stream.on('data', (chunk: Buffer | string) => this.handleChunk(chunk));
        stream.on('end', () => this.handleEnd());
        stream.on('close', () => this.handleEnd());
        stream.on('error', (error: Error) => this.handleError(error));
    }

    readLine(): Promise<RawLine | null> {
        if (this.pending) {
            return Promise.reject(new Error('readLine() called while a previous read is still pending'));
        }
        const line = this.queue.shift();
        if (line) {
            if (this.stream.isPaused() && this.queue.length < HIGH_WATER_LINES) this.stream.resume();
            return Promise.resolve(line);
        }
        if (this.failure) return Promise.reject(this.failure);
        if (this.ended) return Promise.resolve(null);
        return new Promise((resolve, reject) => {
            this.pending = { resolve, reject };
        });
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.closeTransport();
    }

    private handleChunk(chunk: Buffer | string) {
        for (const line of this.framer.push(chunk)) this.deliver(line);
        if (this.queue.length >= HIGH_WATER_LINES) this.stream.pause();
    }

    private deliver(line: RawLine) {
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            pending.resolve(line);
        } else {
            this.queue.push(line);
        }
    }

    private handleEnd() {
        if (this.ended) return;
        const tail = this.framer.flush();
        if (tail) this.deliver(tail);
        this.ended = true;
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            pending.resolve(null);
        }
    }

    private handleError(error: Error) {
        this.failure = new TransportReadError(error);
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            pending.reject(this.failure);
        }
    }
}
