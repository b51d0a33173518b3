import { decodeRawLine } from './decoder';
import type { OrientationWriter } from './orientation-cell';
import type { RawLine, WireFormat } from './orientation-types';
import type { LineSource } from './line-source';
import type { StopSignal } from './stop-signal';

export type IngestionState = 'idle' | 'reading' | 'decoding' | 'published' | 'dropped' | 'stopped';

export type IngestionExitReason = 'stopped' | 'eof' | 'read-error';

export interface IngestionStats {
    linesRead: number;
    published: number;
    dropped: number;
}

export interface IngestionExit {
    reason: IngestionExitReason;
    stats: IngestionStats;
    error?: string;
}

export interface IngestionLoopOptions {
    source: LineSource;
    cell: OrientationWriter;
    stop: StopSignal;
    format?: WireFormat;
    onStateChange?: (state: IngestionState) => void;
}

/**
 * Reads lines from the transport, decodes them and publishes each good sample
 * into the orientation cell. Bad lines are dropped without a trace beyond the
 * drop counter. The stop flag is checked before every read; a read already in
 * flight is allowed to finish.
 */
export class IngestionLoop {
    private state: IngestionState = 'idle';
    private readonly stats: IngestionStats = { linesRead: 0, published: 0, dropped: 0 };
    private started = false;

    constructor(private readonly options: IngestionLoopOptions) {}

    get currentState(): IngestionState {
        return this.state;
    }

    async run(): Promise<IngestionExit> {
        if (this.started) throw new Error('Ingestion loop can only run once');
        this.started = true;

        const { source, stop } = this.options;
        for (;;) {
            if (stop.requested) return this.finish('stopped');

            this.transition('reading');
            let line: RawLine | null;
            try {
                line = await source.readLine();
            } catch (error) {
                console.error('[ingest] Transport read failed:', error);
                return this.finish('read-error', error instanceof Error ? error.message : String(error));
            }
            if (line === null) return this.finish('eof');

            this.stats.linesRead++;
            this.transition('decoding');
            this.handleLine(line);
        }
    }

    private handleLine(line: RawLine) {
        const result = decodeRawLine(line, this.options.format ?? 'auto');
        if (result.ok) {
            this.options.cell.publish(result.orientation);
            this.stats.published++;
            this.transition('published');
        } else {
            this.stats.dropped++;
            this.transition('dropped');
        }
    }

    private transition(state: IngestionState) {
        this.state = state;
        this.options.onStateChange?.(state);
    }

    private finish(reason: IngestionExitReason, error?: string): IngestionExit {
        this.transition('stopped');
        const exit: IngestionExit = { reason, stats: { ...this.stats } };
        if (error !== undefined) exit.error = error;
        return exit;
    }
}

/**
 * Runs one ingestion session to completion and releases the transport
 * afterwards. The source is closed only once the loop has returned.
 */
export async function runIngestionSession(options: IngestionLoopOptions): Promise<IngestionExit> {
    let exit: IngestionExit;
    try {
        exit = await new IngestionLoop(options).run();
    } finally {
        try {
            await options.source.close();
        } catch (error) {
            console.warn('[ingest] Failed to close transport:', error);
        }
    }
    console.log(
        `[ingest] Ingestion ended (${exit.reason}): ${exit.stats.published} published, ${exit.stats.dropped} dropped`
    );
    return exit;
}
