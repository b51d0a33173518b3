import path from 'node:path';
import { Worker } from 'node:worker_threads';
import { TransportOpenError } from './errors';
import { runIngestionSession, type IngestionExit } from './ingestion';
import { WorkerMessageSchema, type WorkerData } from './ingestion-protocol';
import type { OrientationCell } from './orientation-cell';
import type { WireFormat } from './orientation-types';
import type { LineSource } from './line-source';
import type { StopSignal } from './stop-signal';

/** Drives the ingestion side of a session, on whatever thread it lives. */
export interface IngestionRunner {
    /** Resolves once the transport is open; rejects with TransportOpenError otherwise. */
    start(): Promise<void>;
    /** Resolves when ingestion has returned and released the transport. */
    join(): Promise<IngestionExit>;
}

const NO_STATS = { linesRead: 0, published: 0, dropped: 0 };

export interface InProcessRunnerOptions {
    open: () => Promise<LineSource>;
    cell: OrientationCell;
    stop: StopSignal;
    format?: WireFormat;
}

// Runs the loop on the calling thread's event loop. Used by tests and by
// --in-process.
export class InProcessIngestionRunner implements IngestionRunner {
    private session: Promise<IngestionExit> | null = null;

    constructor(private readonly options: InProcessRunnerOptions) {}

    async start(): Promise<void> {
        if (this.session) throw new Error('Ingestion already started');
        const source = await this.options.open();
        this.session = runIngestionSession({
            source,
            cell: this.options.cell,
            stop: this.options.stop,
            format: this.options.format,
        });
    }

    join(): Promise<IngestionExit> {
        if (!this.session) return Promise.reject(new Error('Ingestion was never started'));
        return this.session;
    }
}

export interface WorkerRunnerOptions {
    // device path the worker reads
    device: string;
    cell: OrientationCell;
    stop: StopSignal;
    format: WireFormat;
    // runs on this thread before the worker is spawned, e.g. to apply line settings
    configure?: () => Promise<void>;
    workerPath?: string;
    execArgv?: string[];
}

export const DEFAULT_WORKER_PATH = path.join(__dirname, 'ingestion-worker.js');

// Runs ingestion on a dedicated worker thread; the cell and stop flag travel
// as SharedArrayBuffers.
export class WorkerIngestionRunner implements IngestionRunner {
    private started = false;
    private exited: Promise<IngestionExit> | null = null;

    constructor(private readonly options: WorkerRunnerOptions) {}

    async start(): Promise<void> {
        if (this.started) throw new Error('Ingestion already started');
        this.started = true;

        await this.options.configure?.();

        const data: WorkerData = {
            cellBuffer: this.options.cell.buffer,
            stopBuffer: this.options.stop.buffer,
            device: this.options.device,
            format: this.options.format,
        };
        const worker = new Worker(this.options.workerPath ?? DEFAULT_WORKER_PATH, {
            workerData: data,
            execArgv: this.options.execArgv,
        });

        let reported: IngestionExit | null = null;
        let settleOpen: { resolve: () => void; reject: (error: Error) => void } | null = null;
        const opened = new Promise<void>((resolve, reject) => {
            settleOpen = { resolve, reject };
        });
        const openSettled = (outcome: Error | null) => {
            const pending = settleOpen;
            if (!pending) return;
            settleOpen = null;
            if (outcome) pending.reject(outcome);
            else pending.resolve();
        };

        worker.on('message', (raw: unknown) => {
            const parsed = WorkerMessageSchema.safeParse(raw);
            if (!parsed.success) {
                console.warn('[ingest] Ignoring unexpected worker message:', raw);
                return;
            }
            const message = parsed.data;
            switch (message.type) {
                case 'opened':
                    openSettled(null);
                    break;
                case 'open-failed':
                    openSettled(new TransportOpenError(message.path, message.reason));
                    break;
                case 'exit':
                    reported = message.exit;
                    break;
            }
        });
        worker.on('error', (error) => {
            console.error('[ingest] Worker error:', error);
            openSettled(error);
        });

        this.exited = new Promise<IngestionExit>((resolve) => {
            worker.once('exit', (code) => {
                openSettled(new Error(`Ingestion worker exited with code ${code} before opening the transport`));
                resolve(reported ?? {
                    reason: 'read-error',
                    stats: { ...NO_STATS },
                    error: `Ingestion worker exited with code ${code}`,
                });
            });
        });

        await opened;
    }

    join(): Promise<IngestionExit> {
        if (!this.exited) return Promise.reject(new Error('Ingestion was never started'));
        return this.exited;
    }
}
