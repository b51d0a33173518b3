import { parentPort, workerData } from 'node:worker_threads';
import { openDeviceLineSource } from './device-source';
import { TransportOpenError } from './errors';
import { runIngestionSession } from './ingestion';
import { WorkerDataSchema, type WorkerMessage } from './ingestion-protocol';
import type { StreamLineSource } from './line-source';
import { OrientationCell } from './orientation-cell';
import { StopSignal } from './stop-signal';

// Entry point of the ingestion thread. Owns the device for the whole
// session: opens it, runs the read/decode/publish loop, closes it. The line
// settings were applied on the main thread before this thread started.

async function main() {
    const port = parentPort;
    if (!port) throw new Error('ingestion-worker must be started as a worker thread');
    const post = (message: WorkerMessage) => port.postMessage(message);

    const data = WorkerDataSchema.parse(workerData);

    let source: StreamLineSource;
    try {
        source = await openDeviceLineSource(data.device);
    } catch (error) {
        if (!(error instanceof TransportOpenError)) throw error;
        post({ type: 'open-failed', path: error.path, reason: error.reason });
        return;
    }
    post({ type: 'opened' });

    const exit = await runIngestionSession({
        source,
        cell: OrientationCell.attach(data.cellBuffer),
        stop: StopSignal.attach(data.stopBuffer),
        format: data.format,
    });
    post({ type: 'exit', exit });
}

main().catch((error) => {
    console.error('[ingest] Worker failed:', error);
    process.exitCode = 1;
});
