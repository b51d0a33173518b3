import type { IngestionExit } from './ingestion';
import type { IngestionRunner } from './ingestion-runner';
import type { PresentationLoop } from './presentation';
import type { StopSignal } from './stop-signal';

export interface SessionSummary {
    ingestion: IngestionExit;
    ticks: number;
}

export interface LifecycleOptions {
    runner: IngestionRunner;
    presentation: PresentationLoop;
    stop: StopSignal;
}

/**
 * Sequences a viewing session: ingestion up first, presentation until the
 * close request, then stop and join. The join waits for the ingestion side to
 * finish its current read and release the transport.
 */
export class LifecycleCoordinator {
    constructor(private readonly options: LifecycleOptions) {}

    async run(closeSignal: AbortSignal): Promise<SessionSummary> {
        const { runner, presentation, stop } = this.options;

        await runner.start();
        console.log('[lifecycle] Ingestion started, presenting');

        let ticks = 0;
        let failed = false;
        let failure: unknown = null;
        try {
            ticks = await presentation.run(closeSignal);
        } catch (error) {
            failed = true;
            failure = error;
        }

        stop.request();
        console.log('[lifecycle] Stop requested, waiting for ingestion to finish its current read');
        const ingestion = await runner.join();

        if (failed) throw failure;
        return { ingestion, ticks };
    }
}
