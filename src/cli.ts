import { parseCliArgs, USAGE, type ViewerConfig } from './config';
import { ConfigError, TransportOpenError } from './errors';
import { InProcessIngestionRunner, WorkerIngestionRunner, type IngestionRunner } from './ingestion-runner';
import { LifecycleCoordinator } from './lifecycle';
import { OrientationCell } from './orientation-cell';
import { PoseMapper } from './pose';
import { PresentationLoop, type RenderSink } from './presentation';
import { TerminalReadout, type ReadoutOutput } from './readout';
import { SceneSink } from './scene';
import {
    configureSerialLine,
    createSerialPort,
    openSerialLineSource,
    type PortFactory,
    type SerialPortSettings,
} from './serial-source';
import { StopSignal } from './stop-signal';

export const EXIT_OK = 0;
export const EXIT_TRANSPORT = 1;
export const EXIT_USAGE = 2;

export interface CliDependencies {
    // opens the port in-process, or only to apply line settings in worker mode
    portFactory?: PortFactory;
    output?: ReadoutOutput;
    // abort to request shutdown; defaults to SIGINT/SIGTERM
    closeSignal?: AbortSignal;
}

function createRunner(config: ViewerConfig, cell: OrientationCell, stop: StopSignal, deps: CliDependencies): IngestionRunner {
    const port: SerialPortSettings = { path: config.device, baudRate: config.baudRate, rtscts: config.rtscts };
    const factory = deps.portFactory ?? createSerialPort;
    if (config.inProcess) {
        return new InProcessIngestionRunner({
            open: () => openSerialLineSource(port, factory),
            cell,
            stop,
            format: config.format,
        });
    }
    return new WorkerIngestionRunner({
        device: config.device,
        cell,
        stop,
        format: config.format,
        configure: () => configureSerialLine(port, factory),
    });
}

function signalCloseRequest(): { signal: AbortSignal; release: () => void } {
    const controller = new AbortController();
    const onSignal = (name: NodeJS.Signals) => {
        console.log(`\n[lifecycle] ${name} received, shutting down (repeat to force)`);
        controller.abort();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    return {
        signal: controller.signal,
        release: () => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
        },
    };
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
    let config: ViewerConfig;
    try {
        const command = parseCliArgs(argv);
        if (command.kind === 'usage') {
            console.log(USAGE);
            return EXIT_OK;
        }
        config = command.config;
    } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        console.error(error.message);
        console.error(USAGE);
        return EXIT_USAGE;
    }

    const cell = OrientationCell.create();
    const stop = StopSignal.create();
    const scene = new SceneSink();
    const sinks: RenderSink[] = [scene];
    const readout = config.quiet ? null : new TerminalReadout(deps.output ?? process.stdout);
    if (readout) sinks.push(readout);

    const presentation = new PresentationLoop({
        cell,
        mapper: new PoseMapper(config.axisMapping),
        sinks,
        fps: config.fps,
    });
    const coordinator = new LifecycleCoordinator({
        runner: createRunner(config, cell, stop, deps),
        presentation,
        stop,
    });

    const close = deps.closeSignal ? { signal: deps.closeSignal, release: () => {} } : signalCloseRequest();
    try {
        const summary = await coordinator.run(close.signal);
        readout?.finish();
        const { reason, stats, error } = summary.ingestion;
        console.log(
            `[lifecycle] Session ended after ${summary.ticks} frames; ingestion ${reason}` +
            `${error ? ` (${error})` : ''}: ${stats.linesRead} lines, ${stats.published} published, ${stats.dropped} dropped`
        );
        return EXIT_OK;
    } catch (error) {
        if (!(error instanceof TransportOpenError)) throw error;
        console.error(error.message);
        return EXIT_TRANSPORT;
    } finally {
        close.release();
        scene.dispose();
    }
}
