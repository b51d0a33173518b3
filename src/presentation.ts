import type { OrientationReader } from './orientation-cell';
import type { Pose, PoseMapper } from './pose';

export interface RenderSink {
    render(pose: Pose): void;
}

export const DEFAULT_FPS = 60;

export interface PresentationLoopOptions {
    cell: OrientationReader;
    mapper: PoseMapper;
    sinks: RenderSink[];
    fps?: number;
}

/**
 * Fixed-cadence consumer of the orientation cell. Every tick renders the
 * latest snapshot whether or not a new sample arrived since the previous
 * tick; samples that came and went between two ticks are never shown.
 */
export class PresentationLoop {
    private readonly fps: number;
    private lastSequence = 0;
    private ticks = 0;

    constructor(private readonly options: PresentationLoopOptions) {
        this.fps = options.fps ?? DEFAULT_FPS;
        if (!(this.fps > 0) || !Number.isFinite(this.fps)) {
            throw new RangeError(`fps must be a positive number, got ${this.fps}`);
        }
    }

    get tickCount(): number {
        return this.ticks;
    }

    get intervalMs(): number {
        return 1000 / this.fps;
    }

    tick(): Pose {
        const snapshot = this.options.cell.read();
        const fresh = snapshot.sequence !== this.lastSequence;
        this.lastSequence = snapshot.sequence;

        const pose = this.options.mapper.toPose(snapshot, fresh);
        for (const sink of this.options.sinks) {
            sink.render(pose);
        }
        this.ticks++;
        return pose;
    }

    /**
     * Ticks until `closeSignal` aborts, then resolves with the number of ticks
     * rendered. A sink that throws stops the loop and rejects.
     */
    run(closeSignal: AbortSignal): Promise<number> {
        return new Promise((resolve, reject) => {
            if (closeSignal.aborted) {
                resolve(this.ticks);
                return;
            }
            const timer = setInterval(() => {
                try {
                    this.tick();
                } catch (error) {
                    clearInterval(timer);
                    closeSignal.removeEventListener('abort', onClose);
                    reject(error);
                }
            }, this.intervalMs);
            const onClose = () => {
                clearInterval(timer);
                resolve(this.ticks);
            };
            closeSignal.addEventListener('abort', onClose, { once: true });
        });
    }
}
